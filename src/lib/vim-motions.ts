import { EngineError } from "./vim-errors";
import type { FindKind, LastFind, Motion } from "./vim-types";
import {
  bytesMatchAt,
  encodeCodePoint,
  firstNonBlank,
  floorBoundary,
  isBlankSpan,
  isSpaceByte,
  lineEndAt,
  lineIndexAt,
  lineStartAt,
  nextBoundary,
  prevBoundary,
  splitLines,
  wordPredicate,
} from "./vim-utils";

export interface MotionContext {
  content: Uint8Array;
  charArg: number | null;
  lastFind: LastFind | null;
  compatible: boolean;
}

/** `index` is the step number within a counted motion, from 0. */
type MotionStep = (ctx: MotionContext, pos: number, index: number) => number;

/**
 * Applies the single-step function `count` times, each step starting where the
 * previous one stopped. A counted word motion is N single-word jumps, not one
 * N-word scan.
 */
export function resolveMotion(
  motion: Motion,
  ctx: MotionContext,
  pos: number,
  count: number
): number {
  const step = motionStep(motion);
  const times = count === 0 ? 1 : count;
  let next = pos;
  for (let i = 0; i < times; i++) {
    next = step(ctx, next, i);
  }
  return next;
}

export function findKindOf(motion: Motion): FindKind | null {
  switch (motion) {
    case "find-char":
      return "find";
    case "find-char-backward":
      return "find-backward";
    case "till-char":
      return "till";
    case "till-char-backward":
      return "till-backward";
    default:
      return null;
  }
}

/** Motions that record the previous cursor in the jump list. */
export function isJumpMotion(motion: Motion): boolean {
  switch (motion) {
    case "file-start":
    case "file-end":
    case "paragraph-forward":
    case "paragraph-backward":
    case "sentence-forward":
    case "sentence-backward":
    case "matching-bracket":
      return true;
    default:
      return false;
  }
}

function motionStep(motion: Motion): MotionStep {
  switch (motion) {
    case "left":
      return ({ content }, pos) => prevBoundary(content, pos);
    case "right":
      return ({ content }, pos) => nextBoundary(content, pos);
    case "up":
      return ({ content }, pos) => moveUp(content, pos);
    case "down":
      return ({ content }, pos) => moveDown(content, pos);
    case "word-forward":
      return ({ content }, pos) => moveWordForward(content, pos, false);
    case "big-word-forward":
      return ({ content }, pos) => moveWordForward(content, pos, true);
    case "word-backward":
      return ({ content }, pos) => moveWordBackward(content, pos, false);
    case "big-word-backward":
      return ({ content }, pos) => moveWordBackward(content, pos, true);
    case "word-end":
      return ({ content }, pos) => moveWordEnd(content, pos, false);
    case "big-word-end":
      return ({ content }, pos) => moveWordEnd(content, pos, true);
    case "line-start":
      return ({ content }, pos) => lineStartAt(content, pos);
    case "line-end":
      return ({ content }, pos) => lineEndAt(content, pos);
    case "line-first-char":
      return ({ content }, pos) =>
        firstNonBlank(
          content,
          lineStartAt(content, pos),
          lineEndAt(content, pos)
        );
    case "file-start":
      return () => 0;
    case "file-end":
      return ({ content }) => content.length;
    case "paragraph-forward":
      return stub((ctx, pos) => moveParagraph(ctx.content, pos, true));
    case "paragraph-backward":
      return stub((ctx, pos) => moveParagraph(ctx.content, pos, false));
    case "sentence-forward":
      return stub((ctx, pos) => moveSentence(ctx.content, pos, true));
    case "sentence-backward":
      return stub((ctx, pos) => moveSentence(ctx.content, pos, false));
    case "matching-bracket":
      return stub((ctx, pos) => moveMatchingBracket(ctx.content, pos));
    case "find-char":
      return findStep(motion, "find");
    case "find-char-backward":
      return findStep(motion, "find-backward");
    case "till-char":
      return findStep(motion, "till");
    case "till-char-backward":
      return findStep(motion, "till-backward");
    case "repeat-find":
      return stub((ctx, pos) => repeatFind(ctx, pos, false));
    case "repeat-find-backward":
      return stub((ctx, pos) => repeatFind(ctx, pos, true));
    default: {
      const unreachable: never = motion;
      throw new EngineError("InvalidMotion", `unknown motion ${unreachable}`);
    }
  }
}

// In compatible mode these motions keep the cursor where it is.
function stub(step: MotionStep): MotionStep {
  return (ctx, pos, index) => (ctx.compatible ? pos : step(ctx, pos, index));
}

// After the first step a till sits next to its last match and must step past it.
function findStep(motion: Motion, kind: FindKind): MotionStep {
  const till = kind === "till" || kind === "till-backward";
  return stub((ctx, pos, index) => {
    if (ctx.charArg === null) {
      throw new EngineError(
        "InvalidCommand",
        `${motion} needs a character argument`
      );
    }
    return runFind(ctx.content, pos, ctx.charArg, kind, till && index > 0);
  });
}

export function moveUp(content: Uint8Array, pos: number): number {
  const lineStart = lineStartAt(content, pos);
  if (lineStart === 0) return pos;

  const prevEnd = lineStart - 1;
  const prevStart = lineStartAt(content, prevEnd);
  const col = pos - lineStart;
  return floorBoundary(content, prevStart + Math.min(col, prevEnd - prevStart));
}

export function moveDown(content: Uint8Array, pos: number): number {
  const lineStart = lineStartAt(content, pos);
  const lineEnd = lineEndAt(content, pos);
  if (lineEnd + 1 >= content.length) return pos;

  const nextStart = lineEnd + 1;
  const nextEnd = lineEndAt(content, nextStart);
  const col = pos - lineStart;
  return floorBoundary(content, nextStart + Math.min(col, nextEnd - nextStart));
}

export function moveWordForward(
  content: Uint8Array,
  pos: number,
  bigWord: boolean
): number {
  if (pos >= content.length) return pos;
  const isWord = wordPredicate(bigWord);
  let i = pos;

  // Rest of the current word
  while (i < content.length && isWord(content[i])) i++;
  while (i < content.length && isSpaceByte(content[i])) i++;
  return i;
}

export function moveWordBackward(
  content: Uint8Array,
  pos: number,
  bigWord: boolean
): number {
  if (pos === 0) return 0;
  const isWord = wordPredicate(bigWord);
  let i = Math.min(pos, content.length);

  while (i > 0 && isSpaceByte(content[i - 1])) i--;
  if (i === 0) return 0;
  while (i > 0 && isWord(content[i - 1])) i--;
  return i;
}

export function moveWordEnd(
  content: Uint8Array,
  pos: number,
  bigWord: boolean
): number {
  const len = content.length;
  if (len === 0) return 0;
  if (pos >= len - 1) return floorBoundary(content, len - 1);
  const isWord = wordPredicate(bigWord);

  let j = pos + 1;
  while (j < len && isSpaceByte(content[j])) j++;
  while (j < len && isWord(content[j])) j++;
  return floorBoundary(content, Math.min(j - 1, len - 1));
}

export function moveParagraph(
  content: Uint8Array,
  pos: number,
  forward: boolean
): number {
  const lines = splitLines(content);
  const blank = (index: number) =>
    isBlankSpan(content, lines[index].start, lines[index].end);
  let l = lineIndexAt(lines, pos);

  if (forward) {
    while (l < lines.length && blank(l)) l++;
    while (l < lines.length && !blank(l)) l++;
    return l >= lines.length ? content.length : lines[l].start;
  }

  while (l >= 0 && blank(l)) l--;
  while (l >= 0 && !blank(l)) l--;
  return l < 0 ? 0 : lines[l].start;
}

const SENTENCE_END = new Set([0x2e, 0x21, 0x3f]); // . ! ?
const SENTENCE_CLOSERS = new Set([0x29, 0x5d, 0x22, 0x27]); // ) ] " '

/**
 * Offsets where sentences begin: the first non-blank byte of the buffer and
 * the first non-blank byte after a terminator or a blank line.
 */
export function sentenceStarts(content: Uint8Array): number[] {
  const starts: number[] = [];
  let expectStart = true;

  for (let i = 0; i < content.length; i++) {
    const b = content[i];
    if (expectStart) {
      if (!isSpaceByte(b)) {
        starts.push(i);
        expectStart = false;
      }
      continue;
    }

    if (SENTENCE_END.has(b)) {
      let j = i + 1;
      while (j < content.length && SENTENCE_CLOSERS.has(content[j])) j++;
      if (j >= content.length || isSpaceByte(content[j])) {
        expectStart = true;
        i = j - 1;
      }
    } else if (b === 0x0a) {
      let j = i + 1;
      while (j < content.length && content[j] !== 0x0a && isSpaceByte(content[j]))
        j++;
      if (j < content.length && content[j] === 0x0a) expectStart = true;
    }
  }

  return starts;
}

export function moveSentence(
  content: Uint8Array,
  pos: number,
  forward: boolean
): number {
  const starts = sentenceStarts(content);
  if (forward) {
    return starts.find((start) => start > pos) ?? content.length;
  }
  for (let i = starts.length - 1; i >= 0; i--) {
    if (starts[i] < pos) return starts[i];
  }
  return 0;
}

const BRACKET_PAIRS: Record<number, { partner: number; opens: boolean }> = {
  0x28: { partner: 0x29, opens: true },
  0x29: { partner: 0x28, opens: false },
  0x5b: { partner: 0x5d, opens: true },
  0x5d: { partner: 0x5b, opens: false },
  0x7b: { partner: 0x7d, opens: true },
  0x7d: { partner: 0x7b, opens: false },
};

export function moveMatchingBracket(content: Uint8Array, pos: number): number {
  const lineEnd = lineEndAt(content, pos);
  let at = pos;
  while (at < lineEnd && !(content[at] in BRACKET_PAIRS)) at++;
  if (at >= lineEnd) {
    throw new EngineError("InvalidMotion", "no bracket on the rest of the line");
  }

  const self = content[at];
  const { partner, opens } = BRACKET_PAIRS[self];
  let depth = 0;

  if (opens) {
    for (let j = at + 1; j < content.length; j++) {
      if (content[j] === self) depth++;
      else if (content[j] === partner) {
        if (depth === 0) return j;
        depth--;
      }
    }
  } else {
    for (let j = at - 1; j >= 0; j--) {
      if (content[j] === self) depth++;
      else if (content[j] === partner) {
        if (depth === 0) return j;
        depth--;
      }
    }
  }

  throw new EngineError("InvalidMotion", `unmatched bracket at ${at}`);
}

/**
 * Line-local character search. `skipAdjacent` ignores a match directly next
 * to the cursor so a repeated till makes progress.
 */
export function runFind(
  content: Uint8Array,
  pos: number,
  codePoint: number,
  kind: FindKind,
  skipAdjacent: boolean
): number {
  const needle = encodeCodePoint(codePoint);
  const till = kind === "till" || kind === "till-backward";

  if (kind === "find" || kind === "till") {
    const lineEnd = lineEndAt(content, pos);
    let j = nextBoundary(content, pos);
    if (skipAdjacent) j = nextBoundary(content, j);
    for (; j + needle.length <= lineEnd; j = nextBoundary(content, j)) {
      if (bytesMatchAt(content, j, needle)) {
        return till ? prevBoundary(content, j) : j;
      }
    }
  } else {
    const lineStart = lineStartAt(content, pos);
    let j = prevBoundary(content, pos);
    if (skipAdjacent && j > lineStart) j = prevBoundary(content, j);
    while (pos > lineStart && j >= lineStart) {
      if (bytesMatchAt(content, j, needle)) {
        return till ? nextBoundary(content, j) : j;
      }
      if (j === lineStart) break;
      j = prevBoundary(content, j);
    }
  }

  throw new EngineError(
    "InvalidMotion",
    `${String.fromCodePoint(codePoint)} not found on the line`
  );
}

const REVERSED: Record<FindKind, FindKind> = {
  find: "find-backward",
  "find-backward": "find",
  till: "till-backward",
  "till-backward": "till",
};

function repeatFind(ctx: MotionContext, pos: number, reverse: boolean): number {
  if (ctx.lastFind === null) {
    throw new EngineError("InvalidMotion", "no previous find to repeat");
  }
  const { codePoint, kind } = ctx.lastFind;
  const effective = reverse ? REVERSED[kind] : kind;
  const till = effective === "till" || effective === "till-backward";
  return runFind(ctx.content, pos, codePoint, effective, till);
}
