import { decodeText } from "./text-buffer";
import { EngineError } from "./vim-errors";
import { sentenceStarts } from "./vim-motions";
import type { Range, TextObject } from "./vim-types";
import {
  isBlankSpan,
  isSpaceByte,
  isWordByte,
  lineEndAt,
  lineIndexAt,
  lineStartAt,
  splitLines,
} from "./vim-utils";

export function getTextObjectRange(
  kind: TextObject,
  content: Uint8Array,
  pos: number,
  compatible: boolean
): Range {
  if (content.length === 0) {
    throw new EngineError("BufferEmpty", `${kind} on an empty buffer`);
  }
  // Objects the reference engine never resolved collapse to the cursor.
  const pending = (resolve: () => Range): Range =>
    compatible ? { start: pos, end: pos } : resolve();

  switch (kind) {
    case "inner-word":
      return wordRange(content, pos, false);
    case "around-word":
      return wordRange(content, pos, !compatible);
    case "inner-sentence":
      return pending(() => sentenceRange(content, pos, true));
    case "around-sentence":
      return pending(() => sentenceRange(content, pos, false));
    case "inner-paragraph":
      return pending(() => paragraphRange(content, pos, true));
    case "around-paragraph":
      return pending(() => paragraphRange(content, pos, false));
    case "inner-paren":
      return bracketRange(content, pos, 0x28, 0x29, true, compatible);
    case "around-paren":
      return bracketRange(content, pos, 0x28, 0x29, false, compatible);
    case "inner-bracket":
      return bracketRange(content, pos, 0x5b, 0x5d, true, compatible);
    case "around-bracket":
      return bracketRange(content, pos, 0x5b, 0x5d, false, compatible);
    case "inner-brace":
      return bracketRange(content, pos, 0x7b, 0x7d, true, compatible);
    case "around-brace":
      return bracketRange(content, pos, 0x7b, 0x7d, false, compatible);
    case "inner-angle":
      return bracketRange(content, pos, 0x3c, 0x3e, true, compatible);
    case "around-angle":
      return bracketRange(content, pos, 0x3c, 0x3e, false, compatible);
    case "inner-quote":
      return pending(() => quoteRange(content, pos, 0x27, true));
    case "around-quote":
      return pending(() => quoteRange(content, pos, 0x27, false));
    case "inner-double-quote":
      return pending(() => quoteRange(content, pos, 0x22, true));
    case "around-double-quote":
      return pending(() => quoteRange(content, pos, 0x22, false));
    case "inner-backtick":
      return pending(() => quoteRange(content, pos, 0x60, true));
    case "around-backtick":
      return pending(() => quoteRange(content, pos, 0x60, false));
    case "inner-tag":
      return pending(() => tagRange(content, pos, true));
    case "around-tag":
      return pending(() => tagRange(content, pos, false));
    default: {
      const unreachable: never = kind;
      throw new EngineError(
        "InvalidTextObject",
        `unknown text object ${unreachable}`
      );
    }
  }
}

const isBlankByte = (b: number) => b === 0x20 || b === 0x09;

function wordRange(
  content: Uint8Array,
  pos: number,
  withWhitespace: boolean
): Range {
  let start = pos;
  let end = pos;
  while (start > 0 && isWordByte(content[start - 1])) start--;
  while (end < content.length && isWordByte(content[end])) end++;

  if (withWhitespace) {
    let after = end;
    while (after < content.length && isBlankByte(content[after])) after++;
    if (after > end) {
      end = after;
    } else {
      while (start > 0 && isBlankByte(content[start - 1])) start--;
    }
  }

  return { start, end };
}

function bracketRange(
  content: Uint8Array,
  pos: number,
  open: number,
  close: number,
  inner: boolean,
  compatible: boolean
): Range {
  let openAt = -1;
  let scanFrom = pos;

  if (!compatible && content[pos] === open) {
    openAt = pos;
    scanFrom = pos + 1;
  } else {
    let depth = 0;
    for (let i = pos; i > 0; i--) {
      const b = content[i - 1];
      if (b === close) {
        depth++;
      } else if (b === open) {
        if (depth === 0) {
          openAt = i - 1;
          break;
        }
        depth--;
      }
    }
  }
  if (openAt === -1) {
    throw new EngineError("InvalidTextObject", "no opening delimiter");
  }

  let closeAt = -1;
  let depth = 0;
  for (let i = scanFrom; i < content.length; i++) {
    const b = content[i];
    if (b === open) {
      depth++;
    } else if (b === close) {
      if (depth === 0) {
        closeAt = i;
        break;
      }
      depth--;
    }
  }
  if (closeAt === -1) {
    throw new EngineError("InvalidTextObject", "no closing delimiter");
  }

  return inner
    ? { start: openAt + 1, end: closeAt }
    : { start: openAt, end: closeAt + 1 };
}

function sentenceRange(content: Uint8Array, pos: number, inner: boolean): Range {
  const starts = sentenceStarts(content);
  let start = -1;
  for (const s of starts) {
    if (s > pos) break;
    start = s;
  }
  if (start === -1) {
    throw new EngineError("InvalidTextObject", "no sentence at cursor");
  }

  const next = starts.find((s) => s > pos) ?? content.length;
  let end = next;
  if (inner) {
    while (end > start && isSpaceByte(content[end - 1])) end--;
  }
  return { start, end };
}

function paragraphRange(
  content: Uint8Array,
  pos: number,
  inner: boolean
): Range {
  const lines = splitLines(content);
  const blank = (index: number) =>
    isBlankSpan(content, lines[index].start, lines[index].end);
  const line = lineIndexAt(lines, pos);
  const onBlank = blank(line);

  let first = line;
  let last = line;
  while (first > 0 && blank(first - 1) === onBlank) first--;
  while (last < lines.length - 1 && blank(last + 1) === onBlank) last++;

  if (!inner) {
    let k = last;
    while (k < lines.length - 1 && blank(k + 1) !== onBlank) k++;
    if (k > last || onBlank) {
      last = k;
    } else {
      while (first > 0 && blank(first - 1)) first--;
    }
  }

  const end = last < lines.length - 1 ? lines[last + 1].start : content.length;
  return { start: lines[first].start, end };
}

function quoteRange(
  content: Uint8Array,
  pos: number,
  quote: number,
  inner: boolean
): Range {
  const lineStart = lineStartAt(content, pos);
  const lineEnd = lineEndAt(content, pos);

  const quotes: number[] = [];
  for (let i = lineStart; i < lineEnd; i++) {
    if (content[i] !== quote) continue;
    let slashes = 0;
    while (i - slashes - 1 >= lineStart && content[i - slashes - 1] === 0x5c)
      slashes++;
    if (slashes % 2 === 0) quotes.push(i);
  }

  let pair: [number, number] | null = null;
  for (let i = 0; i + 1 < quotes.length; i += 2) {
    const open = quotes[i];
    const close = quotes[i + 1];
    // The pair around the cursor, else the first one after it
    if (pos <= close) {
      pair = [open, close];
      break;
    }
  }
  if (pair === null) {
    throw new EngineError(
      "InvalidTextObject",
      `no ${String.fromCharCode(quote)} pair on the line`
    );
  }

  const [open, close] = pair;
  return inner ? { start: open + 1, end: close } : { start: open, end: close + 1 };
}

interface TagToken {
  name: string;
  start: number;
  /** Offset of the closing `>`. */
  end: number;
  closing: boolean;
}

const isTagNameByte = (b: number) =>
  isWordByte(b) || b === 0x2d || b === 0x3a || b === 0x2e;

function scanTags(content: Uint8Array): TagToken[] {
  const tokens: TagToken[] = [];
  for (let i = 0; i < content.length; i++) {
    if (content[i] !== 0x3c) continue;
    let j = i + 1;
    const closing = content[j] === 0x2f;
    if (closing) j++;
    const nameStart = j;
    while (j < content.length && isTagNameByte(content[j])) j++;
    if (j === nameStart) continue;

    let k = j;
    while (k < content.length && content[k] !== 0x3e) k++;
    if (k >= content.length) break;
    if (content[k - 1] === 0x2f) {
      // <br/>
      i = k;
      continue;
    }

    tokens.push({
      name: decodeText(content.subarray(nameStart, j)),
      start: i,
      end: k,
      closing,
    });
    i = k;
  }
  return tokens;
}

function tagRange(content: Uint8Array, pos: number, inner: boolean): Range {
  const stack: TagToken[] = [];
  let best: { open: TagToken; close: TagToken } | null = null;

  for (const token of scanTags(content)) {
    if (!token.closing) {
      stack.push(token);
      continue;
    }
    for (let i = stack.length - 1; i >= 0; i--) {
      if (stack[i].name !== token.name) continue;
      const open = stack[i];
      stack.splice(i);
      const encloses = open.start <= pos && pos <= token.end;
      const tighter =
        best === null || token.end - open.start < best.close.end - best.open.start;
      if (encloses && tighter) best = { open, close: token };
      break;
    }
  }

  if (best === null) {
    throw new EngineError("InvalidTextObject", "no enclosing tag pair");
  }
  return inner
    ? { start: best.open.end + 1, end: best.close.start }
    : { start: best.open.start, end: best.close.end + 1 };
}
