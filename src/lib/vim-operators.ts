import { decodeText, encodeText } from "./text-buffer";
import { EngineError } from "./vim-errors";
import { saveDeleteRegister, saveYankRegister } from "./vim-registers";
import type { ModalEngine, Operator, Range } from "./vim-types";
import {
  changeByteCase,
  firstNonBlank,
  lineEndAt,
  lineIndexAt,
  splitLines,
  type CaseMode,
  type LineSpan,
} from "./vim-utils";

const EMPTY: Uint8Array = new Uint8Array(0);

export function normalizeRange(range: Range, len: number): Range {
  const start = Math.min(range.start, range.end);
  const end = Math.max(range.start, range.end);
  if (start < 0 || end > len) {
    throw new EngineError(
      "OutOfBounds",
      `range [${start}, ${end}) outside buffer of ${len} bytes`
    );
  }
  return { start, end };
}

function readAll(engine: ModalEngine): Uint8Array {
  return engine.buffer.slice({ start: 0, end: engine.buffer.len() });
}

function shiftOffset(
  offset: number,
  at: number,
  removed: number,
  inserted: number
): number {
  if (offset >= at + removed) return offset + inserted - removed;
  if (offset >= at) return Math.min(offset, at + inserted);
  return offset;
}

/**
 * Replaces `removed` bytes at `at` with `bytes`, keeping marks and the jump
 * list pointed at the same text, and reports the edit through `onEdit`.
 */
export function replaceSpan(
  engine: ModalEngine,
  at: number,
  removed: number,
  bytes: Uint8Array
): void {
  const { buffer, state, options } = engine;

  let deleted: Uint8Array = EMPTY;
  if (removed > 0) {
    deleted = buffer.slice({ start: at, end: at + removed });
    buffer.delete(at, removed);
  }
  if (bytes.length > 0) {
    buffer.insert(at, bytes);
  }

  for (const name of Object.keys(state.marks)) {
    state.marks[name] = shiftOffset(state.marks[name], at, removed, bytes.length);
  }
  state.jumpList = state.jumpList.map((offset) =>
    shiftOffset(offset, at, removed, bytes.length)
  );

  if (options.onEdit) {
    if (removed > 0) options.onEdit({ kind: "delete", offset: at, bytes: deleted });
    if (bytes.length > 0) {
      options.onEdit({ kind: "insert", offset: at, bytes: bytes.slice() });
    }
  }
}

/** Lines from the one holding `start` to the one holding `end - 1`. */
function coveredLines(content: Uint8Array, range: Range): LineSpan[] {
  const lines = splitLines(content);
  const first = lineIndexAt(lines, range.start);
  const last = lineIndexAt(
    lines,
    range.end > range.start ? range.end - 1 : range.start
  );
  return lines.slice(first, last + 1);
}

export function indentUnit(engine: ModalEngine): string {
  const { expandtab, shiftwidth } = engine.options;
  return expandtab ? " ".repeat(shiftwidth) : "\t";
}

function placeOnFirstNonBlank(engine: ModalEngine, lineStart: number): void {
  const content = readAll(engine);
  engine.cursor = firstNonBlank(
    content,
    lineStart,
    lineEndAt(content, lineStart)
  );
}

function indentLines(engine: ModalEngine, lines: LineSpan[]): boolean {
  const unit = encodeText(indentUnit(engine));
  let edited = false;
  // Bottom-up so earlier line offsets stay valid
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].end > lines[i].start) {
      replaceSpan(engine, lines[i].start, 0, unit);
      edited = true;
    }
  }
  placeOnFirstNonBlank(engine, lines[0].start);
  return edited;
}

function outdentLines(
  engine: ModalEngine,
  content: Uint8Array,
  lines: LineSpan[]
): boolean {
  const width = engine.options.shiftwidth;
  let edited = false;
  for (let i = lines.length - 1; i >= 0; i--) {
    const { start, end } = lines[i];
    let strip = 0;
    if (start < end && content[start] === 0x09) {
      strip = 1;
    } else {
      while (strip < width && start + strip < end && content[start + strip] === 0x20)
        strip++;
    }
    if (strip > 0) {
      replaceSpan(engine, start, strip, EMPTY);
      edited = true;
    }
  }
  placeOnFirstNonBlank(engine, lines[0].start);
  return edited;
}

function changeCase(
  engine: ModalEngine,
  content: Uint8Array,
  lines: LineSpan[],
  mode: CaseMode,
  cursor: number
): boolean {
  const start = lines[0].start;
  const end = lines[lines.length - 1].end;
  const original = content.subarray(start, end);
  const rewritten = original.map((b) => changeByteCase(b, mode));

  engine.cursor = cursor;
  if (rewritten.every((b, i) => b === original[i])) return false;
  replaceSpan(engine, start, end - start, rewritten);
  return true;
}

function formatLines(
  engine: ModalEngine,
  content: Uint8Array,
  lines: LineSpan[]
): boolean {
  const { formatter } = engine.options;
  if (!formatter) return false;

  const start = lines[0].start;
  const end = lines[lines.length - 1].end;
  const before = decodeText(content.subarray(start, end));
  const after = formatter(before);
  engine.cursor = start;
  if (after === before) return false;
  replaceSpan(engine, start, end - start, encodeText(after));
  return true;
}

export function applyOperator(
  engine: ModalEngine,
  op: Operator,
  range: Range,
  register: string
): void {
  const { start, end } = normalizeRange(range, engine.buffer.len());
  const { state, registers } = engine;

  switch (op) {
    case "delete":
    case "change": {
      const removed = engine.buffer.slice({ start, end });
      saveDeleteRegister(registers, removed, register);
      if (end > start) {
        replaceSpan(engine, start, end - start, EMPTY);
        state.marks["."] = start;
      }
      engine.cursor = start;
      if (op === "change") {
        state.mode = "insert";
        state.lastInsert = EMPTY;
        state.recordingInsert = true;
      }
      return;
    }
    case "yank":
      saveYankRegister(registers, engine.buffer.slice({ start, end }), register);
      return;
    case "format":
    case "indent":
    case "outdent":
    case "lowercase":
    case "uppercase":
    case "toggle-case":
      if (engine.options.compatible) return;
      applyLineOperator(engine, op, { start, end });
      return;
    default: {
      const unreachable: never = op;
      throw new EngineError("InvalidCommand", `unknown operator ${unreachable}`);
    }
  }
}

function applyLineOperator(
  engine: ModalEngine,
  op: Exclude<Operator, "delete" | "change" | "yank">,
  range: Range
): void {
  const content = readAll(engine);
  const lines = coveredLines(content, range);

  const edited = ((): boolean => {
    switch (op) {
      case "indent":
        return indentLines(engine, lines);
      case "outdent":
        return outdentLines(engine, content, lines);
      case "lowercase":
        return changeCase(engine, content, lines, "lower", range.start);
      case "uppercase":
        return changeCase(engine, content, lines, "upper", range.start);
      case "toggle-case":
        return changeCase(engine, content, lines, "toggle", range.start);
      case "format":
        return formatLines(engine, content, lines);
    }
  })();

  if (edited) engine.state.marks["."] = lines[0].start;
}
