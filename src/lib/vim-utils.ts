// Byte-level helpers shared by motions, text objects and operators.
// Everything here works on raw UTF-8 bytes; character classes are ASCII only.

const NEWLINE = 0x0a;

export function isContinuationByte(b: number): boolean {
  return (b & 0xc0) === 0x80;
}

export function isSpaceByte(b: number): boolean {
  return (
    b === 0x20 || b === 0x09 || b === 0x0a || b === 0x0d || b === 0x0b ||
    b === 0x0c
  );
}

export function isWordByte(b: number): boolean {
  return (
    (b >= 0x30 && b <= 0x39) ||
    (b >= 0x41 && b <= 0x5a) ||
    (b >= 0x61 && b <= 0x7a) ||
    b === 0x5f
  );
}

export function wordPredicate(bigWord: boolean): (b: number) => boolean {
  return bigWord ? (b) => !isSpaceByte(b) : isWordByte;
}

/** Start of the code point before `pos`. */
export function prevBoundary(content: Uint8Array, pos: number): number {
  if (pos <= 0) return 0;
  let i = Math.min(pos, content.length) - 1;
  while (i > 0 && isContinuationByte(content[i])) i--;
  return i;
}

/** Start of the code point after the one at `pos`. */
export function nextBoundary(content: Uint8Array, pos: number): number {
  if (pos >= content.length) return content.length;
  let i = pos + 1;
  while (i < content.length && isContinuationByte(content[i])) i++;
  return i;
}

/** Clamps into the buffer and backs off any continuation byte. */
export function floorBoundary(content: Uint8Array, pos: number): number {
  let i = Math.max(0, Math.min(pos, content.length));
  while (i > 0 && i < content.length && isContinuationByte(content[i])) i--;
  return i;
}

export function lineStartAt(content: Uint8Array, pos: number): number {
  let i = Math.min(pos, content.length);
  while (i > 0 && content[i - 1] !== NEWLINE) i--;
  return i;
}

/** Offset of the `\n` ending the line, or `len`. */
export function lineEndAt(content: Uint8Array, pos: number): number {
  let i = Math.max(0, pos);
  while (i < content.length && content[i] !== NEWLINE) i++;
  return i;
}

export function isBlankSpan(
  content: Uint8Array,
  start: number,
  end: number
): boolean {
  for (let i = start; i < end; i++) {
    if (!isSpaceByte(content[i])) return false;
  }
  return true;
}

export function firstNonBlank(
  content: Uint8Array,
  start: number,
  end: number
): number {
  for (let i = start; i < end; i++) {
    if (!isSpaceByte(content[i])) return i;
  }
  return start;
}

export interface LineSpan {
  start: number;
  /** Exclusive, before the newline. */
  end: number;
}

export function splitLines(content: Uint8Array): LineSpan[] {
  const lines: LineSpan[] = [];
  let start = 0;
  for (let i = 0; i < content.length; i++) {
    if (content[i] === NEWLINE) {
      lines.push({ start, end: i });
      start = i + 1;
    }
  }
  lines.push({ start, end: content.length });
  return lines;
}

export function lineIndexAt(lines: LineSpan[], pos: number): number {
  let lo = 0;
  let hi = lines.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lines[mid].start <= pos) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

/** UTF-16 surrogates have no UTF-8 encoding of their own. */
export function isSurrogate(codePoint: number): boolean {
  return codePoint >= 0xd800 && codePoint <= 0xdfff;
}

const encoder = new TextEncoder();

export function encodeCodePoint(codePoint: number): Uint8Array {
  return encoder.encode(String.fromCodePoint(codePoint));
}

export function bytesMatchAt(
  content: Uint8Array,
  pos: number,
  needle: Uint8Array
): boolean {
  if (pos < 0 || pos + needle.length > content.length) return false;
  for (let i = 0; i < needle.length; i++) {
    if (content[pos + i] !== needle[i]) return false;
  }
  return true;
}

export type CaseMode = "lower" | "upper" | "toggle";

export function changeByteCase(b: number, mode: CaseMode): number {
  const upper = b >= 0x41 && b <= 0x5a;
  const lower = b >= 0x61 && b <= 0x7a;
  if (!upper && !lower) return b;
  switch (mode) {
    case "lower":
      return upper ? b + 0x20 : b;
    case "upper":
      return lower ? b - 0x20 : b;
    case "toggle":
      return upper ? b + 0x20 : b - 0x20;
  }
}
