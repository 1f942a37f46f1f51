import type { Range } from "./vim-types";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * The storage the engine edits. Offsets are bytes; keeping them on UTF-8
 * boundaries is the caller's job.
 */
export interface TextBuffer {
  len(): number;
  /** Copy of `[start, end)`. */
  slice(range: Range): Uint8Array;
  insert(offset: number, bytes: Uint8Array): void;
  delete(offset: number, count: number): void;
}

export class BufferError extends Error {
  readonly code = "OutOfRange";

  constructor(detail: string) {
    super(`[TextBuffer] OutOfRange: ${detail}`);
    this.name = "BufferError";
  }
}

/** Flat byte array with spare capacity at the end. */
export class ByteBuffer implements TextBuffer {
  private data: Uint8Array;
  private length: number;

  constructor(initial: Uint8Array = new Uint8Array(0)) {
    this.data = new Uint8Array(Math.max(16, initial.length * 2));
    this.data.set(initial);
    this.length = initial.length;
  }

  static fromString(text: string): ByteBuffer {
    return new ByteBuffer(encoder.encode(text));
  }

  len(): number {
    return this.length;
  }

  slice(range: Range): Uint8Array {
    if (range.start < 0 || range.start > range.end || range.end > this.length) {
      throw new BufferError(
        `slice [${range.start}, ${range.end}) of ${this.length} bytes`
      );
    }
    return this.data.slice(range.start, range.end);
  }

  insert(offset: number, bytes: Uint8Array): void {
    if (offset < 0 || offset > this.length) {
      throw new BufferError(`insert at ${offset} of ${this.length} bytes`);
    }
    this.reserve(this.length + bytes.length);
    this.data.copyWithin(offset + bytes.length, offset, this.length);
    this.data.set(bytes, offset);
    this.length += bytes.length;
  }

  delete(offset: number, count: number): void {
    if (offset < 0 || count < 0 || offset + count > this.length) {
      throw new BufferError(
        `delete ${count} bytes at ${offset} of ${this.length} bytes`
      );
    }
    this.data.copyWithin(offset, offset + count, this.length);
    this.length -= count;
  }

  toString(): string {
    return decoder.decode(this.data.subarray(0, this.length));
  }

  private reserve(capacity: number): void {
    if (capacity <= this.data.length) return;
    const grown = new Uint8Array(Math.max(capacity, this.data.length * 2));
    grown.set(this.data.subarray(0, this.length));
    this.data = grown;
  }
}

export function encodeText(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}
