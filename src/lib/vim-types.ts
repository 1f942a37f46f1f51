import type { TextBuffer } from "./text-buffer";
import type { RegisterStore } from "./vim-registers";

export const MODES = [
  "normal",
  "insert",
  "visual",
  "visual-line",
  "visual-block",
  "command",
  "search",
] as const;

export type Mode = (typeof MODES)[number];

export const OPERATORS = [
  "delete",
  "change",
  "yank",
  "format",
  "indent",
  "outdent",
  "lowercase",
  "uppercase",
  "toggle-case",
] as const;

export type Operator = (typeof OPERATORS)[number];

export const MOTIONS = [
  "left",
  "right",
  "up",
  "down",
  "word-forward",
  "word-backward",
  "word-end",
  "big-word-forward",
  "big-word-backward",
  "big-word-end",
  "line-start",
  "line-end",
  "line-first-char",
  "file-start",
  "file-end",
  "paragraph-forward",
  "paragraph-backward",
  "sentence-forward",
  "sentence-backward",
  "matching-bracket",
  "find-char",
  "find-char-backward",
  "till-char",
  "till-char-backward",
  "repeat-find",
  "repeat-find-backward",
] as const;

export type Motion = (typeof MOTIONS)[number];

export const TEXT_OBJECTS = [
  "inner-word",
  "around-word",
  "inner-sentence",
  "around-sentence",
  "inner-paragraph",
  "around-paragraph",
  "inner-paren",
  "around-paren",
  "inner-bracket",
  "around-bracket",
  "inner-brace",
  "around-brace",
  "inner-angle",
  "around-angle",
  "inner-quote",
  "around-quote",
  "inner-double-quote",
  "around-double-quote",
  "inner-backtick",
  "around-backtick",
  "inner-tag",
  "around-tag",
] as const;

export type TextObject = (typeof TEXT_OBJECTS)[number];

/** Half-open byte range. Producers may hand out unordered pairs. */
export interface Range {
  start: number;
  end: number;
}

export interface Command {
  operator: Operator | null;
  motion: Motion | null;
  textObject: TextObject | null;
  /** 0 means no count was typed. */
  count: number;
  register: string;
  /** Code point for find/till motions. */
  charArg: number | null;
}

export type FindKind = "find" | "find-backward" | "till" | "till-backward";

export interface LastFind {
  codePoint: number;
  kind: FindKind;
}

export interface EngineState {
  mode: Mode;
  pendingOperator: Operator | null;
  count: number;
  register: string;
  searchPattern: string | null;
  searchDirection: "forward" | "backward";
  lastCommand: Command | null;
  visualStart: number | null;
  marks: Record<string, number>;
  jumpList: number[];
  jumpIndex: number | null;
  lastFind: LastFind | null;
  lastInsert: Uint8Array;
  /** Inserted text belongs to the open change and goes to `lastInsert`. */
  recordingInsert: boolean;
}

export interface EditEvent {
  kind: "insert" | "delete";
  offset: number;
  bytes: Uint8Array;
}

export interface EngineOptions {
  /**
   * Keep the reference behavior where paragraph/sentence/bracket/find motions,
   * sentence/paragraph/quote/tag objects and the line operators do nothing,
   * and around-word equals inner-word.
   */
  compatible: boolean;
  shiftwidth: number;
  expandtab: boolean;
  maxCount: number;
  jumpListSize: number;
  debug: boolean;
  formatter?: (text: string) => string;
  onEdit?: (event: EditEvent) => void;
}

export interface ModalEngine {
  buffer: TextBuffer;
  cursor: number;
  state: EngineState;
  registers: RegisterStore;
  options: EngineOptions;
}
