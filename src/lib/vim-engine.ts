// Modal editing command engine
// Resolves operator + motion / operator + text object / bare motion commands
// against a byte buffer, with registers, dot repeat, marks and a jump list.

import { encodeText, type TextBuffer } from "./text-buffer";
import { EngineError } from "./vim-errors";
import { findKindOf, isJumpMotion, resolveMotion } from "./vim-motions";
import { applyOperator, replaceSpan } from "./vim-operators";
import { createRegisterStore, UNNAMED_REGISTER } from "./vim-registers";
import { getTextObjectRange } from "./vim-text-object";
import type {
  Command,
  EditEvent,
  EngineOptions,
  EngineState,
  LastFind,
  Mode,
  ModalEngine,
  Motion,
  Operator,
  Range,
  TextObject,
} from "./vim-types";
import { floorBoundary, isSurrogate, lineStartAt, prevBoundary } from "./vim-utils";

export type {
  Command,
  EditEvent,
  EngineOptions,
  EngineState,
  LastFind,
  Mode,
  ModalEngine,
  Motion,
  Operator,
  Range,
  TextObject,
};

const LOG_PREFIX = "[ModalEngine]";
const MAX_CODE_POINT = 0x10ffff;

const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  compatible: false,
  shiftwidth: 2,
  expandtab: true,
  maxCount: 10_000,
  jumpListSize: 100,
  debug: process.env.MODAL_ENGINE_DEBUG === "1",
};
export { DEFAULT_ENGINE_OPTIONS };

export function mergeOptions(options?: Partial<EngineOptions>): EngineOptions {
  const given = options || {};
  const defaults = DEFAULT_ENGINE_OPTIONS;
  // Explicit undefined keeps the default
  const merged: EngineOptions = {
    compatible: given.compatible ?? defaults.compatible,
    shiftwidth: given.shiftwidth ?? defaults.shiftwidth,
    expandtab: given.expandtab ?? defaults.expandtab,
    maxCount: given.maxCount ?? defaults.maxCount,
    jumpListSize: given.jumpListSize ?? defaults.jumpListSize,
    debug: given.debug ?? defaults.debug,
    formatter: given.formatter ?? defaults.formatter,
    onEdit: given.onEdit ?? defaults.onEdit,
  };
  if (!Number.isInteger(merged.shiftwidth) || merged.shiftwidth < 1) {
    throw new Error(`${LOG_PREFIX} shiftwidth must be a positive integer`);
  }
  if (!Number.isInteger(merged.maxCount) || merged.maxCount < 1) {
    throw new Error(`${LOG_PREFIX} maxCount must be a positive integer`);
  }
  if (!Number.isInteger(merged.jumpListSize) || merged.jumpListSize < 1) {
    throw new Error(`${LOG_PREFIX} jumpListSize must be a positive integer`);
  }
  return merged;
}

export function createInitialState(): EngineState {
  return {
    mode: "normal",
    pendingOperator: null,
    count: 0,
    register: UNNAMED_REGISTER,
    searchPattern: null,
    searchDirection: "forward",
    lastCommand: null,
    visualStart: null,
    marks: {},
    jumpList: [],
    jumpIndex: null,
    lastFind: null,
    lastInsert: new Uint8Array(0),
    recordingInsert: false,
  };
}

export function createEngine(
  buffer: TextBuffer,
  options?: Partial<EngineOptions>
): ModalEngine {
  return {
    buffer,
    cursor: 0,
    state: createInitialState(),
    registers: createRegisterStore(),
    options: mergeOptions(options),
  };
}

export function makeCommand(fields: Partial<Command>): Command {
  return {
    operator: null,
    motion: null,
    textObject: null,
    count: 0,
    register: UNNAMED_REGISTER,
    charArg: null,
    ...fields,
  };
}

export function describeCommand(command: Command): string {
  const parts: string[] = [];
  if (command.register !== UNNAMED_REGISTER) parts.push(`"${command.register}`);
  if (command.count > 0) parts.push(String(command.count));
  if (command.operator) parts.push(command.operator);
  if (command.motion) parts.push(command.motion);
  else if (command.textObject) parts.push(command.textObject);
  if (command.charArg !== null) {
    parts.push(JSON.stringify(String.fromCodePoint(command.charArg)));
  }
  return parts.length > 0 ? parts.join(" ") : "<empty>";
}

function readAll(engine: ModalEngine): Uint8Array {
  return engine.buffer.slice({ start: 0, end: engine.buffer.len() });
}

function effectiveCount(engine: ModalEngine, count: number): number {
  if (!Number.isInteger(count) || count < 0) {
    throw new EngineError("InvalidCommand", `bad count ${count}`);
  }
  const times = count === 0 ? 1 : count;
  const { maxCount } = engine.options;
  if (times > maxCount) {
    console.warn(`${LOG_PREFIX} count ${times} clamped to ${maxCount}`);
    return maxCount;
  }
  return times;
}

function validateCommand(command: Command): void {
  if ([...command.register].length !== 1) {
    throw new EngineError(
      "InvalidCommand",
      `register name must be one character, got ${JSON.stringify(command.register)}`
    );
  }
  const { charArg } = command;
  if (
    charArg !== null &&
    (!Number.isInteger(charArg) ||
      charArg < 0 ||
      charArg > MAX_CODE_POINT ||
      isSurrogate(charArg))
  ) {
    throw new EngineError("InvalidCommand", `bad character argument ${charArg}`);
  }
}

/**
 * Where `motion` takes the cursor. Pure apart from remembering a successful
 * find/till for repeat-find.
 */
export function executeMotion(
  engine: ModalEngine,
  motion: Motion,
  count: number,
  charArg: number | null
): number {
  const kind = findKindOf(motion);
  if (kind !== null && charArg === null) {
    throw new EngineError("InvalidCommand", `${motion} needs a character argument`);
  }

  const target = resolveMotion(
    motion,
    {
      content: readAll(engine),
      charArg,
      lastFind: engine.state.lastFind,
      compatible: engine.options.compatible,
    },
    engine.cursor,
    effectiveCount(engine, count)
  );

  if (kind !== null && charArg !== null) {
    engine.state.lastFind = { codePoint: charArg, kind };
  }
  return target;
}

export function resolveTextObject(
  engine: ModalEngine,
  kind: TextObject,
  pos: number
): Range {
  return getTextObjectRange(kind, readAll(engine), pos, engine.options.compatible);
}

export function executeCommand(engine: ModalEngine, command: Command): void {
  validateCommand(command);
  const { state } = engine;
  if (engine.options.debug) {
    console.debug(LOG_PREFIX, "execute", describeCommand(command), "at", engine.cursor);
  }

  if (command.operator !== null) {
    // Resolve before touching the buffer so a failed lookup changes nothing.
    let range: Range;
    if (command.motion !== null) {
      const end = executeMotion(engine, command.motion, command.count, command.charArg);
      range = { start: engine.cursor, end };
    } else if (command.textObject !== null) {
      range = resolveTextObject(engine, command.textObject, engine.cursor);
    } else {
      throw new EngineError(
        "InvalidCommand",
        `${command.operator} needs a motion or text object`
      );
    }

    applyOperator(engine, command.operator, range, command.register);
    state.lastCommand = { ...command };
  } else if (command.motion !== null) {
    const from = engine.cursor;
    const to = executeMotion(engine, command.motion, command.count, command.charArg);
    if (isJumpMotion(command.motion) && to !== from) {
      recordJump(engine, from);
    }
    engine.cursor = to;
  }

  state.pendingOperator = null;
  state.count = 0;
  state.register = UNNAMED_REGISTER;
}

/** Dot repeat. A repeated change types its last inserted text again. */
export function repeatLastCommand(engine: ModalEngine, count = 0): void {
  const { state } = engine;
  const last = state.lastCommand;
  if (last === null) {
    throw new EngineError("InvalidCommand", "no command to repeat");
  }

  const command = count > 0 ? { ...last, count } : last;
  const inserted = state.lastInsert;
  executeCommand(engine, command);

  if (command.operator === "change") {
    insertBytes(engine, inserted);
    leaveInsertMode(engine);
  }
}

function insertBytes(engine: ModalEngine, bytes: Uint8Array): void {
  const { state } = engine;
  if (state.mode !== "insert") {
    throw new EngineError("InvalidCommand", `cannot insert text in ${state.mode} mode`);
  }
  replaceSpan(engine, engine.cursor, 0, bytes);
  engine.cursor += bytes.length;
  if (!state.recordingInsert) return;

  const joined = new Uint8Array(state.lastInsert.length + bytes.length);
  joined.set(state.lastInsert);
  joined.set(bytes, state.lastInsert.length);
  state.lastInsert = joined;
}

export function insertText(engine: ModalEngine, text: string): void {
  insertBytes(engine, encodeText(text));
}

export function leaveInsertMode(engine: ModalEngine): void {
  if (engine.state.mode !== "insert") return;
  engine.state.mode = "normal";
  engine.state.recordingInsert = false;

  const content = readAll(engine);
  if (engine.cursor > lineStartAt(content, engine.cursor)) {
    engine.cursor = prevBoundary(content, engine.cursor);
  }
}

export function setMode(engine: ModalEngine, mode: Mode): void {
  engine.state.mode = mode;
}

// Marks

const MARK_NAME = /^[a-zA-Z]$/;

export function setMark(engine: ModalEngine, name: string): void {
  if (!MARK_NAME.test(name)) {
    throw new EngineError("InvalidCommand", `invalid mark name ${JSON.stringify(name)}`);
  }
  engine.state.marks[name] = engine.cursor;
}

export function getMark(engine: ModalEngine, name: string): number | undefined {
  return engine.state.marks[name];
}

export function jumpToMark(engine: ModalEngine, name: string): void {
  const offset = engine.state.marks[name];
  if (offset === undefined) {
    throw new EngineError("InvalidMotion", `mark ${name} is not set`);
  }
  const target = floorBoundary(readAll(engine), offset);
  if (target !== engine.cursor) recordJump(engine, engine.cursor);
  engine.cursor = target;
}

// Jump list

export function recordJump(engine: ModalEngine, offset: number): void {
  const { state, options } = engine;
  let list =
    state.jumpIndex === null
      ? state.jumpList
      : state.jumpList.slice(0, state.jumpIndex + 1);

  if (list[list.length - 1] !== offset) list = [...list, offset];
  if (list.length > options.jumpListSize) {
    list = list.slice(list.length - options.jumpListSize);
  }

  state.jumpList = list;
  state.jumpIndex = null;
}

export function jumpOlder(engine: ModalEngine): void {
  const { state } = engine;
  let list = state.jumpList;
  let index = state.jumpIndex;

  if (index === null) {
    // Remember where we left from so jumpNewer can come back.
    if (list[list.length - 1] !== engine.cursor) list = [...list, engine.cursor];
    if (list.length > engine.options.jumpListSize) list = list.slice(1);
    index = list.length - 1;
  }
  if (index <= 0) {
    throw new EngineError("OutOfBounds", "no older jump");
  }

  state.jumpList = list;
  state.jumpIndex = index - 1;
  engine.cursor = floorBoundary(readAll(engine), list[index - 1]);
}

export function jumpNewer(engine: ModalEngine): void {
  const { state } = engine;
  const index = state.jumpIndex;
  if (index === null || index >= state.jumpList.length - 1) {
    throw new EngineError("OutOfBounds", "no newer jump");
  }
  state.jumpIndex = index + 1;
  engine.cursor = floorBoundary(readAll(engine), state.jumpList[index + 1]);
}
