export * from "./lib/vim-engine";
export {
  BufferError,
  ByteBuffer,
  decodeText,
  encodeText,
  type TextBuffer,
} from "./lib/text-buffer";
export { EngineError, isEngineError, type EngineErrorCode } from "./lib/vim-errors";
export {
  createRegisterStore,
  getRegister,
  getRegisterText,
  type RegisterStore,
} from "./lib/vim-registers";
export { CommandSchema, parseCommand, type CommandInput } from "./lib/vim-command-schema";
export { VimSession, type ReplayStep } from "./lib/vim-session";
export { MODES, MOTIONS, OPERATORS, TEXT_OBJECTS } from "./lib/vim-types";
