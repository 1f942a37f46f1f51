export type EngineErrorCode =
  | "InvalidCommand"
  | "InvalidMotion"
  | "InvalidTextObject"
  | "BufferEmpty"
  | "OutOfBounds";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, detail: string) {
    super(`[ModalEngine] ${code}: ${detail}`);
    this.name = "EngineError";
    this.code = code;
  }
}

export function isEngineError(
  error: unknown,
  code?: EngineErrorCode
): error is EngineError {
  return (
    error instanceof EngineError && (code === undefined || error.code === code)
  );
}
