import { decodeText } from "./text-buffer";

export const UNNAMED_REGISTER = '"';
export const YANK_REGISTER = "0";
export const BLACK_HOLE_REGISTER = "_";

/** Register name to owned bytes. Writes always replace, never append. */
export type RegisterStore = Map<string, Uint8Array>;

export function createRegisterStore(): RegisterStore {
  return new Map([[UNNAMED_REGISTER, new Uint8Array(0)]]);
}

export function getRegister(
  store: RegisterStore,
  register: string
): Uint8Array | undefined {
  return store.get(register);
}

export function getRegisterText(store: RegisterStore, register: string): string {
  const bytes = store.get(register);
  return bytes ? decodeText(bytes) : "";
}

function writeRegister(store: RegisterStore, reg: string, bytes: Uint8Array) {
  store.set(reg, bytes.slice());
}

export function saveYankRegister(
  store: RegisterStore,
  bytes: Uint8Array,
  register: string = UNNAMED_REGISTER
): void {
  if (register === BLACK_HOLE_REGISTER) return;

  writeRegister(store, register, bytes);
  if (register !== UNNAMED_REGISTER) {
    writeRegister(store, UNNAMED_REGISTER, bytes);
  }
  writeRegister(store, YANK_REGISTER, bytes);
}

export function saveDeleteRegister(
  store: RegisterStore,
  bytes: Uint8Array,
  register: string = UNNAMED_REGISTER
): void {
  if (register === BLACK_HOLE_REGISTER) return;

  writeRegister(store, register, bytes);
  if (register !== UNNAMED_REGISTER) {
    writeRegister(store, UNNAMED_REGISTER, bytes);
  }
}
