import { z } from "zod";
import { EngineError } from "./vim-errors";
import { UNNAMED_REGISTER } from "./vim-registers";
import { MOTIONS, OPERATORS, TEXT_OBJECTS, type Command } from "./vim-types";
import { isSurrogate } from "./vim-utils";

const isSingleChar = (value: string) => [...value].length === 1;

const CharArgSchema = z
  .union([
    z.number().int().min(0).max(0x10ffff),
    z
      .string()
      .refine(isSingleChar, "must be a single character")
      .transform((value) => value.codePointAt(0) ?? 0),
  ])
  .refine((codePoint) => !isSurrogate(codePoint), "must not be a lone surrogate")
  .nullable()
  .default(null);

/** A command as recorded data, e.g. a replay log entry. */
export const CommandSchema = z
  .object({
    operator: z.enum(OPERATORS).nullable().default(null),
    motion: z.enum(MOTIONS).nullable().default(null),
    textObject: z.enum(TEXT_OBJECTS).nullable().default(null),
    count: z.number().int().nonnegative().default(0),
    register: z
      .string()
      .refine(isSingleChar, "must be a single character")
      .default(UNNAMED_REGISTER),
    charArg: CharArgSchema,
  })
  .strict();

export type CommandInput = z.input<typeof CommandSchema>;

export function parseCommand(input: unknown): Command {
  const result = CommandSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "command"}: ${issue.message}`)
      .join("; ");
    throw new EngineError("InvalidCommand", detail);
  }
  return result.data;
}
