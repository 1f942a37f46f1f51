/**
 * A buffer plus an engine, executing commands and keeping a step log that a
 * host can replay or inspect.
 */

import { ByteBuffer } from "./text-buffer";
import { parseCommand } from "./vim-command-schema";
import {
  createEngine,
  describeCommand,
  executeCommand,
  insertText,
  leaveInsertMode,
  repeatLastCommand,
  type Command,
  type EngineOptions,
  type ModalEngine,
  type Mode,
} from "./vim-engine";

export interface ReplayStep {
  label: string;
  text: string;
  cursor: number;
  mode: Mode;
}

export class VimSession {
  readonly engine: ModalEngine;
  private readonly buffer: ByteBuffer;
  private steps: ReplayStep[] = [];

  constructor(initialText: string, options?: Partial<EngineOptions>) {
    this.buffer = ByteBuffer.fromString(initialText);
    this.engine = createEngine(this.buffer, options);
    this.recordStep("START");
  }

  private recordStep(label: string): void {
    this.steps.push({
      label,
      text: this.getText(),
      cursor: this.engine.cursor,
      mode: this.engine.state.mode,
    });
  }

  getText(): string {
    return this.buffer.toString();
  }

  getSteps(): ReplayStep[] {
    return [...this.steps];
  }

  execute(command: Command): void {
    executeCommand(this.engine, command);
    this.recordStep(describeCommand(command));
  }

  /** Types text in insert mode, then returns to normal mode. */
  type(text: string): void {
    insertText(this.engine, text);
    leaveInsertMode(this.engine);
    this.recordStep(`type ${JSON.stringify(text)}`);
  }

  repeat(count = 0): void {
    repeatLastCommand(this.engine, count);
    this.recordStep(count > 0 ? `repeat ${count}` : "repeat");
  }

  /**
   * Validates and runs recorded commands in order. Stops at the first
   * invalid or failing entry and rethrows its error.
   */
  replay(inputs: unknown[]): void {
    for (const input of inputs) {
      this.execute(parseCommand(input));
    }
  }
}
