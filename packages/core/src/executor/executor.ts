// packages/core/src/executor/executor.ts — Action executor contract and shared sequencing

import { formatStatement } from '../instructions/formatter.js';
import type { Instruction } from '../types/instruction.js';
import { ExecutionError } from '../utils/errors.js';
import { errorMessage } from '../utils/failure.js';

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export type Sleeper = (ms: number) => Promise<void>;

/** Performs instructions on the display. Throws ExecutionError naming the failing statement. */
export interface ActionExecutor {
  readonly name: string;
  execute(instructions: readonly Instruction[]): Promise<void>;
}

export interface ExecutorOptions {
  /** Pause between consecutive statements. */
  interActionDelayMs?: number;
  sleep?: Sleeper;
}

/** Runs statements in order with a pause between them; subclasses perform one statement. */
export abstract class SequencedExecutor implements ActionExecutor {
  abstract readonly name: string;
  protected readonly interActionDelayMs: number;
  protected readonly sleep: Sleeper;

  constructor(options: ExecutorOptions = {}) {
    this.interActionDelayMs = options.interActionDelayMs ?? 0;
    this.sleep = options.sleep ?? sleep;
  }

  async execute(instructions: readonly Instruction[]): Promise<void> {
    for (let i = 0; i < instructions.length; i++) {
      if (i > 0 && this.interActionDelayMs > 0) {
        await this.sleep(this.interActionDelayMs);
      }
      const instruction = instructions[i];
      try {
        await this.perform(instruction);
      } catch (err) {
        if (err instanceof ExecutionError) throw err;
        const statement = formatStatement(instruction);
        throw new ExecutionError(`Failed to ${statement}: ${errorMessage(err)}`, statement);
      }
    }
  }

  protected abstract perform(instruction: Instruction): Promise<void>;
}
