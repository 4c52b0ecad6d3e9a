// packages/core/src/executor/dry-run.ts

import { formatStatement } from '../instructions/formatter.js';
import type { Instruction } from '../types/instruction.js';
import type { Logger } from '../utils/logger.js';
import type { ExecutorOptions } from './executor.js';
import { SequencedExecutor } from './executor.js';

/** Logs each statement instead of performing it. */
export class DryRunExecutor extends SequencedExecutor {
  readonly name = 'dry-run';
  readonly performed: string[] = [];

  constructor(
    options: ExecutorOptions = {},
    private readonly logger?: Logger,
  ) {
    super(options);
  }

  protected async perform(instruction: Instruction): Promise<void> {
    const statement = formatStatement(instruction);
    this.performed.push(statement);
    this.logger?.info(`[dry-run] ${statement}`);
  }
}
