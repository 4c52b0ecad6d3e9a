// packages/core/src/executor/factory.ts

import type { ExecutorConfig } from '../types/config.js';
import type { Logger } from '../utils/logger.js';
import { DryRunExecutor } from './dry-run.js';
import type { ActionExecutor } from './executor.js';
import { XdotoolExecutor } from './xdotool.js';

export function createExecutor(config: ExecutorConfig, logger?: Logger): ActionExecutor {
  const options = { interActionDelayMs: config.interActionDelayMs };
  switch (config.kind) {
    case 'xdotool':
      return new XdotoolExecutor(options, logger?.child('xdotool'));
    case 'dry-run':
      return new DryRunExecutor(options, logger?.child('dry-run'));
  }
}
