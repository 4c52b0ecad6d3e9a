// packages/core/src/config/defaults.ts

import type { ProjectConfig } from '../types/config.js';
import {
  DEFAULT_CAPTURE_TIMEOUT_SEC,
  DEFAULT_INTER_ACTION_DELAY_MS,
  DEFAULT_REASONING_TIMEOUT_SEC,
  DEFAULT_SETTLE_DELAY_MS,
  DEFAULT_STEP_BUDGET,
  DEFAULT_VERIFICATION_TIMEOUT_SEC,
  MAX_STEP_BUDGET,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: ProjectConfig = {
  session: {
    defaultStepBudget: DEFAULT_STEP_BUDGET,
    maxStepBudget: MAX_STEP_BUDGET,
    snapshotDir: '.taskpilot/snapshots',
    browser: '',
  },
  reasoning: {
    enabled: false,
    command: '',
    args: [],
    model: '',
    timeout: DEFAULT_REASONING_TIMEOUT_SEC,
    historyLimit: 20,
  },
  verification: {
    enabled: true,
    timeout: DEFAULT_VERIFICATION_TIMEOUT_SEC,
  },
  translator: {
    rulesFile: '.taskpilot/rules.json',
    builtins: true,
  },
  capture: {
    command: 'import',
    args: ['-window', 'root', '{path}'],
    timeout: DEFAULT_CAPTURE_TIMEOUT_SEC,
  },
  executor: {
    kind: 'dry-run',
    interActionDelayMs: DEFAULT_INTER_ACTION_DELAY_MS,
    settleDelayMs: DEFAULT_SETTLE_DELAY_MS,
  },
  display: {},
  advanced: {
    logLevel: 'info',
  },
};
