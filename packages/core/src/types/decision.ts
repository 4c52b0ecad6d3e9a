// packages/core/src/types/decision.ts

import type { DecisionStatus, StepRecord } from './session.js';

export const NOOP_INSTRUCTION = 'noop';

export interface Decision {
  thought: string;
  instruction: string;
  status: DecisionStatus;
  /** First step only. */
  plannedStepCount?: number;
  /** First step only. */
  checkpoints?: number[];
  raw?: string;
}

export interface DecideRequest {
  goal: string;
  history: readonly StepRecord[];
  isFirstStep: boolean;
  environment: string;
  snapshotPath?: string | null;
}
