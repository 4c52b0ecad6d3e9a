// packages/core/src/models/stub.ts

import type { Decision } from '../types/decision.js';
import { NOOP_INSTRUCTION } from '../types/decision.js';

/**
 * Decision used when the reasoning engine is disabled or gives no usable reply.
 * Keyed only on the step number; instructions come from the translator.
 */
export function stubDecision(stepNumber: number): Decision {
  if (stepNumber <= 1) {
    return {
      thought: 'Open Calculator',
      instruction: NOOP_INSTRUCTION,
      status: 'CONTINUE',
      plannedStepCount: 3,
      checkpoints: [2],
    };
  }
  if (stepNumber === 2) {
    return { thought: 'Type Hello World', instruction: NOOP_INSTRUCTION, status: 'SUCCESS' };
  }
  return { thought: 'Goal achieved', instruction: NOOP_INSTRUCTION, status: 'SUCCESS' };
}
