// packages/core/src/memory/rows.ts — Column decoding shared by the stores

import type { DecisionStatus, InstructionSource, SessionStatus, StepOutcomeKind, VerificationResult } from '../types/session.js';

const SESSION_STATUSES: readonly SessionStatus[] = ['running', 'success', 'stuck', 'lost', 'error'];
const DECISION_STATUSES: readonly DecisionStatus[] = ['CONTINUE', 'SUCCESS', 'LOST'];
const SOURCES: readonly InstructionSource[] = ['reasoning', 'rules', 'reasoning-translate', 'stub', 'none'];

function pick<T extends string>(allowed: readonly T[], value: string, fallback: T): T {
  return allowed.find((v) => v === value) ?? fallback;
}

// CHECK constraints keep these columns in range; the fallbacks cover rows written by hand.
export const toSessionStatus = (value: string): SessionStatus => pick(SESSION_STATUSES, value, 'error');
export const toDecisionStatus = (value: string): DecisionStatus => pick(DECISION_STATUSES, value, 'CONTINUE');
export const toInstructionSource = (value: string): InstructionSource => pick(SOURCES, value, 'none');
export const toOutcome = (value: string): StepOutcomeKind => (value === 'Pass' ? 'Pass' : 'Fail');

export function toVerification(achieved: number | null, reason: string | null): VerificationResult | null {
  if (achieved === null) return null;
  return { achieved: achieved === 1, reason: reason ?? '' };
}

export function fromVerification(result: VerificationResult | null): [number | null, string | null] {
  return result ? [result.achieved ? 1 : 0, result.reason] : [null, null];
}

export function toNumberList(json: string): number[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return [];
  }
  return Array.isArray(parsed) ? parsed.filter((n): n is number => typeof n === 'number') : [];
}
