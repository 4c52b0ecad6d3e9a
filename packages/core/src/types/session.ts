// packages/core/src/types/session.ts

export type SessionStatus = 'running' | 'success' | 'stuck' | 'lost' | 'error';

export type TerminalStatus = Exclude<SessionStatus, 'running'>;

export const TERMINAL_STATUSES: readonly TerminalStatus[] = ['success', 'stuck', 'lost', 'error'];

export type DecisionStatus = 'CONTINUE' | 'SUCCESS' | 'LOST';

export type StepOutcomeKind = 'Pass' | 'Fail';

/** Where the executed instruction came from. */
export type InstructionSource = 'reasoning' | 'rules' | 'reasoning-translate' | 'stub' | 'none';

export interface Session {
  id: string;
  goal: string;
  status: SessionStatus;
  stepBudget: number;
  checkpoints: number[];
  browser: string | null;
  terminalReason: string | null;
  createdAt: string;
  updatedAt: string;
  finishedAt: string | null;
}

export interface VerificationResult {
  achieved: boolean;
  reason: string;
}

export interface StepRecord {
  id?: number;
  sessionId: string;
  stepNumber: number;
  thought: string;
  instruction: string;
  instructionSource: InstructionSource;
  actionSummary: string;
  decisionStatus: DecisionStatus;
  outcome: StepOutcomeKind;
  failureDetail: string | null;
  beforeSnapshot: string | null;
  afterSnapshot: string | null;
  /** null when the verifier was unavailable or skipped. */
  verification: VerificationResult | null;
  createdAt: string;
}

export interface PostMortem {
  sessionId: string;
  originalGoal: string;
  optimizedPrompt: string;
  summary: string | null;
  validation: VerificationResult | null;
  createdAt: string;
}
