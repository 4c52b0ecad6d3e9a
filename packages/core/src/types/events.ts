// packages/core/src/types/events.ts

/**
 * Engine events emitted by the step pipeline and orchestrator.
 * Consumed by the CLI renderer. Type names are dot-separated.
 */

import type { InstructionSource, SessionStatus, StepOutcomeKind, DecisionStatus, VerificationResult } from './session.js';

// -- Lifecycle events --
export interface SessionStartedEvent {
  type: 'session.started';
  sessionId: string;
  goal: string;
  stepBudget: number;
  timestamp: string;
}

export interface SessionFinishedEvent {
  type: 'session.finished';
  sessionId: string;
  status: SessionStatus;
  reason: string;
  steps: number;
  durationMs: number;
  timestamp: string;
}

export interface BudgetRevisedEvent {
  type: 'budget.revised';
  sessionId: string;
  previous: number;
  stepBudget: number;
  checkpoints: number[];
  timestamp: string;
}

// -- Step events --
export interface StepStartedEvent {
  type: 'step.started';
  sessionId: string;
  stepNumber: number;
  stepBudget: number;
  timestamp: string;
}

export interface StepDecidedEvent {
  type: 'step.decided';
  sessionId: string;
  stepNumber: number;
  thought: string;
  instruction: string;
  source: InstructionSource;
  status: DecisionStatus;
  timestamp: string;
}

export interface StepVerifiedEvent {
  type: 'step.verified';
  sessionId: string;
  stepNumber: number;
  verification: VerificationResult;
  timestamp: string;
}

export interface StepCompletedEvent {
  type: 'step.completed';
  sessionId: string;
  stepNumber: number;
  outcome: StepOutcomeKind;
  failureDetail: string | null;
  durationMs: number;
  timestamp: string;
}

export interface CheckpointCapturedEvent {
  type: 'checkpoint.captured';
  sessionId: string;
  stepNumber: number;
  path: string;
  timestamp: string;
}

export interface PostMortemCreatedEvent {
  type: 'postmortem.created';
  sessionId: string;
  optimizedPrompt: string;
  validation: VerificationResult | null;
  timestamp: string;
}

// -- Union type --
export type EngineEvent =
  | SessionStartedEvent
  | SessionFinishedEvent
  | BudgetRevisedEvent
  | StepStartedEvent
  | StepDecidedEvent
  | StepVerifiedEvent
  | StepCompletedEvent
  | CheckpointCapturedEvent
  | PostMortemCreatedEvent;
