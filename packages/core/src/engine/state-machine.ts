// packages/core/src/engine/state-machine.ts — Session transitions after each step

import type { DecisionStatus, TerminalStatus } from '../types/session.js';

export type FaultKind = 'capture' | 'execution' | 'verification' | 'unexpected' | 'cancelled';

export interface StepFault {
  kind: FaultKind;
  message: string;
}

export type Transition =
  | { status: 'running'; nextStep: number }
  | { status: TerminalStatus; reason: string };

export interface TransitionInput {
  stepNumber: number;
  stepBudget: number;
  decisionStatus?: DecisionStatus;
  fault?: StepFault;
}

function sentence(text: string): string {
  const line = text.split('\n')[0].trim();
  return /[.!?]$/.test(line) ? line : `${line}.`;
}

function faultReason(fault: StepFault, stepNumber: number): string {
  switch (fault.kind) {
    case 'capture':
      return `Snapshot capture failed before step ${stepNumber}: ${fault.message.split('\n')[0]}`;
    case 'execution':
      return `Step ${stepNumber} failed: ${sentence(fault.message)} No retry.`;
    case 'verification':
      return `Step verification failed at step ${stepNumber}: ${fault.message}`;
    case 'cancelled':
      return fault.message
        ? `Run cancelled before step ${stepNumber}: ${fault.message}`
        : `Run cancelled before step ${stepNumber}`;
    case 'unexpected':
      return `Step ${stepNumber} failed: ${fault.message.split('\n')[0]}`;
  }
}

/**
 * Pure transition function. A fault always ends the session in `error`; otherwise the
 * decision status decides, and CONTINUE past the budget ends it `lost`.
 */
export function nextState(input: TransitionInput): Transition {
  const { stepNumber, stepBudget } = input;

  if (input.fault) {
    return { status: 'error', reason: faultReason(input.fault, stepNumber) };
  }

  switch (input.decisionStatus) {
    case 'SUCCESS':
      return { status: 'success', reason: `Goal reported achieved at step ${stepNumber}.` };
    case 'LOST':
      return { status: 'stuck', reason: `Reasoning engine reported it is lost at step ${stepNumber}.` };
    default:
      if (stepNumber + 1 > stepBudget) {
        return { status: 'lost', reason: `Step budget of ${stepBudget} exhausted without success.` };
      }
      return { status: 'running', nextStep: stepNumber + 1 };
  }
}

export function isTerminal(transition: Transition): transition is { status: TerminalStatus; reason: string } {
  return transition.status !== 'running';
}
