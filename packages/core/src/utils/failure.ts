// packages/core/src/utils/failure.ts — Failure detail formatting for the audit trail

import { ACTION_SUMMARY_CHARS, MAX_FAILURE_DETAIL_CHARS } from './constants.js';

/** Stack frames after the `Name: message` header the runtime puts at the top. */
function stackFrames(error: Error): string | null {
  if (!error.stack) return null;
  const at = error.message ? error.stack.indexOf(error.message) : -1;
  const frames = at >= 0 ? error.stack.slice(at + error.message.length) : error.stack;
  const trimmed = frames.replace(/^\r?\n/, '');
  return trimmed.trim() ? trimmed : null;
}

/** Message, then the stack frames where the thrown value carries them. */
export function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    const frames = stackFrames(error);
    return frames ? `${error.message}\n\nStack:\n${frames}` : error.message;
  }
  return String(error);
}

/** First line of a failure, for one-line reasons. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function capDetail(detail: string, max = MAX_FAILURE_DETAIL_CHARS): string {
  return detail.length > max ? detail.slice(0, max) : detail;
}

export function summarizeAction(thought: string): string {
  if (!thought) return '—';
  return thought.length > ACTION_SUMMARY_CHARS ? `${thought.slice(0, ACTION_SUMMARY_CHARS)}…` : thought;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}
