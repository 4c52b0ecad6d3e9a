// packages/core/src/engine/post-mortem.ts — Lessons-learned prompt from a finished session

import type { PostMortemStore } from '../memory/post-mortem-store.js';
import type { SessionStore } from '../memory/session-store.js';
import type { StepStore } from '../memory/step-store.js';
import type { Verifier } from '../models/verifier.js';
import type { PostMortem, StepRecord, VerificationResult } from '../types/session.js';
import { WorkflowError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const NO_ERRORS_NOTE = 'No errors encountered.';

export function lessonLine(record: StepRecord): string {
  const detail = record.failureDetail?.split('\n')[0].trim() || 'no detail recorded';
  return `- Avoided: ${record.instruction} because ${detail}`;
}

export function buildOptimizedPrompt(goal: string, failures: readonly StepRecord[]): string {
  const notes = failures.length > 0 ? failures.map(lessonLine).join('\n') : NO_ERRORS_NOTE;
  return `OPTIMIZED PROMPT FOR '${goal}':\nLessons learned:\n${notes}\nOriginal Goal: ${goal}`;
}

export interface PostMortemSynthesizerDeps {
  sessions: SessionStore;
  steps: StepStore;
  postMortems: PostMortemStore;
  verifier: Verifier;
  logger?: Logger;
}

/**
 * One post-mortem per session. The goal verifier runs at most once per session id:
 * only for `success` sessions with a final snapshot. A verdict is held in memory
 * only until its post-mortem row is saved.
 */
export class PostMortemSynthesizer {
  private readonly deps: PostMortemSynthesizerDeps;
  private readonly goalVerdicts = new Map<string, VerificationResult | null>();

  constructor(deps: PostMortemSynthesizerDeps) {
    this.deps = deps;
  }

  /** Goal verdicts held for sessions whose post-mortem is not saved yet. */
  get pendingVerdicts(): number {
    return this.goalVerdicts.size;
  }

  async synthesize(sessionId: string, finalSnapshot?: string | null, environment = ''): Promise<PostMortem> {
    const existing = this.deps.postMortems.get(sessionId);
    if (existing) return existing;

    const session = this.deps.sessions.get(sessionId);
    if (!session) {
      throw new WorkflowError(`Session not found: ${sessionId}`, sessionId);
    }
    if (session.status === 'running') {
      throw new WorkflowError(`Session ${sessionId} is still running`, sessionId);
    }

    const failures = this.deps.steps.listFailures(sessionId);
    let validation: VerificationResult | null = null;
    if (session.status === 'success' && finalSnapshot) {
      validation = await this.verifyGoalOnce(sessionId, session.goal, finalSnapshot, environment);
    }

    const postMortem = this.deps.postMortems.save({
      sessionId,
      originalGoal: session.goal,
      optimizedPrompt: buildOptimizedPrompt(session.goal, failures),
      summary: session.terminalReason,
      validation,
      createdAt: new Date().toISOString(),
    });
    // the stored row answers later calls
    this.goalVerdicts.delete(sessionId);
    this.deps.logger?.debug(`Post-mortem stored for ${sessionId} (${failures.length} failure note(s))`);
    return postMortem;
  }

  private async verifyGoalOnce(
    sessionId: string,
    goal: string,
    finalSnapshot: string,
    environment: string,
  ): Promise<VerificationResult | null> {
    if (this.goalVerdicts.has(sessionId)) {
      return this.goalVerdicts.get(sessionId) ?? null;
    }
    const result = await this.deps.verifier.verifyGoal(goal, finalSnapshot, environment);
    this.goalVerdicts.set(sessionId, result);
    return result;
  }
}
