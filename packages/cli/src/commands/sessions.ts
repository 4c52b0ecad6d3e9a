// packages/cli/src/commands/sessions.ts — Inspect stored sessions

import type { PostMortem, Session, SessionStatus, StepRecord } from '@taskpilot/core';
import { PostMortemStore, SessionStore, StepStore, TERMINAL_STATUSES } from '@taskpilot/core';
import chalk from 'chalk';

import type { CliDatabase } from '../utils.js';
import { withDatabase } from '../utils.js';

const STATUSES: readonly SessionStatus[] = ['running', ...TERMINAL_STATUSES];

function toStatus(value: string | undefined): SessionStatus | undefined {
  return STATUSES.find((s) => s === value);
}

export function sessionRow(session: Session) {
  return {
    sessionId: session.id,
    goal: session.goal,
    status: session.status,
    stepBudget: session.stepBudget,
    reason: session.terminalReason,
    createdAt: session.createdAt,
    finishedAt: session.finishedAt,
  };
}

function stepRow(record: StepRecord) {
  return {
    step: record.stepNumber,
    thought: record.thought,
    instruction: record.instruction,
    source: record.instructionSource,
    decision: record.decisionStatus,
    outcome: record.outcome,
    failureDetail: record.failureDetail?.split('\n')[0] ?? null,
    verification: record.verification,
    beforeSnapshot: record.beforeSnapshot,
    afterSnapshot: record.afterSnapshot,
  };
}

export interface SessionDetail {
  session: ReturnType<typeof sessionRow> & { checkpoints: number[]; browser: string | null };
  steps: ReturnType<typeof stepRow>[];
  postMortem: PostMortem | null;
}

export function describeSession(db: CliDatabase, sessionId: string): SessionDetail | null {
  const session = new SessionStore(db).get(sessionId);
  if (!session) return null;
  return {
    session: { ...sessionRow(session), checkpoints: session.checkpoints, browser: session.browser },
    steps: new StepStore(db).listBySession(sessionId).map(stepRow),
    postMortem: new PostMortemStore(db).get(sessionId),
  };
}

interface ListOptions {
  status?: string;
  limit?: number;
}

export async function sessionsListCommand(options: ListOptions): Promise<void> {
  const status = toStatus(options.status);
  if (options.status && !status) {
    console.error(chalk.red(`Unknown status: ${options.status}. Valid: ${STATUSES.join(', ')}`));
    process.exitCode = 1;
    return;
  }
  await withDatabase(async (db) => {
    const sessions = new SessionStore(db).list({ status, limit: options.limit ?? 20 });
    console.log(JSON.stringify(sessions.map(sessionRow), null, 2));
  });
}

export async function sessionsShowCommand(sessionId: string): Promise<void> {
  await withDatabase(async (db) => {
    const detail = describeSession(db, sessionId);
    if (!detail) {
      console.error(chalk.red(`No session found with ID: ${sessionId}`));
      process.exitCode = 1;
      return;
    }
    console.log(JSON.stringify(detail, null, 2));
  });
}
