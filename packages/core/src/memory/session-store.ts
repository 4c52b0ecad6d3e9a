// packages/core/src/memory/session-store.ts

import type Database from 'better-sqlite3';
import type { Session, SessionStatus, TerminalStatus } from '../types/session.js';
import { generateSessionId } from '../utils/id.js';
import { toNumberList, toSessionStatus } from './rows.js';

interface SessionRow {
  id: string;
  goal: string;
  status: string;
  step_budget: number;
  checkpoints: string;
  browser: string | null;
  terminal_reason: string | null;
  created_at: string;
  updated_at: string;
  finished_at: string | null;
}

export class SessionStore {
  constructor(private db: Database.Database) {}

  create(params: { goal: string; stepBudget: number; browser?: string | null }): Session {
    const id = generateSessionId();
    const now = new Date().toISOString();
    const browser = params.browser?.trim() || null;

    this.db
      .prepare(
        `INSERT INTO sessions (id, goal, status, step_budget, checkpoints, browser, created_at, updated_at)
       VALUES (?, ?, 'running', ?, '[]', ?, ?, ?)`,
      )
      .run(id, params.goal, params.stepBudget, browser, now, now);

    return {
      id,
      goal: params.goal,
      status: 'running',
      stepBudget: params.stepBudget,
      checkpoints: [],
      browser,
      terminalReason: null,
      createdAt: now,
      updatedAt: now,
      finishedAt: null,
    };
  }

  get(sessionId: string): Session | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?')
      .get(sessionId);
    return row ? this.rowToSession(row) : null;
  }

  list(filter?: { status?: SessionStatus; limit?: number }): Session[] {
    let sql = 'SELECT * FROM sessions WHERE 1=1';
    const params: (string | number)[] = [];

    if (filter?.status) {
      sql += ' AND status = ?';
      params.push(filter.status);
    }
    sql += ' ORDER BY created_at DESC, rowid DESC';
    if (filter?.limit) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
    }

    const rows = this.db.prepare<(string | number)[], SessionRow>(sql).all(...params);
    return rows.map((r) => this.rowToSession(r));
  }

  /** Applies only while the session is running. Returns false otherwise. */
  revisePlan(sessionId: string, stepBudget: number, checkpoints: readonly number[]): boolean {
    const result = this.db
      .prepare(
        `UPDATE sessions SET step_budget = ?, checkpoints = ?, updated_at = ?
       WHERE id = ? AND status = 'running'`,
      )
      .run(stepBudget, JSON.stringify(checkpoints), new Date().toISOString(), sessionId);
    return result.changes > 0;
  }

  /**
   * Move a running session to a terminal status. A session already in a terminal
   * status is left as it is and false is returned.
   */
  finish(sessionId: string, status: TerminalStatus, reason: string): boolean {
    const now = new Date().toISOString();
    const result = this.db
      .prepare(
        `UPDATE sessions SET status = ?, terminal_reason = ?, finished_at = ?, updated_at = ?
       WHERE id = ? AND status = 'running'`,
      )
      .run(status, reason, now, now, sessionId);
    return result.changes > 0;
  }

  private rowToSession(row: SessionRow): Session {
    return {
      id: row.id,
      goal: row.goal,
      status: toSessionStatus(row.status),
      stepBudget: row.step_budget,
      checkpoints: toNumberList(row.checkpoints),
      browser: row.browser,
      terminalReason: row.terminal_reason,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      finishedAt: row.finished_at,
    };
  }
}
