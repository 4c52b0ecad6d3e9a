// packages/core/src/memory/step-store.ts — Append-only step records

import type Database from 'better-sqlite3';
import type { IngestCandidate } from '../types/rules.js';
import type { StepRecord } from '../types/session.js';
import { DatabaseError } from '../utils/errors.js';
import { errorMessage } from '../utils/failure.js';
import {
  fromVerification,
  toDecisionStatus,
  toInstructionSource,
  toOutcome,
  toVerification,
} from './rows.js';

interface StepRow {
  id: number;
  session_id: string;
  step_number: number;
  thought: string;
  instruction: string;
  instruction_source: string;
  action_summary: string;
  decision_status: string;
  outcome: string;
  failure_detail: string | null;
  before_snapshot: string | null;
  after_snapshot: string | null;
  verification_achieved: number | null;
  verification_reason: string | null;
  created_at: string;
}

interface GroupRow {
  thought: string;
  instruction: string;
  outcome: string;
  n: number;
}

export type NewStepRecord = Omit<StepRecord, 'id' | 'createdAt'> & { createdAt?: string };

export class StepStore {
  constructor(private db: Database.Database) {}

  /** Insert a record. A second record for the same (session, step) is rejected. */
  append(record: NewStepRecord): StepRecord {
    const createdAt = record.createdAt ?? new Date().toISOString();
    const [achieved, reason] = fromVerification(record.verification);
    try {
      const result = this.db
        .prepare(
          `INSERT INTO step_records (session_id, step_number, thought, instruction, instruction_source,
           action_summary, decision_status, outcome, failure_detail, before_snapshot, after_snapshot,
           verification_achieved, verification_reason, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          record.sessionId,
          record.stepNumber,
          record.thought,
          record.instruction,
          record.instructionSource,
          record.actionSummary,
          record.decisionStatus,
          record.outcome,
          record.failureDetail,
          record.beforeSnapshot,
          record.afterSnapshot,
          achieved,
          reason,
          createdAt,
        );
      return { ...record, id: Number(result.lastInsertRowid), createdAt };
    } catch (err) {
      throw new DatabaseError(
        `Failed to record step ${record.stepNumber} of ${record.sessionId}: ${errorMessage(err)}`,
        'append-step',
      );
    }
  }

  listBySession(sessionId: string): StepRecord[] {
    const rows = this.db
      .prepare<[string], StepRow>('SELECT * FROM step_records WHERE session_id = ? ORDER BY step_number ASC')
      .all(sessionId);
    return rows.map((r) => this.rowToRecord(r));
  }

  count(sessionId: string): number {
    const row = this.db
      .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM step_records WHERE session_id = ?')
      .get(sessionId);
    return row?.n ?? 0;
  }

  /** Records with outcome Fail, or whose failure detail mentions "error" in any case. */
  listFailures(sessionId: string): StepRecord[] {
    const rows = this.db
      .prepare<[string], StepRow>(
        `SELECT * FROM step_records
       WHERE session_id = ? AND (outcome = 'Fail' OR LOWER(COALESCE(failure_detail, '')) LIKE '%error%')
       ORDER BY step_number ASC`,
      )
      .all(sessionId);
    return rows.map((r) => this.rowToRecord(r));
  }

  /** (thought, instruction, outcome) groups across all sessions, most frequent first. */
  listInstructionGroups(): IngestCandidate[] {
    const rows = this.db
      .prepare<[], GroupRow>(
        `SELECT thought, instruction, outcome, COUNT(*) AS n
       FROM step_records
       WHERE TRIM(instruction) != ''
       GROUP BY thought, instruction, outcome
       ORDER BY n DESC, thought ASC`,
      )
      .all();
    return rows.map((r) => ({
      thought: r.thought,
      instruction: r.instruction,
      outcome: r.outcome,
      count: r.n,
    }));
  }

  private rowToRecord(row: StepRow): StepRecord {
    return {
      id: row.id,
      sessionId: row.session_id,
      stepNumber: row.step_number,
      thought: row.thought,
      instruction: row.instruction,
      instructionSource: toInstructionSource(row.instruction_source),
      actionSummary: row.action_summary,
      decisionStatus: toDecisionStatus(row.decision_status),
      outcome: toOutcome(row.outcome),
      failureDetail: row.failure_detail,
      beforeSnapshot: row.before_snapshot,
      afterSnapshot: row.after_snapshot,
      verification: toVerification(row.verification_achieved, row.verification_reason),
      createdAt: row.created_at,
    };
  }
}
