// packages/core/src/memory/post-mortem-store.ts

import type Database from 'better-sqlite3';
import type { PostMortem } from '../types/session.js';
import { fromVerification, toVerification } from './rows.js';

interface PostMortemRow {
  session_id: string;
  original_goal: string;
  optimized_prompt: string;
  summary: string | null;
  validation_achieved: number | null;
  validation_reason: string | null;
  created_at: string;
}

export class PostMortemStore {
  constructor(private db: Database.Database) {}

  get(sessionId: string): PostMortem | null {
    const row = this.db
      .prepare<[string], PostMortemRow>('SELECT * FROM post_mortems WHERE session_id = ?')
      .get(sessionId);
    return row ? this.rowToPostMortem(row) : null;
  }

  /** Write-once: when one already exists for the session, the stored one is returned unchanged. */
  save(postMortem: PostMortem): PostMortem {
    const [achieved, reason] = fromVerification(postMortem.validation);
    this.db
      .prepare(
        `INSERT INTO post_mortems (session_id, original_goal, optimized_prompt, summary,
         validation_achieved, validation_reason, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(session_id) DO NOTHING`,
      )
      .run(
        postMortem.sessionId,
        postMortem.originalGoal,
        postMortem.optimizedPrompt,
        postMortem.summary,
        achieved,
        reason,
        postMortem.createdAt,
      );
    return this.get(postMortem.sessionId) ?? postMortem;
  }

  private rowToPostMortem(row: PostMortemRow): PostMortem {
    return {
      sessionId: row.session_id,
      originalGoal: row.original_goal,
      optimizedPrompt: row.optimized_prompt,
      summary: row.summary,
      validation: toVerification(row.validation_achieved, row.validation_reason),
      createdAt: row.created_at,
    };
  }
}
