import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase } from '../../../src/memory/database.js';
import { SessionStore } from '../../../src/memory/session-store.js';

let db: Database.Database;
let store: SessionStore;

beforeEach(() => {
  db = openDatabase(':memory:');
  store = new SessionStore(db);
});

afterEach(() => {
  db.close();
});

describe('SessionStore', () => {
  it('creates a running session with generated ID', () => {
    const session = store.create({ goal: 'Compute 3+3', stepBudget: 10, browser: ' firefox ' });
    expect(session.id).toMatch(/^ses_[0-9a-z]{20}$/);
    expect(session.status).toBe('running');
    expect(session.browser).toBe('firefox');
    expect(session.checkpoints).toEqual([]);
    expect(store.get(session.id)).toEqual(session);
  });

  it('returns null for non-existent session', () => {
    expect(store.get('nonexistent')).toBeNull();
  });

  it('lists newest first and filters by status', () => {
    const first = store.create({ goal: 'one', stepBudget: 3 });
    const second = store.create({ goal: 'two', stepBudget: 3 });
    store.finish(first.id, 'success', 'Goal reported achieved at step 1.');

    expect(store.list().map((s) => s.id)).toEqual([second.id, first.id]);
    expect(store.list({ status: 'success' }).map((s) => s.id)).toEqual([first.id]);
    expect(store.list({ limit: 1 })).toHaveLength(1);
  });

  it('revises budget and checkpoints while running', () => {
    const session = store.create({ goal: 'g', stepBudget: 10 });
    expect(store.revisePlan(session.id, 3, [2])).toBe(true);
    expect(store.get(session.id)?.stepBudget).toBe(3);
    expect(store.get(session.id)?.checkpoints).toEqual([2]);
  });

  it('sets a terminal status once and keeps it', () => {
    const session = store.create({ goal: 'g', stepBudget: 10 });
    expect(store.finish(session.id, 'error', 'Step 3 failed: boom. No retry.')).toBe(true);
    expect(store.finish(session.id, 'success', 'Goal reported achieved at step 4.')).toBe(false);
    expect(store.revisePlan(session.id, 5, [])).toBe(false);

    const stored = store.get(session.id);
    expect(stored?.status).toBe('error');
    expect(stored?.terminalReason).toBe('Step 3 failed: boom. No retry.');
    expect(stored?.finishedAt).not.toBeNull();
    expect(stored?.stepBudget).toBe(10);
  });
});
