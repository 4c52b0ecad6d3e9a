import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase } from '../../../src/memory/database.js';
import { SessionStore } from '../../../src/memory/session-store.js';
import type { NewStepRecord } from '../../../src/memory/step-store.js';
import { StepStore } from '../../../src/memory/step-store.js';
import { DatabaseError } from '../../../src/utils/errors.js';

let db: Database.Database;
let steps: StepStore;
let sessionId: string;

function record(overrides: Partial<NewStepRecord>): NewStepRecord {
  return {
    sessionId,
    stepNumber: 1,
    thought: 'Open Calculator',
    instruction: 'hotkey win r; type "calc"; press enter',
    instructionSource: 'rules',
    actionSummary: 'Open Calculator',
    decisionStatus: 'CONTINUE',
    outcome: 'Pass',
    failureDetail: null,
    beforeSnapshot: '/snap/step_1_before.png',
    afterSnapshot: '/snap/step_1_after.png',
    verification: null,
    ...overrides,
  };
}

beforeEach(() => {
  db = openDatabase(':memory:');
  steps = new StepStore(db);
  sessionId = new SessionStore(db).create({ goal: 'g', stepBudget: 10 }).id;
});

afterEach(() => {
  db.close();
});

describe('StepStore', () => {
  it('appends and lists records in step order', () => {
    steps.append(record({ stepNumber: 2, verification: { achieved: true, reason: 'ok' } }));
    steps.append(record({ stepNumber: 1 }));

    const listed = steps.listBySession(sessionId);
    expect(listed.map((r) => r.stepNumber)).toEqual([1, 2]);
    expect(listed[0].verification).toBeNull();
    expect(listed[1].verification).toEqual({ achieved: true, reason: 'ok' });
    expect(listed[1].instructionSource).toBe('rules');
    expect(steps.count(sessionId)).toBe(2);
  });

  it('rejects a second record for the same step', () => {
    steps.append(record({}));
    expect(() => steps.append(record({ thought: 'again' }))).toThrow(DatabaseError);
  });

  it('has no update path at the database level', () => {
    steps.append(record({}));
    expect(() => db.prepare("UPDATE step_records SET outcome = 'Fail'").run()).toThrow(
      'step records are append-only',
    );
  });

  it('lists failures by outcome or by an error mention in the detail', () => {
    steps.append(record({ stepNumber: 1, outcome: 'Fail', failureDetail: 'window not found' }));
    steps.append(record({ stepNumber: 2, failureDetail: 'Recovered from ERROR dialog' }));
    steps.append(record({ stepNumber: 3 }));
    expect(steps.listFailures(sessionId).map((r) => r.stepNumber)).toEqual([1, 2]);
  });

  it('groups instructions for rule ingestion', () => {
    const other = new SessionStore(db).create({ goal: 'h', stepBudget: 10 }).id;
    steps.append(record({ stepNumber: 1 }));
    steps.append(record({ stepNumber: 1, sessionId: other }));
    steps.append(record({ stepNumber: 2, thought: 'Type 42', instruction: 'type "42"', outcome: 'Fail' }));

    expect(steps.listInstructionGroups()).toEqual([
      { thought: 'Open Calculator', instruction: 'hotkey win r; type "calc"; press enter', outcome: 'Pass', count: 2 },
      { thought: 'Type 42', instruction: 'type "42"', outcome: 'Fail', count: 1 },
    ]);
  });
});
