import { describe, expect, it } from 'vitest';
import { formatEvent } from '../src/render.js';

const timestamp = '2026-01-01T00:00:00.000Z';

describe('formatEvent', () => {
  it('formats the session header', () => {
    expect(
      formatEvent({ type: 'session.started', sessionId: 'ses_1', goal: 'Open Calculator', stepBudget: 10, timestamp }),
    ).toBe('━━━ Session ses_1 ━━━\nGoal: Open Calculator\nStep budget: 10');
  });

  it('formats a plan revision with checkpoints', () => {
    expect(
      formatEvent({ type: 'budget.revised', sessionId: 'ses_1', previous: 10, stepBudget: 3, checkpoints: [2], timestamp }),
    ).toBe('  Plan: 3 steps (was 10), checkpoints at 2');
  });

  it('formats a decided step', () => {
    expect(
      formatEvent({
        type: 'step.decided',
        sessionId: 'ses_1',
        stepNumber: 1,
        thought: 'Open Calculator',
        instruction: 'hotkey win r; type "calc"; press enter',
        source: 'rules',
        status: 'CONTINUE',
        timestamp,
      }),
    ).toBe('  Open Calculator\n    → hotkey win r; type "calc"; press enter [rules, CONTINUE]');
  });

  it('formats passed and failed steps', () => {
    expect(
      formatEvent({
        type: 'step.completed',
        sessionId: 'ses_1',
        stepNumber: 2,
        outcome: 'Pass',
        failureDetail: null,
        durationMs: 1200,
        timestamp,
      }),
    ).toBe('  ✓ Step 2 (1.2s)');
    expect(
      formatEvent({
        type: 'step.completed',
        sessionId: 'ses_1',
        stepNumber: 3,
        outcome: 'Fail',
        failureDetail: 'window not found\n\nStack:\n    at perform (xdotool.ts:40:11)',
        durationMs: 10,
        timestamp,
      }),
    ).toBe('  ✗ Step 3: window not found');
  });

  it('formats the session end', () => {
    expect(
      formatEvent({
        type: 'session.finished',
        sessionId: 'ses_1',
        status: 'lost',
        reason: 'Step budget of 2 exhausted without success.',
        steps: 2,
        durationMs: 4000,
        timestamp,
      }),
    ).toBe('━━━ lost after 2 step(s), 4.0s ━━━\n  Step budget of 2 exhausted without success.');
  });

  it('prints nothing for the post-mortem event', () => {
    expect(
      formatEvent({ type: 'postmortem.created', sessionId: 'ses_1', optimizedPrompt: 'p', validation: null, timestamp }),
    ).toBeNull();
  });
});
