import { join } from 'node:path';
import type Database from 'better-sqlite3';
import type { Mock } from 'vitest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EventBus } from '../../../src/engine/event-bus.js';
import type { SessionRun, StepOutcome, StepPipelineDeps } from '../../../src/engine/step-pipeline.js';
import { StepPipeline, snapshotPath } from '../../../src/engine/step-pipeline.js';
import { openDatabase } from '../../../src/memory/database.js';
import { SessionStore } from '../../../src/memory/session-store.js';
import { StepStore } from '../../../src/memory/step-store.js';
import { ReasoningClient } from '../../../src/models/reasoning-client.js';
import type { ModelTransport } from '../../../src/models/transport.js';
import { Verifier } from '../../../src/models/verifier.js';
import { ActionTranslator } from '../../../src/translator/translator.js';
import type { EngineEvent } from '../../../src/types/events.js';
import { WorkflowError } from '../../../src/utils/errors.js';
import type { Logger } from '../../../src/utils/logger.js';
import { FakeCapture, RecordingExecutor, ScriptedTransport, isVerifyStepPrompt } from '../../helpers/fakes.js';

const SNAPSHOT_DIR = '/snap';

let db: Database.Database;
let sessions: SessionStore;
let steps: StepStore;

function quietLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

interface Harness {
  pipeline: StepPipeline;
  capture: FakeCapture;
  executor: RecordingExecutor;
  events: EngineEvent[];
  logger: Logger;
  sleep: Mock<(ms: number) => Promise<void>>;
}

function harness(options: {
  reasoning?: ModelTransport | null;
  verifier?: ModelTransport | null;
  capture?: FakeCapture;
  executor?: RecordingExecutor;
  deps?: Partial<StepPipelineDeps>;
} = {}): Harness {
  const capture = options.capture ?? new FakeCapture();
  const executor = options.executor ?? new RecordingExecutor();
  const bus = new EventBus();
  const events: EngineEvent[] = [];
  bus.subscribe((e) => events.push(e));
  const logger = quietLogger();
  const sleep = vi.fn(async (_ms: number) => {});

  const pipeline = new StepPipeline({
    sessions,
    steps,
    capture,
    executor,
    reasoning: new ReasoningClient({ transport: options.reasoning ?? null }),
    verifier: new Verifier({ transport: options.verifier ?? null }),
    translator: new ActionTranslator(),
    snapshotDir: SNAPSHOT_DIR,
    bus,
    logger,
    sleep,
    ...options.deps,
  });
  return { pipeline, capture, executor, events, logger, sleep };
}

function newRun(stepBudget: number): SessionRun {
  return {
    session: sessions.create({ goal: 'Compute 3+3 in Calculator', stepBudget }),
    stepNumber: 1,
    history: [],
    lastSnapshot: null,
    environment: 'Linux 6.1.0; x64; Browser: unknown',
    startedAt: Date.now(),
  };
}

async function runToEnd(pipeline: StepPipeline, run: SessionRun): Promise<StepOutcome[]> {
  const outcomes: StepOutcome[] = [];
  while (run.session.status === 'running') {
    outcomes.push(await pipeline.advance(run));
  }
  return outcomes;
}

function decideReply(fields: Record<string, unknown>): string {
  return JSON.stringify({ thought: 'Press enter', instruction: 'press enter', status: 'CONTINUE', ...fields });
}

beforeEach(() => {
  db = openDatabase(':memory:');
  sessions = new SessionStore(db);
  steps = new StepStore(db);
});

afterEach(() => {
  db.close();
});

describe('StepPipeline', () => {
  describe('with reasoning disabled', () => {
    it('revises the plan on step 1 and keeps running', async () => {
      const h = harness();
      const run = newRun(10);

      const outcome = await h.pipeline.advance(run);

      expect(outcome.status).toBe('running');
      expect(outcome.stepNumber).toBe(1);
      expect(outcome.record?.thought).toBe('Open Calculator');
      expect(outcome.record?.instruction).toBe('hotkey win r; type "calc"; press enter');
      expect(outcome.record?.instructionSource).toBe('rules');
      expect(outcome.record?.outcome).toBe('Pass');
      expect(run.stepNumber).toBe(2);

      const stored = sessions.get(run.session.id);
      expect(stored?.status).toBe('running');
      expect(stored?.stepBudget).toBe(3);
      expect(stored?.checkpoints).toEqual([2]);
      expect(h.events.find((e) => e.type === 'budget.revised')).toMatchObject({
        previous: 10,
        stepBudget: 3,
        checkpoints: [2],
      });
    });

    it('finishes on step 2 and captures the checkpoint', async () => {
      const h = harness();
      const run = newRun(10);

      await runToEnd(h.pipeline, run);

      expect(run.session.status).toBe('success');
      expect(run.session.terminalReason).toBe('Goal reported achieved at step 2.');
      expect(steps.listBySession(run.session.id).map((r) => r.instruction)).toEqual([
        'hotkey win r; type "calc"; press enter',
        'type "Hello World"',
      ]);
      expect(h.capture.paths).toContain(join(SNAPSHOT_DIR, run.session.id, 'step_2_validation.png'));
      expect(h.capture.paths).not.toContain(join(SNAPSHOT_DIR, run.session.id, 'step_1_validation.png'));
      expect(run.lastSnapshot).toBe(join(SNAPSHOT_DIR, run.session.id, 'step_2_after.png'));
    });

    it('uses the macOS launcher when the environment names macOS', async () => {
      const h = harness();
      const run = { ...newRun(10), environment: 'macOS (Darwin 23.1.0); arm64' };
      const outcome = await h.pipeline.advance(run);
      expect(outcome.record?.instruction).toBe('hotkey command space; type "Calculator"; press enter');
    });
  });

  it('ends in error when an action fails, without retrying', async () => {
    const reasoning = new ScriptedTransport(() => decideReply({ planned_step_count: 10 }));
    const h = harness({ reasoning, executor: new RecordingExecutor([3]) });
    const run = newRun(10);

    const outcomes = await runToEnd(h.pipeline, run);

    expect(outcomes.map((o) => o.status)).toEqual(['running', 'running', 'error']);
    expect(h.executor.batches).toHaveLength(3);
    const records = steps.listBySession(run.session.id);
    expect(records.map((r) => r.stepNumber)).toEqual([1, 2, 3]);
    expect(records.map((r) => r.outcome)).toEqual(['Pass', 'Pass', 'Fail']);
    expect(records[2].failureDetail).toMatch(/^window not found/);
    expect(records[2].instructionSource).toBe('reasoning');
    expect(sessions.get(run.session.id)?.terminalReason).toBe('Step 3 failed: window not found. No retry.');
  });

  it('overrides a successful step when verification says it did not work', async () => {
    const verifier = new ScriptedTransport((req) =>
      isVerifyStepPrompt(req) ? '{"achieved": false, "reason": "Calculator is not open"}' : '{}',
    );
    const h = harness({ verifier });
    const run = newRun(10);

    const outcome = await h.pipeline.advance(run);

    expect(outcome.status).toBe('error');
    expect(outcome.record?.outcome).toBe('Fail');
    expect(outcome.record?.failureDetail).toBe('Step verification: Calculator is not open');
    expect(outcome.record?.verification).toEqual({ achieved: false, reason: 'Calculator is not open' });
    expect(run.session.terminalReason).toBe('Step verification failed at step 1: Calculator is not open');
    expect(verifier.requests[0].imagePath).toBe(snapshotPath(SNAPSHOT_DIR, run.session.id, 1, 'after'));
    expect(h.events.some((e) => e.type === 'step.verified')).toBe(true);
  });

  it('ends lost when CONTINUE arrives at the last budgeted step', async () => {
    const reasoning = new ScriptedTransport(() => decideReply({ planned_step_count: 2 }));
    const h = harness({ reasoning });
    const run = newRun(10);

    await runToEnd(h.pipeline, run);

    expect(run.session.status).toBe('lost');
    expect(run.session.stepBudget).toBe(2);
    expect(run.session.terminalReason).toBe('Step budget of 2 exhausted without success.');
    expect(steps.count(run.session.id)).toBe(2);
  });

  it('ends in error without a record when the before-snapshot fails', async () => {
    const h = harness({ capture: new FakeCapture((p) => p.endsWith('step_1_before.png')) });
    const run = newRun(10);

    const outcome = await h.pipeline.advance(run);

    expect(outcome.record).toBeNull();
    expect(outcome.reason).toBe('Snapshot capture failed before step 1: display unavailable');
    expect(h.executor.batches).toHaveLength(0);
    expect(steps.count(run.session.id)).toBe(0);
  });

  it('keeps going with a null after-snapshot when only that capture fails', async () => {
    const h = harness({ capture: new FakeCapture((p) => p.endsWith('_after.png')) });
    const run = newRun(10);

    const outcome = await h.pipeline.advance(run);

    expect(outcome.status).toBe('running');
    expect(outcome.record?.afterSnapshot).toBeNull();
    expect(outcome.record?.verification).toBeNull();
  });

  it('pauses to settle only after an instruction ran', async () => {
    const reasoning = new ScriptedTransport((req) =>
      req.user.startsWith('Step:') ? 'noop' : decideReply({ thought: 'Wait and see', instruction: 'noop', status: 'SUCCESS' }),
    );
    const noop = harness({ reasoning, deps: { settleDelayMs: 400 } });
    const noopOutcome = await noop.pipeline.advance(newRun(10));
    expect(noopOutcome.record?.instructionSource).toBe('none');
    expect(noopOutcome.record?.instruction).toBe('noop');
    expect(noop.sleep).not.toHaveBeenCalled();

    const acting = harness({ deps: { settleDelayMs: 400 } });
    await acting.pipeline.advance(newRun(10));
    expect(acting.sleep).toHaveBeenCalledWith(400);
  });

  it('asks the reasoning engine to translate when no rule matches', async () => {
    const reasoning = new ScriptedTransport((req) =>
      req.user.startsWith('Step:')
        ? '```\nclick 10 20\n```'
        : decideReply({ thought: 'Click the OK button', instruction: 'noop', status: 'SUCCESS' }),
    );
    const h = harness({ reasoning });
    const outcome = await h.pipeline.advance(newRun(10));
    expect(outcome.record?.instruction).toBe('click 10 20');
    expect(outcome.record?.instructionSource).toBe('reasoning-translate');
  });

  it('warns about checkpoints outside the revised budget', async () => {
    const reasoning = new ScriptedTransport(() => decideReply({ planned_step_count: 3, checkpoints: [2, 5] }));
    const h = harness({ reasoning });
    const run = newRun(10);

    await h.pipeline.advance(run);

    expect(run.session.checkpoints).toEqual([2, 5]);
    expect(h.logger.warn).toHaveBeenCalledWith('Checkpoints 5 fall outside steps 1..3 and will never fire');
  });

  it('never revises the budget below the current step or the minimum', async () => {
    const reasoning = new ScriptedTransport(() => decideReply({ planned_step_count: 1 }));
    const h = harness({ reasoning });
    const run = newRun(10);
    await h.pipeline.advance(run);
    expect(run.session.stepBudget).toBe(2);
  });

  it('refuses to advance a finished session', async () => {
    const h = harness();
    const run = newRun(10);
    h.pipeline.cancel(run, 'interrupted');
    expect(run.session.terminalReason).toBe('Run cancelled before step 1: interrupted');
    await expect(h.pipeline.advance(run)).rejects.toThrow(WorkflowError);
  });

  it('records a non-Error thrown by the executor', async () => {
    const h = harness();
    const run = newRun(10);
    vi.spyOn(h.executor, 'execute').mockImplementation(async () => {
      throw 'disk full';
    });

    const outcome = await h.pipeline.advance(run);

    expect(outcome.status).toBe('error');
    expect(outcome.record?.failureDetail).toBe('disk full');
    expect(outcome.reason).toBe('Step 1 failed: disk full. No retry.');
  });

  it('refreshes the environment summary before each step', async () => {
    const describeEnvironment = vi.fn(async () => 'macOS (Darwin 23.1.0); arm64; Browser: unknown');
    const h = harness({ deps: { describeEnvironment } });
    const run = newRun(10);

    const outcome = await h.pipeline.advance(run);

    expect(describeEnvironment).toHaveBeenCalledTimes(1);
    expect(run.environment).toBe('macOS (Darwin 23.1.0); arm64; Browser: unknown');
    expect(outcome.record?.instruction).toBe('hotkey command space; type "Calculator"; press enter');
  });

  it('emits step events in order', async () => {
    const h = harness();
    await h.pipeline.advance(newRun(10));
    expect(h.events.map((e) => e.type)).toEqual(['step.started', 'budget.revised', 'step.decided', 'step.completed']);
  });
});
