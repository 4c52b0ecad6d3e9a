import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { CancellationToken } from '../../../src/engine/cancellation.js';
import type { OrchestratorOptions } from '../../../src/engine/orchestrator.js';
import { Orchestrator } from '../../../src/engine/orchestrator.js';
import { openDatabase } from '../../../src/memory/database.js';
import { ReasoningClient } from '../../../src/models/reasoning-client.js';
import type { ModelTransport } from '../../../src/models/transport.js';
import { Verifier } from '../../../src/models/verifier.js';
import { ActionTranslator } from '../../../src/translator/translator.js';
import type { ProjectConfig } from '../../../src/types/config.js';
import type { EngineEvent } from '../../../src/types/events.js';
import { WorkflowError } from '../../../src/utils/errors.js';
import { FakeCapture, RecordingExecutor, ScriptedTransport, isVerifyGoalPrompt } from '../../helpers/fakes.js';

let db: Database.Database;

const config: ProjectConfig = {
  ...DEFAULT_CONFIG,
  session: { ...DEFAULT_CONFIG.session, snapshotDir: '/snap', maxStepBudget: 20 },
};

function orchestrator(overrides: Partial<OrchestratorOptions> & { verifierTransport?: ModelTransport } = {}) {
  const { verifierTransport, ...rest } = overrides;
  return new Orchestrator({
    db,
    config,
    capture: new FakeCapture(),
    executor: new RecordingExecutor(),
    reasoning: new ReasoningClient({ transport: null }),
    verifier: new Verifier({ transport: verifierTransport ?? null }),
    translator: new ActionTranslator(),
    environment: { host: { platform: 'linux', release: '6.1.0', arch: 'x64' } },
    sleep: async () => {},
    ...rest,
  });
}

beforeEach(() => {
  db = openDatabase(':memory:');
});

afterEach(() => {
  db.close();
});

describe('Orchestrator', () => {
  it('runs a session to success and writes its post-mortem', async () => {
    const orch = orchestrator();
    const events: EngineEvent[] = [];
    orch.on('event', (e) => events.push(e));

    const result = await orch.run('Open Calculator and type Hello World', { browser: 'firefox' });

    expect(result.session.status).toBe('success');
    expect(result.steps.map((s) => s.stepNumber)).toEqual([1, 2]);
    expect(result.postMortem.optimizedPrompt).toContain('No errors encountered.');
    expect(result.postMortem.summary).toBe('Goal reported achieved at step 2.');
    expect(orch.activeRun).toBeNull();

    const types = events.map((e) => e.type);
    expect(types[0]).toBe('session.started');
    expect(types.slice(-2)).toEqual(['session.finished', 'postmortem.created']);
    expect(types.filter((t) => t === 'postmortem.created')).toHaveLength(1);
  });

  it('describes the environment with the session browser', async () => {
    const orch = orchestrator();
    const run = await orch.start('Open Calculator', { browser: 'firefox' });
    expect(run.environment).toBe('Linux 6.1.0; x64; Browser: firefox');
    await orch.cancel();
  });

  it('allows one active session at a time', async () => {
    const orch = orchestrator();
    const first = orch.start('Open Calculator');
    await expect(orch.start('Something else')).rejects.toThrow(WorkflowError);
    await first;
    await orch.cancel();
    await expect(orch.start('Something else')).resolves.toBeDefined();
  });

  it('validates the goal and the step budget', async () => {
    const orch = orchestrator();
    await expect(orch.start('   ')).rejects.toThrow('Goal must not be empty');
    await expect(orch.start('g', { stepBudget: 0 })).rejects.toThrow('between 1 and 20');
    await expect(orch.start('g', { stepBudget: 21 })).rejects.toThrow('between 1 and 20');
    expect(orch.sessions.list()).toHaveLength(0);
  });

  it('verifies the goal once against the last after-snapshot', async () => {
    const transport = new ScriptedTransport((req) =>
      isVerifyGoalPrompt(req) ? '{"achieved": true, "reason": "Hello World is shown"}' : '{"achieved": true, "reason": "ok"}',
    );
    const orch = orchestrator({ verifierTransport: transport });

    const result = await orch.run('Open Calculator and type Hello World');

    const goalRequests = transport.requests.filter(isVerifyGoalPrompt);
    expect(goalRequests).toHaveLength(1);
    expect(goalRequests[0].imagePath).toBe(`/snap/${result.session.id}/step_2_after.png`);
    expect(result.postMortem.validation).toEqual({ achieved: true, reason: 'Hello World is shown' });
  });

  it('stops before the next step when cancelled', async () => {
    const orch = orchestrator();
    const token = new CancellationToken();
    orch.on('event', (e) => {
      if (e.type === 'step.completed') token.cancel('interrupted');
    });

    const result = await orch.run('Open Calculator', { cancellation: token });

    expect(result.session.status).toBe('error');
    expect(result.session.terminalReason).toBe('Run cancelled before step 2: interrupted');
    expect(result.steps).toHaveLength(1);
    expect(result.postMortem.sessionId).toBe(result.session.id);
  });

  it('cuts the settle pause short on cancellation', async () => {
    const token = new CancellationToken();
    const orch = orchestrator({
      // a pause that never ends unless cancellation interrupts it
      sleep: () => {
        token.cancel('interrupted');
        return new Promise<void>(() => {});
      },
    });

    const result = await orch.run('Open Calculator', { cancellation: token });

    expect(result.session.terminalReason).toBe('Run cancelled before step 2: interrupted');
    expect(result.steps).toHaveLength(1);
  });

  it('ends in error when the executor fails', async () => {
    const orch = orchestrator({ executor: new RecordingExecutor([1]) });
    const result = await orch.run('Open Calculator');
    expect(result.session.status).toBe('error');
    expect(result.postMortem.optimizedPrompt).toContain(
      '- Avoided: hotkey win r; type "calc"; press enter because window not found',
    );
  });

  it('steps a session by hand', async () => {
    const orch = orchestrator();
    await orch.start('Open Calculator');
    expect((await orch.advance()).status).toBe('running');
    expect((await orch.advance()).status).toBe('success');
    await expect(orch.advance()).rejects.toThrow('No active session');
  });
});
