// packages/core/src/engine/orchestrator.ts

import type Database from 'better-sqlite3';
import { EventEmitter } from 'eventemitter3';
import type { SnapshotCapture } from '../capture/capture.js';
import type { DescribeEnvironmentOptions } from '../env/environment.js';
import { describeEnvironment } from '../env/environment.js';
import type { ActionExecutor, Sleeper } from '../executor/executor.js';
import { sleep as defaultSleep } from '../executor/executor.js';
import { PostMortemStore } from '../memory/post-mortem-store.js';
import { SessionStore } from '../memory/session-store.js';
import { StepStore } from '../memory/step-store.js';
import type { ReasoningClient } from '../models/reasoning-client.js';
import type { Verifier } from '../models/verifier.js';
import type { ActionTranslator } from '../translator/translator.js';
import type { ProjectConfig } from '../types/config.js';
import type { EngineEvent } from '../types/events.js';
import type { PostMortem, Session, StepRecord } from '../types/session.js';
import { WorkflowError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { CancellationToken } from './cancellation.js';
import { EventBus, now } from './event-bus.js';
import { PostMortemSynthesizer } from './post-mortem.js';
import type { SessionRun, StepOutcome } from './step-pipeline.js';
import { StepPipeline } from './step-pipeline.js';

interface OrchestratorEvents {
  event: (event: EngineEvent) => void;
}

export interface OrchestratorOptions {
  db: Database.Database;
  config: ProjectConfig;
  capture: SnapshotCapture;
  executor: ActionExecutor;
  reasoning: ReasoningClient;
  verifier: Verifier;
  translator: ActionTranslator;
  /** Host and display details for the environment summary. */
  environment?: Omit<DescribeEnvironmentOptions, 'browser' | 'display' | 'logger'>;
  logger?: Logger;
  sleep?: Sleeper;
}

export interface StartOptions {
  /** Overrides session.defaultStepBudget. */
  stepBudget?: number;
  browser?: string | null;
}

export interface RunOptions extends StartOptions {
  cancellation?: CancellationToken;
}

export interface RunResult {
  session: Session;
  steps: StepRecord[];
  postMortem: PostMortem;
  durationMs: number;
}

/**
 * Owns the single active session slot. `run` drives one session from start to a
 * terminal status; `start` + `advance` let a caller step it by hand.
 */
export class Orchestrator extends EventEmitter<OrchestratorEvents> {
  readonly sessions: SessionStore;
  readonly steps: StepStore;
  readonly postMortems: PostMortemStore;
  private readonly bus = new EventBus();
  private readonly pipeline: StepPipeline;
  private readonly synthesizer: PostMortemSynthesizer;
  private readonly config: ProjectConfig;
  private readonly options: OrchestratorOptions;
  private active: SessionRun | null = null;
  private cancellation: CancellationToken | null = null;

  constructor(options: OrchestratorOptions) {
    super();
    this.options = options;
    this.config = options.config;
    this.sessions = new SessionStore(options.db);
    this.steps = new StepStore(options.db);
    this.postMortems = new PostMortemStore(options.db);

    this.bus.on('event', (event) => this.emit('event', event));

    this.pipeline = new StepPipeline({
      sessions: this.sessions,
      steps: this.steps,
      capture: options.capture,
      executor: options.executor,
      reasoning: options.reasoning,
      verifier: options.verifier,
      translator: options.translator,
      snapshotDir: this.config.session.snapshotDir,
      bus: this.bus,
      logger: options.logger?.child('step'),
      settleDelayMs: this.config.executor.settleDelayMs,
      historyLimit: this.config.reasoning.historyLimit,
      describeEnvironment: () => this.describe(this.active?.session.browser ?? null),
      sleep: (ms) => this.pause(ms),
    });

    this.synthesizer = new PostMortemSynthesizer({
      sessions: this.sessions,
      steps: this.steps,
      postMortems: this.postMortems,
      verifier: options.verifier,
      logger: options.logger?.child('post-mortem'),
    });
  }

  get activeRun(): SessionRun | null {
    return this.active;
  }

  async start(goal: string, options: StartOptions = {}): Promise<SessionRun> {
    if (this.active) {
      throw new WorkflowError(
        `Session ${this.active.session.id} is still running; finish it before starting another`,
        this.active.session.id,
      );
    }
    const trimmed = goal.trim();
    if (!trimmed) {
      throw new WorkflowError('Goal must not be empty');
    }
    const stepBudget = options.stepBudget ?? this.config.session.defaultStepBudget;
    if (!Number.isInteger(stepBudget) || stepBudget < 1 || stepBudget > this.config.session.maxStepBudget) {
      throw new WorkflowError(
        `Step budget must be an integer between 1 and ${this.config.session.maxStepBudget}, got ${stepBudget}`,
      );
    }

    const browser = options.browser ?? (this.config.session.browser || null);
    const session = this.sessions.create({ goal: trimmed, stepBudget, browser });
    const run: SessionRun = {
      session,
      stepNumber: 1,
      history: [],
      lastSnapshot: null,
      environment: '',
      startedAt: Date.now(),
    };
    // Claim the slot before the first await so a concurrent start sees it
    this.active = run;
    try {
      run.environment = await this.describe(session.browser);
    } catch (err) {
      this.active = null;
      this.pipeline.cancel(run, 'environment unavailable');
      throw err;
    }

    this.options.logger?.info(`Session ${session.id} started: "${trimmed}" (budget ${stepBudget})`);
    this.bus.emitEvent({
      type: 'session.started',
      sessionId: session.id,
      goal: trimmed,
      stepBudget,
      timestamp: now(),
    });
    return run;
  }

  /** Runs one step of the active session; finishing the session releases the slot. */
  async advance(): Promise<StepOutcome> {
    const run = this.active;
    if (!run) {
      throw new WorkflowError('No active session');
    }
    let outcome: StepOutcome;
    try {
      outcome = await this.pipeline.advance(run);
    } catch (err) {
      this.active = null;
      throw err;
    }
    if (outcome.status !== 'running') {
      await this.complete(run);
    }
    return outcome;
  }

  /** Ends the active session in `error` before its next step. */
  async cancel(message = ''): Promise<StepOutcome> {
    const run = this.active;
    if (!run) {
      throw new WorkflowError('No active session');
    }
    const outcome = this.pipeline.cancel(run, message);
    await this.complete(run);
    return outcome;
  }

  async run(goal: string, options: RunOptions = {}): Promise<RunResult> {
    const run = await this.start(goal, options);
    this.cancellation = options.cancellation ?? null;
    try {
      while (this.active === run && run.session.status === 'running') {
        if (options.cancellation?.isCancelled) {
          await this.cancel(options.cancellation.reason ?? '');
          break;
        }
        await this.advance();
      }
    } finally {
      this.cancellation = null;
    }

    const postMortem = this.postMortems.get(run.session.id) ?? (await this.synthesize(run));
    return {
      session: this.sessions.get(run.session.id) ?? run.session,
      steps: this.steps.listBySession(run.session.id),
      postMortem,
      durationMs: Date.now() - run.startedAt,
    };
  }

  /** Settle pause; a cancelled run stops waiting so the cancel lands before the next step. */
  private async pause(ms: number): Promise<void> {
    const sleeper = this.options.sleep ?? defaultSleep;
    const token = this.cancellation;
    if (!token) {
      await sleeper(ms);
      return;
    }
    const elapsed = await token.sleep(ms, sleeper);
    if (!elapsed) {
      this.options.logger?.debug(`Settle pause cut short: ${token.reason ?? 'cancelled'}`);
    }
  }

  private async complete(run: SessionRun): Promise<void> {
    if (this.active === run) this.active = null;
    this.bus.emitEvent({
      type: 'session.finished',
      sessionId: run.session.id,
      status: run.session.status,
      reason: run.session.terminalReason ?? '',
      steps: run.history.length,
      durationMs: Date.now() - run.startedAt,
      timestamp: now(),
    });
    this.options.logger?.info(`Session ${run.session.id} ${run.session.status}: ${run.session.terminalReason ?? ''}`);
    await this.synthesize(run);
  }

  private async synthesize(run: SessionRun): Promise<PostMortem> {
    const postMortem = await this.synthesizer.synthesize(run.session.id, run.lastSnapshot, run.environment);
    this.bus.emitEvent({
      type: 'postmortem.created',
      sessionId: run.session.id,
      optimizedPrompt: postMortem.optimizedPrompt,
      validation: postMortem.validation,
      timestamp: now(),
    });
    return postMortem;
  }

  private describe(browser: string | null): Promise<string> {
    return describeEnvironment({
      ...this.options.environment,
      browser,
      display: this.config.display,
      logger: this.options.logger,
    });
  }
}
