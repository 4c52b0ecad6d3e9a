// packages/core/src/engine/step-pipeline.ts — One observe → decide → act → verify step

import { join } from 'node:path';
import type { SnapshotCapture } from '../capture/capture.js';
import type { ActionExecutor, Sleeper } from '../executor/executor.js';
import { sleep as defaultSleep } from '../executor/executor.js';
import { isNoop, parseInstruction } from '../instructions/parser.js';
import type { SessionStore } from '../memory/session-store.js';
import type { NewStepRecord, StepStore } from '../memory/step-store.js';
import type { ReasoningClient } from '../models/reasoning-client.js';
import { stubDecision } from '../models/stub.js';
import type { Verifier } from '../models/verifier.js';
import type { ActionTranslator } from '../translator/translator.js';
import type { Decision } from '../types/decision.js';
import { NOOP_INSTRUCTION } from '../types/decision.js';
import type {
  InstructionSource,
  Session,
  SessionStatus,
  StepRecord,
  VerificationResult,
} from '../types/session.js';
import { MIN_REVISED_BUDGET } from '../utils/constants.js';
import { WorkflowError } from '../utils/errors.js';
import { capDetail, describeFailure, errorMessage, summarizeAction } from '../utils/failure.js';
import type { Logger } from '../utils/logger.js';
import type { EventBus } from './event-bus.js';
import { now } from './event-bus.js';
import type { StepFault, Transition } from './state-machine.js';
import { isTerminal, nextState } from './state-machine.js';

/** In-memory state of one session while it runs. */
export interface SessionRun {
  session: Session;
  /** Number of the next step to execute. */
  stepNumber: number;
  history: StepRecord[];
  /** Most recent after-snapshot, used for goal verification. */
  lastSnapshot: string | null;
  environment: string;
  startedAt: number;
}

export interface StepOutcome {
  stepNumber: number;
  /** null when the step ended before a record could be written. */
  record: StepRecord | null;
  status: SessionStatus;
  reason: string | null;
}

export interface StepPipelineDeps {
  sessions: SessionStore;
  steps: StepStore;
  capture: SnapshotCapture;
  executor: ActionExecutor;
  reasoning: ReasoningClient;
  verifier: Verifier;
  translator: ActionTranslator;
  snapshotDir: string;
  bus?: EventBus;
  logger?: Logger;
  /** Pause after a successful instruction before the after-snapshot. */
  settleDelayMs?: number;
  /** Prior records included in each reasoning prompt. */
  historyLimit?: number;
  /** Refreshes the environment summary at the start of each step. */
  describeEnvironment?: () => Promise<string>;
  sleep?: Sleeper;
}

export type SnapshotKind = 'before' | 'after' | 'validation';

interface ResolvedDecision {
  decision: Decision;
  instruction: string;
  source: InstructionSource;
}

export function snapshotPath(snapshotDir: string, sessionId: string, stepNumber: number, kind: SnapshotKind): string {
  return join(snapshotDir, sessionId, `step_${stepNumber}_${kind}.png`);
}

/**
 * Executes exactly one step per `advance` call and never retries. Every path that
 * ends the session persists the step record (when there is one) before the status.
 */
export class StepPipeline {
  private readonly deps: StepPipelineDeps;
  private readonly sleep: Sleeper;

  constructor(deps: StepPipelineDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async advance(run: SessionRun): Promise<StepOutcome> {
    if (run.session.status !== 'running') {
      throw new WorkflowError(`Session ${run.session.id} is ${run.session.status}`, run.session.id);
    }

    const n = run.stepNumber;
    const sessionId = run.session.id;
    const startedAt = Date.now();
    let resolved: ResolvedDecision | null = null;
    let beforeSnapshot: string | null = null;
    let persisted: StepRecord | null = null;

    this.deps.bus?.emitEvent({
      type: 'step.started',
      sessionId,
      stepNumber: n,
      stepBudget: run.session.stepBudget,
      timestamp: now(),
    });

    try {
      if (this.deps.describeEnvironment) {
        run.environment = await this.deps.describeEnvironment();
      }

      // 1. Observe
      const before = await this.deps.capture.capture(this.path(run, 'before'));
      if (!before.ok) {
        return this.finish(run, null, { kind: 'capture', message: before.error });
      }
      beforeSnapshot = before.path;

      // 2-3. Decide, then fill in a missing instruction
      resolved = await this.resolveDecision(run, beforeSnapshot);
      if (n === 1) this.revisePlan(run, resolved.decision);

      this.deps.bus?.emitEvent({
        type: 'step.decided',
        sessionId,
        stepNumber: n,
        thought: resolved.decision.thought,
        instruction: resolved.instruction,
        source: resolved.source,
        status: resolved.decision.status,
        timestamp: now(),
      });

      // 4. Act
      let executed = false;
      try {
        const instructions = parseInstruction(resolved.instruction);
        await this.deps.executor.execute(instructions);
        executed = instructions.length > 0;
      } catch (err) {
        const after = await this.captureQuietly(run, 'after');
        persisted = this.persist(run, resolved, {
          outcome: 'Fail',
          failureDetail: capDetail(describeFailure(err)),
          beforeSnapshot,
          afterSnapshot: after,
          verification: null,
        }, startedAt);
        return this.finish(run, persisted, { kind: 'execution', message: errorMessage(err) });
      }
      if (executed && this.deps.settleDelayMs) {
        await this.sleep(this.deps.settleDelayMs);
      }

      // 5. Verify
      const afterSnapshot = await this.captureQuietly(run, 'after');
      if (afterSnapshot) run.lastSnapshot = afterSnapshot;
      const verification = afterSnapshot
        ? await this.deps.verifier.verifyStep(resolved.decision.thought, afterSnapshot, run.environment)
        : null;
      if (verification) {
        this.deps.bus?.emitEvent({ type: 'step.verified', sessionId, stepNumber: n, verification, timestamp: now() });
      }
      if (verification && !verification.achieved) {
        persisted = this.persist(run, resolved, {
          outcome: 'Fail',
          failureDetail: capDetail(`Step verification: ${verification.reason}`),
          beforeSnapshot,
          afterSnapshot,
          verification,
        }, startedAt);
        return this.finish(run, persisted, { kind: 'verification', message: verification.reason });
      }

      // 6. Checkpoint
      if (run.session.checkpoints.includes(n)) {
        await this.captureCheckpoint(run);
      }

      // 7. Record, then apply the decision status
      persisted = this.persist(run, resolved, {
        outcome: 'Pass',
        failureDetail: null,
        beforeSnapshot,
        afterSnapshot,
        verification,
      }, startedAt);

      const transition = nextState({
        stepNumber: n,
        stepBudget: run.session.stepBudget,
        decisionStatus: resolved.decision.status,
      });
      return this.apply(run, persisted, transition);
    } catch (err) {
      this.deps.logger?.error(`Step ${n} of ${sessionId} aborted: ${errorMessage(err)}`);
      if (!persisted && resolved) {
        persisted = this.persistAfterFault(run, resolved, beforeSnapshot, err, startedAt);
      }
      return this.finish(run, persisted, { kind: 'unexpected', message: errorMessage(err) });
    }
  }

  /** Ends a running session in `error` without executing another step. */
  cancel(run: SessionRun, message = ''): StepOutcome {
    return this.finish(run, null, { kind: 'cancelled', message });
  }

  private path(run: SessionRun, kind: SnapshotKind): string {
    return snapshotPath(this.deps.snapshotDir, run.session.id, run.stepNumber, kind);
  }

  private async resolveDecision(run: SessionRun, beforeSnapshot: string): Promise<ResolvedDecision> {
    const n = run.stepNumber;
    const historyLimit = this.deps.historyLimit ?? run.history.length;
    const fromEngine = await this.deps.reasoning.decide({
      goal: run.session.goal,
      history: historyLimit > 0 ? run.history.slice(-historyLimit) : [],
      isFirstStep: n === 1,
      environment: run.environment,
      snapshotPath: beforeSnapshot,
    });
    const decision = fromEngine ?? stubDecision(n);

    if (!isNoop(decision.instruction)) {
      return { decision, instruction: decision.instruction.trim(), source: fromEngine ? 'reasoning' : 'stub' };
    }

    if (decision.thought.trim()) {
      const ruled = this.deps.translator.translate(decision.thought, run.environment);
      if (ruled) return { decision, instruction: ruled, source: 'rules' };

      const translated = await this.deps.reasoning.translateStep(decision.thought, run.environment);
      if (translated && !isNoop(translated)) {
        return { decision, instruction: translated, source: 'reasoning-translate' };
      }
    }
    return { decision, instruction: NOOP_INSTRUCTION, source: 'none' };
  }

  /** First step only: adopt the planned length and checkpoints. */
  private revisePlan(run: SessionRun, decision: Decision): void {
    if (decision.plannedStepCount === undefined && decision.checkpoints === undefined) return;

    const previous = run.session.stepBudget;
    const stepBudget =
      decision.plannedStepCount !== undefined
        ? Math.max(MIN_REVISED_BUDGET, decision.plannedStepCount, run.stepNumber)
        : previous;
    const checkpoints = decision.checkpoints ?? run.session.checkpoints;

    const unreachable = checkpoints.filter((c) => c > stepBudget || c < 1);
    if (unreachable.length > 0) {
      this.deps.logger?.warn(
        `Checkpoints ${unreachable.join(', ')} fall outside steps 1..${stepBudget} and will never fire`,
      );
    }

    this.deps.sessions.revisePlan(run.session.id, stepBudget, checkpoints);
    run.session = { ...run.session, stepBudget, checkpoints: [...checkpoints] };

    if (stepBudget !== previous) {
      this.deps.logger?.info(`Step budget revised from ${previous} to ${stepBudget}`);
    }
    this.deps.bus?.emitEvent({
      type: 'budget.revised',
      sessionId: run.session.id,
      previous,
      stepBudget,
      checkpoints: [...checkpoints],
      timestamp: now(),
    });
  }

  /** A failed capture here is logged and reported as null. */
  private async captureQuietly(run: SessionRun, kind: SnapshotKind): Promise<string | null> {
    const result = await this.deps.capture.capture(this.path(run, kind));
    if (result.ok) return result.path;
    this.deps.logger?.warn(`${kind} snapshot for step ${run.stepNumber} failed: ${result.error}`);
    return null;
  }

  private async captureCheckpoint(run: SessionRun): Promise<void> {
    const path = await this.captureQuietly(run, 'validation');
    if (path) {
      this.deps.bus?.emitEvent({
        type: 'checkpoint.captured',
        sessionId: run.session.id,
        stepNumber: run.stepNumber,
        path,
        timestamp: now(),
      });
    }
  }

  private persist(
    run: SessionRun,
    resolved: ResolvedDecision,
    result: {
      outcome: 'Pass' | 'Fail';
      failureDetail: string | null;
      beforeSnapshot: string | null;
      afterSnapshot: string | null;
      verification: VerificationResult | null;
    },
    startedAt: number,
  ): StepRecord {
    const record: NewStepRecord = {
      sessionId: run.session.id,
      stepNumber: run.stepNumber,
      thought: resolved.decision.thought,
      instruction: resolved.instruction,
      instructionSource: resolved.source,
      actionSummary: summarizeAction(resolved.decision.thought),
      decisionStatus: resolved.decision.status,
      ...result,
    };
    const stored = this.deps.steps.append(record);
    run.history.push(stored);
    this.deps.bus?.emitEvent({
      type: 'step.completed',
      sessionId: run.session.id,
      stepNumber: run.stepNumber,
      outcome: stored.outcome,
      failureDetail: stored.failureDetail,
      durationMs: Date.now() - startedAt,
      timestamp: now(),
    });
    return stored;
  }

  private persistAfterFault(
    run: SessionRun,
    resolved: ResolvedDecision,
    beforeSnapshot: string | null,
    err: unknown,
    startedAt: number,
  ): StepRecord | null {
    try {
      return this.persist(run, resolved, {
        outcome: 'Fail',
        failureDetail: capDetail(describeFailure(err)),
        beforeSnapshot,
        afterSnapshot: null,
        verification: null,
      }, startedAt);
    } catch (persistErr) {
      this.deps.logger?.error(`Could not record failed step ${run.stepNumber}: ${errorMessage(persistErr)}`);
      return null;
    }
  }

  private apply(run: SessionRun, record: StepRecord | null, transition: Transition): StepOutcome {
    if (isTerminal(transition)) {
      this.deps.sessions.finish(run.session.id, transition.status, transition.reason);
      this.syncSession(run, transition.status, transition.reason);
      return { stepNumber: run.stepNumber, record, status: run.session.status, reason: run.session.terminalReason };
    }
    const stepNumber = run.stepNumber;
    run.stepNumber = transition.nextStep;
    return { stepNumber, record, status: 'running', reason: null };
  }

  private finish(run: SessionRun, record: StepRecord | null, fault: StepFault): StepOutcome {
    return this.apply(
      run,
      record,
      nextState({ stepNumber: run.stepNumber, stepBudget: run.session.stepBudget, fault }),
    );
  }

  /** Mirror the stored row; a session that was already terminal keeps its first status. */
  private syncSession(run: SessionRun, status: Session['status'], reason: string): void {
    const stored = this.deps.sessions.get(run.session.id);
    run.session = stored ?? { ...run.session, status, terminalReason: reason, finishedAt: now() };
  }
}
