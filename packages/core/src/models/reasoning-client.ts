// packages/core/src/models/reasoning-client.ts — Decide the next action; translate step text

import type { DecideRequest, Decision } from '../types/decision.js';
import { NOOP_INSTRUCTION } from '../types/decision.js';
import type { DecisionStatus } from '../types/session.js';
import { RAW_PREVIEW_CHARS } from '../utils/constants.js';
import { errorMessage, truncate } from '../utils/failure.js';
import type { JsonObject } from '../utils/json-extract.js';
import { extractJsonObject } from '../utils/json-extract.js';
import type { Logger } from '../utils/logger.js';
import { renderPrompt } from './prompts.js';
import type { ModelTransport } from './transport.js';

const DECISION_STATUSES: readonly DecisionStatus[] = ['CONTINUE', 'SUCCESS', 'LOST'];
const INTEGER_STRING = /^\s*[+-]?\d+\s*$/;

/** First non-blank scalar among the keys, as trimmed text. */
export function textField(obj: JsonObject, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  }
  return null;
}

function firstPresent(obj: JsonObject, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (obj[key] !== undefined && obj[key] !== null) return obj[key];
  }
  return undefined;
}

function toStatus(value: unknown): DecisionStatus {
  if (typeof value !== 'string') return 'CONTINUE';
  const upper = value.trim().toUpperCase();
  return DECISION_STATUSES.find((s) => s === upper) ?? 'CONTINUE';
}

/** Integers, truncated finite numbers, and integer strings; anything ≤ 0 is absent. */
export function toPositiveInt(value: unknown): number | undefined {
  let n: number | undefined;
  if (typeof value === 'number' && Number.isFinite(value)) {
    n = Math.trunc(value);
  } else if (typeof value === 'string' && INTEGER_STRING.test(value)) {
    n = Number.parseInt(value, 10);
  }
  return n !== undefined && n > 0 ? n : undefined;
}

function toCheckpoints(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  const checkpoints: number[] = [];
  for (const entry of value) {
    if (typeof entry === 'number' && Number.isFinite(entry)) {
      checkpoints.push(Math.trunc(entry));
    }
  }
  return checkpoints;
}

/**
 * Read a decision out of a model reply. Never throws; returns null when no JSON
 * object can be recovered. Missing fields take their defaults.
 */
export function parseDecision(raw: string, isFirstStep: boolean): Decision | null {
  const obj = extractJsonObject(raw);
  if (!obj) return null;

  const decision: Decision = {
    thought: textField(obj, ['thought', 'reasoning']) ?? 'No thought.',
    instruction: textField(obj, ['instruction', 'code']) ?? NOOP_INSTRUCTION,
    status: toStatus(obj['status']),
    raw,
  };

  if (isFirstStep) {
    const planned = toPositiveInt(firstPresent(obj, ['planned_step_count', 'total_steps']));
    if (planned !== undefined) decision.plannedStepCount = planned;
    decision.checkpoints = toCheckpoints(obj['checkpoints']);
  }
  return decision;
}

const CODE_FENCE_OPEN = /^```\w*\n?/;
const CODE_FENCE_CLOSE = /\n?```\s*$/;

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) return trimmed;
  return trimmed.replace(CODE_FENCE_OPEN, '').replace(CODE_FENCE_CLOSE, '').trim();
}

export interface ReasoningClientOptions {
  /** null when reasoning is disabled. */
  transport: ModelTransport | null;
  logger?: Logger;
}

export class ReasoningClient {
  private readonly transport: ModelTransport | null;
  private readonly logger?: Logger;

  constructor(options: ReasoningClientOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
  }

  get enabled(): boolean {
    return this.transport !== null;
  }

  /** null on a disabled engine, a transport fault, or a reply without a JSON object. */
  async decide(request: DecideRequest): Promise<Decision | null> {
    if (!this.transport) return null;

    const prompt = renderPrompt(
      'decide',
      {
        environment: request.environment,
        goal: request.goal,
        history: request.history,
        isFirstStep: request.isFirstStep,
      },
      request.snapshotPath,
    );

    let raw: string;
    try {
      raw = await this.transport.complete(prompt);
    } catch (err) {
      this.logger?.warn(`Reasoning call failed (${this.transport.name}): ${errorMessage(err)}`);
      return null;
    }

    const decision = parseDecision(raw, request.isFirstStep);
    if (!decision) {
      this.logger?.warn(`Reasoning reply had no JSON object: ${truncate(raw, RAW_PREVIEW_CHARS)}`);
    }
    return decision;
  }

  /** Instruction text for a step description, or null. */
  async translateStep(description: string, environment: string): Promise<string | null> {
    const trimmed = description.trim();
    if (!this.transport || !trimmed) return null;

    try {
      const raw = await this.transport.complete(
        renderPrompt('translate', { environment, description: trimmed }),
      );
      return stripCodeFence(raw) || null;
    } catch (err) {
      this.logger?.warn(`Step translation failed (${this.transport.name}): ${errorMessage(err)}`);
      return null;
    }
  }
}
