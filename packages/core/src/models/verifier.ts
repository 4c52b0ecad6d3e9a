// packages/core/src/models/verifier.ts — Per-step and end-of-run verification

import type { VerificationResult } from '../types/session.js';
import { RAW_PREVIEW_CHARS } from '../utils/constants.js';
import { errorMessage, truncate } from '../utils/failure.js';
import { extractJsonObject } from '../utils/json-extract.js';
import type { Logger } from '../utils/logger.js';
import type { PromptType, PromptVariables } from './prompts.js';
import { renderPrompt } from './prompts.js';
import type { ModelTransport } from './transport.js';

const AFFIRMATIVE = new Set(['true', 'yes']);

function isAchieved(value: unknown): boolean {
  if (value === true || value === 1) return true;
  return typeof value === 'string' && AFFIRMATIVE.has(value.trim().toLowerCase());
}

/** Never throws; null when the reply holds no JSON object. */
export function parseVerification(raw: string): VerificationResult | null {
  const obj = extractJsonObject(raw);
  if (!obj) return null;
  const reason = obj['reason'];
  return {
    achieved: isAchieved(obj['achieved']),
    reason: typeof reason === 'string' && reason.trim() ? reason.trim() : 'No reason given.',
  };
}

export interface VerifierOptions {
  transport: ModelTransport | null;
  enabled?: boolean;
  logger?: Logger;
}

/**
 * Answers "did it work?" from a snapshot. Every result may be null, meaning unknown:
 * verification disabled, no transport, no snapshot, a transport fault, or an unreadable reply.
 */
export class Verifier {
  private readonly transport: ModelTransport | null;
  private readonly enabled: boolean;
  private readonly logger?: Logger;

  constructor(options: VerifierOptions) {
    this.transport = options.transport;
    this.enabled = options.enabled ?? true;
    this.logger = options.logger;
  }

  get active(): boolean {
    return this.enabled && this.transport !== null;
  }

  verifyStep(
    intendedThought: string,
    afterSnapshot: string | null | undefined,
    environment: string,
  ): Promise<VerificationResult | null> {
    return this.ask('verify-step', { environment, intendedThought }, afterSnapshot);
  }

  verifyGoal(
    goal: string,
    finalSnapshot: string | null | undefined,
    environment: string,
  ): Promise<VerificationResult | null> {
    return this.ask('verify-goal', { environment, goal }, finalSnapshot);
  }

  private async ask(
    type: PromptType,
    vars: PromptVariables,
    snapshot: string | null | undefined,
  ): Promise<VerificationResult | null> {
    if (!this.enabled || !this.transport || !snapshot) return null;

    let raw: string;
    try {
      raw = await this.transport.complete(renderPrompt(type, vars, snapshot));
    } catch (err) {
      this.logger?.warn(`Verification call failed (${this.transport.name}): ${errorMessage(err)}`);
      return null;
    }

    const result = parseVerification(raw);
    if (!result) {
      this.logger?.warn(`Verification reply had no JSON object: ${truncate(raw, RAW_PREVIEW_CHARS)}`);
    }
    return result;
  }
}
