// packages/core/src/translator/ingest.ts — Grow the rule file from the audit trail

import type { IngestCandidate, TranslationRule } from '../types/rules.js';
import type { Logger } from '../utils/logger.js';
import { INGEST_PATTERN_CHARS } from '../utils/constants.js';
import { isNoop } from '../instructions/parser.js';
import { readRuleFile, validateRules, writeRules } from './rules.js';

/** Anything that can report grouped (thought, instruction, outcome) counts. */
export interface CandidateSource {
  listInstructionGroups(): IngestCandidate[];
}

export interface IngestResult {
  candidates: IngestCandidate[];
  /** Rules built from candidates, before de-duplication against the file. */
  proposed: TranslationRule[];
  /** Rules actually appended (empty unless written). */
  added: TranslationRule[];
  total: number;
  written: boolean;
  outputPath: string;
  /** Why the existing rule file could not be read; nothing is written then. */
  error: string | null;
}

/** Non-noop groups ordered by count descending, then thought. */
export function collectCandidates(source: CandidateSource): IngestCandidate[] {
  return source
    .listInstructionGroups()
    .filter((c) => !isNoop(c.instruction))
    .sort((a, b) => b.count - a.count || (a.thought < b.thought ? -1 : a.thought > b.thought ? 1 : 0));
}

/** One rule per distinct thought; the first candidate for a thought supplies its instruction. */
export function buildRules(candidates: readonly IngestCandidate[]): TranslationRule[] {
  const seen = new Set<string>();
  const rules: TranslationRule[] = [];
  for (const candidate of candidates) {
    if (!candidate.thought || seen.has(candidate.thought)) continue;
    seen.add(candidate.thought);
    const pattern = candidate.thought.trim().slice(0, INGEST_PATTERN_CHARS).toLowerCase();
    const instruction = candidate.instruction.trim();
    if (pattern && instruction) {
      rules.push({ patterns: [pattern], instruction });
    }
  }
  return rules;
}

function patternKey(rule: TranslationRule): string {
  return JSON.stringify([...rule.patterns].sort());
}

/** Existing rules first, then new ones whose sorted pattern set is not already present. */
export function mergeRules(
  existing: readonly TranslationRule[],
  incoming: readonly TranslationRule[],
): { merged: TranslationRule[]; added: TranslationRule[] } {
  const keys = new Set(existing.map(patternKey));
  const merged = [...existing];
  const added: TranslationRule[] = [];
  for (const rule of incoming) {
    const key = patternKey(rule);
    if (keys.has(key)) continue;
    keys.add(key);
    merged.push(rule);
    added.push(rule);
  }
  return { merged, added };
}

/**
 * Append new rules to the rule file. Existing entries are written back as they were read,
 * including ones that fail validation. A file that cannot be parsed is never overwritten.
 */
export function ingestRules(options: {
  source: CandidateSource;
  outputPath: string;
  write?: boolean;
  logger?: Logger;
}): IngestResult {
  const { outputPath, logger } = options;
  const candidates = collectCandidates(options.source);
  const proposed = buildRules(candidates);
  const file = readRuleFile(outputPath);

  if (file.status === 'unreadable') {
    logger?.error(`Not touching rule file ${outputPath}: ${file.reason}`);
    return { candidates, proposed, added: [], total: 0, written: false, outputPath, error: file.reason };
  }

  const entries = file.status === 'ok' ? file.entries : [];
  const existing = validateRules(entries, outputPath, logger);
  const { added } = mergeRules(existing, proposed);

  const written = Boolean(options.write) && added.length > 0;
  if (written) {
    writeRules(outputPath, [...entries, ...added], file.status === 'ok' ? file.wrapper : null);
    logger?.info(`Wrote ${added.length} new rule(s) to ${outputPath} (total ${entries.length + added.length})`);
  }

  return {
    candidates,
    proposed,
    added: written ? added : [],
    total: written ? entries.length + added.length : entries.length,
    written,
    outputPath,
    error: null,
  };
}
