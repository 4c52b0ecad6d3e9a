// packages/core/src/translator/rules.ts — Rule file loading and writing

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { TranslationRule } from '../types/rules.js';
import type { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/failure.js';

const ruleSchema = z
  .object({
    patterns: z.union([z.array(z.string().trim().min(1)).min(1), z.string().trim().min(1)]).optional(),
    pattern: z.string().trim().min(1).optional(),
    instruction: z.string().trim().min(1).optional(),
    macosInstruction: z.string().trim().min(1).optional(),
    // older rule files name the instruction fields `code` and `code_macos`
    code: z.string().trim().min(1).optional(),
    code_macos: z.string().trim().min(1).optional(),
  })
  .transform((rule, ctx): TranslationRule => {
    const raw = rule.patterns ?? rule.pattern;
    if (raw === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'rule needs "patterns"' });
      return z.NEVER;
    }
    const macosInstruction = rule.macosInstruction ?? rule.code_macos;
    const instruction = rule.instruction ?? rule.code ?? macosInstruction;
    if (instruction === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'rule needs "instruction"' });
      return z.NEVER;
    }
    const patterns = typeof raw === 'string' ? [raw] : raw;
    return macosInstruction ? { patterns, instruction, macosInstruction } : { patterns, instruction };
  });

/** Raw contents of a rule file, before validation. */
export type RuleFile =
  | { status: 'missing' }
  | { status: 'unreadable'; reason: string }
  | {
      status: 'ok';
      entries: unknown[];
      /** Other top-level keys when the file uses the `{ "rules": [...] }` layout; null for a bare array. */
      wrapper: Record<string, unknown> | null;
    };

export function readRuleFile(filePath: string | null | undefined): RuleFile {
  if (!filePath || !existsSync(filePath)) return { status: 'missing' };

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    return { status: 'unreadable', reason: errorMessage(err) };
  }

  if (Array.isArray(parsed)) return { status: 'ok', entries: parsed, wrapper: null };
  if (parsed !== null && typeof parsed === 'object' && 'rules' in parsed && Array.isArray(parsed.rules)) {
    const wrapper: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
    return { status: 'ok', entries: parsed.rules, wrapper };
  }
  return { status: 'unreadable', reason: 'expected an array or { "rules": [...] }' };
}

/** Validate raw entries; invalid ones are skipped with a warning. */
export function validateRules(entries: readonly unknown[], filePath: string, logger?: Logger): TranslationRule[] {
  const rules: TranslationRule[] = [];
  entries.forEach((entry, index) => {
    const result = ruleSchema.safeParse(entry);
    if (result.success) {
      rules.push(result.data);
    } else {
      const issues = result.error.issues.map((i) => i.message).join('; ');
      logger?.warn(`Skipping rule #${index} in ${filePath}: ${issues}`);
    }
  });
  return rules;
}

/**
 * Read the rule file. Missing file → []. Unreadable file or unknown layout → [] with a
 * warning. Entries that fail validation are skipped with a warning.
 */
export function loadRules(filePath: string | null | undefined, logger?: Logger): TranslationRule[] {
  const file = readRuleFile(filePath);
  if (file.status === 'missing' || !filePath) return [];
  if (file.status === 'unreadable') {
    logger?.warn(`Ignoring rule file ${filePath}: ${file.reason}`);
    return [];
  }
  return validateRules(file.entries, filePath, logger);
}

/** Write entries as a bare array, or under `rules` inside the given wrapper object. */
export function writeRules(
  filePath: string,
  entries: readonly unknown[],
  wrapper: Record<string, unknown> | null = null,
): void {
  mkdirSync(dirname(filePath), { recursive: true });
  const document = wrapper ? { ...wrapper, rules: entries } : entries;
  writeFileSync(filePath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
}
