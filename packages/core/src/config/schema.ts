// packages/core/src/config/schema.ts

import { z } from 'zod';
import {
  DEFAULT_CAPTURE_TIMEOUT_SEC,
  DEFAULT_INTER_ACTION_DELAY_MS,
  DEFAULT_REASONING_TIMEOUT_SEC,
  DEFAULT_SETTLE_DELAY_MS,
  DEFAULT_STEP_BUDGET,
  DEFAULT_VERIFICATION_TIMEOUT_SEC,
  MAX_STEP_BUDGET,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const sessionConfigSchema = z.object({
  defaultStepBudget: z.number().int().positive().default(DEFAULT_STEP_BUDGET),
  maxStepBudget: z.number().int().positive().max(1000).default(MAX_STEP_BUDGET),
  snapshotDir: z.string().min(1).default('.taskpilot/snapshots'),
  browser: z.string().default(''),
});

const reasoningConfigSchema = z.object({
  enabled: z.boolean().default(false),
  command: z.string().default(''),
  args: z.array(z.string()).default([]),
  model: z.string().default(''),
  timeout: z.number().positive().default(DEFAULT_REASONING_TIMEOUT_SEC),
  envAllowlist: z.array(z.string()).optional(),
  historyLimit: z.number().int().positive().default(20),
});

const verificationConfigSchema = z.object({
  enabled: z.boolean().default(true),
  timeout: z.number().positive().default(DEFAULT_VERIFICATION_TIMEOUT_SEC),
});

const translatorConfigSchema = z.object({
  rulesFile: z.string().min(1).default('.taskpilot/rules.json'),
  builtins: z.boolean().default(true),
});

const captureConfigSchema = z.object({
  command: z.string().min(1).default('import'),
  args: z.array(z.string()).default(['-window', 'root', '{path}']),
  timeout: z.number().positive().default(DEFAULT_CAPTURE_TIMEOUT_SEC),
});

const executorConfigSchema = z.object({
  kind: z.enum(['dry-run', 'xdotool']).default('dry-run'),
  interActionDelayMs: z.number().int().nonnegative().default(DEFAULT_INTER_ACTION_DELAY_MS),
  settleDelayMs: z.number().int().nonnegative().default(DEFAULT_SETTLE_DELAY_MS),
});

const displayConfigSchema = z.object({
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const projectConfigSchema = z
  .object({
    session: sessionConfigSchema.default({}),
    reasoning: reasoningConfigSchema.default({}),
    verification: verificationConfigSchema.default({}),
    translator: translatorConfigSchema.default({}),
    capture: captureConfigSchema.default({}),
    executor: executorConfigSchema.default({}),
    display: displayConfigSchema.default({}),
    advanced: advancedConfigSchema.default({}),
  })
  .superRefine((data, ctx) => {
    if (data.reasoning.enabled && !data.reasoning.command) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['reasoning', 'command'],
        message: 'reasoning.enabled requires reasoning.command (the model CLI to spawn)',
      });
    }
    if (data.session.defaultStepBudget > data.session.maxStepBudget) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['session', 'defaultStepBudget'],
        message: `defaultStepBudget ${data.session.defaultStepBudget} exceeds maxStepBudget ${data.session.maxStepBudget}`,
      });
    }
  });

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): z.output<typeof projectConfigSchema> {
  const result = projectConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
