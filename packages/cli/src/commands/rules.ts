// packages/cli/src/commands/rules.ts — Rule file maintenance

import { resolve } from 'node:path';

import { ActionTranslator, StepStore, describeEnvironment, ingestRules, loadConfig } from '@taskpilot/core';
import chalk from 'chalk';

import { createCliLogger, withDatabase } from '../utils.js';

interface IngestOptions {
  write?: boolean;
  output?: string;
  verbose?: boolean;
}

export async function rulesIngestCommand(options: IngestOptions): Promise<void> {
  const projectDir = process.cwd();
  const config = loadConfig({ projectDir });
  const logger = createCliLogger(config, options.verbose);
  const outputPath = resolve(projectDir, options.output ?? config.translator.rulesFile);

  await withDatabase(async (db) => {
    const result = ingestRules({
      source: new StepStore(db),
      outputPath,
      write: options.write,
      logger: logger.child('ingest'),
    });

    if (result.error) {
      console.error(chalk.red(`Rule file ${result.outputPath} is unreadable (${result.error}); fix it before ingesting`));
      process.exitCode = 1;
      return;
    }

    console.log(JSON.stringify({
      outputPath: result.outputPath,
      candidates: result.candidates.length,
      proposed: result.proposed,
      added: result.added.length,
      total: result.total,
      written: result.written,
    }, null, 2));

    if (!options.write && result.proposed.length > 0) {
      console.error(chalk.gray('Dry run: pass --write to append new rules to the rule file'));
    }
  }, projectDir);
}

interface TryOptions {
  env?: string;
  browser?: string;
}

/** Instruction the translator produces for a description, or null. */
export async function tryRule(
  projectDir: string,
  description: string,
  options: TryOptions = {},
): Promise<{ environment: string; instruction: string | null }> {
  const config = loadConfig({ projectDir });
  const translator = new ActionTranslator({
    rulesFile: resolve(projectDir, config.translator.rulesFile),
    builtins: config.translator.builtins,
  });
  const environment = options.env ?? (await describeEnvironment({
    browser: options.browser ?? (config.session.browser || null),
    display: config.display,
  }));
  return { environment, instruction: translator.translate(description, environment) };
}

export async function rulesTryCommand(description: string, options: TryOptions): Promise<void> {
  const { environment, instruction } = await tryRule(process.cwd(), description, options);
  console.log(JSON.stringify({ description, environment, instruction }, null, 2));
  if (!instruction) {
    console.error(chalk.yellow('No rule or built-in matches; the reasoning engine would be asked to translate it.'));
    process.exitCode = 1;
  }
}
