import { resolve } from 'node:path';

import type { ProjectConfig } from '@taskpilot/core';
import {
  ActionTranslator,
  CancellationToken,
  CommandCapture,
  Orchestrator,
  XdotoolExecutor,
  createExecutor,
  createModelClients,
  loadConfig,
} from '@taskpilot/core';

import { EventRenderer, printRunSummary } from '../render.js';
import { createCliLogger, withDatabase } from '../utils.js';

export interface RunCommandOptions {
  budget?: number;
  browser?: string;
  dryRun?: boolean;
  preset?: string;
  verbose?: boolean;
}

/** Config for one run, with project-relative paths made absolute. */
export function resolveRunConfig(projectDir: string, options: RunCommandOptions): ProjectConfig {
  const config = loadConfig({
    projectDir,
    preset: options.preset,
    overrides: options.dryRun ? { executor: { kind: 'dry-run' } } : undefined,
  });
  return {
    ...config,
    session: { ...config.session, snapshotDir: resolve(projectDir, config.session.snapshotDir) },
    translator: { ...config.translator, rulesFile: resolve(projectDir, config.translator.rulesFile) },
  };
}

export async function runCommand(goal: string, options: RunCommandOptions): Promise<void> {
  const projectDir = process.cwd();
  const config = resolveRunConfig(projectDir, options);
  const logger = createCliLogger(config, options.verbose);

  const executor = createExecutor(config.executor, logger);
  const { reasoning, verifier } = createModelClients(config, logger, { cwd: projectDir });
  const translator = new ActionTranslator({
    rulesFile: config.translator.rulesFile,
    builtins: config.translator.builtins,
    logger: logger.child('translator'),
  });

  await withDatabase(async (db) => {
    const orchestrator = new Orchestrator({
      db,
      config,
      capture: new CommandCapture(config.capture, logger.child('capture')),
      executor,
      reasoning,
      verifier,
      translator,
      environment: { probe: executor instanceof XdotoolExecutor ? executor : undefined },
      logger,
    });

    const renderer = new EventRenderer();
    orchestrator.on('event', (event) => renderer.render(event));

    // Ctrl-C ends the session before its next step instead of killing the process mid-action
    const cancellation = new CancellationToken();
    const onInterrupt = () => cancellation.cancel('interrupted');
    process.once('SIGINT', onInterrupt);

    try {
      const result = await orchestrator.run(goal, {
        stepBudget: options.budget,
        browser: options.browser,
        cancellation,
      });
      renderer.stop();
      printRunSummary(result);
      process.exitCode = result.session.status === 'success' ? 0 : 2;
    } finally {
      renderer.stop();
      process.off('SIGINT', onInterrupt);
    }
  }, projectDir);
}
