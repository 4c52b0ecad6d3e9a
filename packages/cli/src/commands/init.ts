import { existsSync } from 'node:fs';
import { join } from 'node:path';

import { CONFIG_FILENAME, isPresetName, listPresets, loadConfig, writeConfig } from '@taskpilot/core';
import chalk from 'chalk';

interface InitOptions {
  preset?: string;
  force?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const cwd = process.cwd();
  const configPath = join(cwd, CONFIG_FILENAME);

  if (existsSync(configPath) && !options.force) {
    console.error(chalk.red('Already initialized. Use --force to overwrite.'));
    process.exitCode = 1;
    return;
  }

  const presetName = options.preset ?? 'offline';
  if (!isPresetName(presetName)) {
    console.error(chalk.red(`Unknown preset: ${presetName}. Available: ${listPresets().join(', ')}`));
    process.exitCode = 1;
    return;
  }

  // --force starts from the preset, not the file being replaced
  const config = loadConfig({ projectDir: cwd, preset: presetName, skipFile: options.force });
  writeConfig(config, cwd);

  console.log(chalk.green(`\nInitialized with '${presetName}' preset`));
  console.log(chalk.gray(`  capture:   ${[config.capture.command, ...config.capture.args].join(' ')}`));
  console.log(chalk.gray(`  executor:  ${config.executor.kind}`));
  console.log(chalk.gray(`  reasoning: ${config.reasoning.enabled ? config.reasoning.command : 'disabled'}`));
  console.log(chalk.gray('\nNext: taskpilot doctor, then taskpilot run "describe your goal"'));
}
