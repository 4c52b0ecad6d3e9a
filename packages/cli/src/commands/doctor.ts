// packages/cli/src/commands/doctor.ts — Preflight diagnostics

import { accessSync, constants, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { ProjectConfig } from '@taskpilot/core';
import {
  CONFIG_FILENAME,
  DATA_DIRNAME,
  SCHEMA_VERSION,
  VERSION,
  XdotoolExecutor,
  errorMessage,
  getSchemaVersion,
  loadConfig,
  openDatabase,
} from '@taskpilot/core';
import chalk from 'chalk';

import { DB_FILENAME, findOnPath } from '../utils.js';

export interface Check {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message: string;
  fix?: string;
}

const MIN_NODE_MAJOR = 20;

export function checkNode(version = process.version): Check {
  const major = Number.parseInt(version.slice(1).split('.')[0], 10);
  return major >= MIN_NODE_MAJOR
    ? { name: 'node', status: 'pass', message: `Node.js ${version}` }
    : {
        name: 'node',
        status: 'fail',
        message: `Node.js ${version}: requires >= ${MIN_NODE_MAJOR}`,
        fix: `Install Node.js ${MIN_NODE_MAJOR}+`,
      };
}

export function checkCommand(name: string, command: string, fix: string): Check {
  const found = findOnPath(command);
  return found
    ? { name, status: 'pass', message: `${command} found at ${found}` }
    : { name, status: 'fail', message: `${command} not found in PATH`, fix };
}

async function checkExecutor(config: ProjectConfig): Promise<Check> {
  if (config.executor.kind === 'dry-run') {
    return {
      name: 'executor',
      status: 'warn',
      message: 'dry-run executor: instructions are logged, not performed',
      fix: 'Set executor.kind: xdotool in .taskpilot.yml to control an X11 display',
    };
  }
  try {
    const geometry = await new XdotoolExecutor().probe();
    return { name: 'executor', status: 'pass', message: `xdotool controls a ${geometry.replace(' ', 'x')} display` };
  } catch (err) {
    return {
      name: 'executor',
      status: 'fail',
      message: `xdotool cannot reach a display: ${errorMessage(err).split('\n')[0]}`,
      fix: 'Install xdotool and check that DISPLAY is set',
    };
  }
}

function checkDatabase(cwd: string): Check[] {
  const dbDir = join(cwd, DATA_DIRNAME, 'db');
  const dbPath = join(dbDir, DB_FILENAME);
  if (!existsSync(dbDir)) {
    return [{
      name: 'database',
      status: 'warn',
      message: `${DATA_DIRNAME}/db/ not found, will be created on first run`,
      fix: 'taskpilot init',
    }];
  }
  try {
    accessSync(dbDir, constants.W_OK);
  } catch {
    return [{
      name: 'database',
      status: 'fail',
      message: `${DATA_DIRNAME}/db/ is not writable`,
      fix: `Check file permissions on ${DATA_DIRNAME}/db/`,
    }];
  }
  if (!existsSync(dbPath)) {
    return [{ name: 'database', status: 'pass', message: 'Database directory writable, DB will be created on first use' }];
  }

  const checks: Check[] = [{ name: 'database', status: 'pass', message: 'Database exists and writable' }];
  try {
    const db = openDatabase(dbPath);
    const version = getSchemaVersion(db);
    db.close();
    checks.push({
      name: 'schema',
      status: version === SCHEMA_VERSION ? 'pass' : 'warn',
      message: `Schema version ${version ?? 'unknown'}`,
    });
  } catch (err) {
    checks.push({ name: 'schema', status: 'warn', message: `Could not read schema version: ${errorMessage(err)}` });
  }
  return checks;
}

export async function doctorCommand(): Promise<void> {
  const cwd = process.cwd();
  const checks: Check[] = [];

  console.error(chalk.cyan(`\n  taskpilot doctor v${VERSION}\n`));

  let config: ProjectConfig | null = null;
  try {
    config = loadConfig({ projectDir: cwd });
    checks.push(
      existsSync(join(cwd, CONFIG_FILENAME))
        ? { name: 'config', status: 'pass', message: `${CONFIG_FILENAME} is valid` }
        : { name: 'config', status: 'warn', message: `${CONFIG_FILENAME} not found, using defaults`, fix: 'taskpilot init' },
    );
  } catch (err) {
    checks.push({ name: 'config', status: 'fail', message: errorMessage(err), fix: `Fix ${CONFIG_FILENAME}` });
  }

  checks.push(...checkDatabase(cwd));
  checks.push(checkNode());

  if (config) {
    checks.push(checkCommand('capture', config.capture.command, 'Install the screenshot tool or set capture.command'));
    if (config.reasoning.enabled) {
      checks.push(checkCommand('reasoning', config.reasoning.command, 'Install the model CLI or set reasoning.command'));
    } else {
      checks.push({ name: 'reasoning', status: 'warn', message: 'reasoning disabled: the built-in stub decides' });
    }
    checks.push(await checkExecutor(config));
  }

  let hasFailure = false;
  for (const check of checks) {
    const icon = check.status === 'pass'
      ? chalk.green('PASS')
      : check.status === 'warn'
        ? chalk.yellow('WARN')
        : chalk.red('FAIL');
    console.error(`  ${icon} ${check.name}: ${check.message}`);
    if (check.fix) {
      console.error(chalk.dim(`       → ${check.fix}`));
    }
    if (check.status === 'fail') hasFailure = true;
  }

  console.error('');
  console.log(JSON.stringify({ version: VERSION, checks, healthy: !hasFailure }, null, 2));

  if (hasFailure) {
    process.exitCode = 1;
  }
}
