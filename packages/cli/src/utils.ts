import type { LogLevel, Logger, ProjectConfig } from '@taskpilot/core';
import { DATA_DIRNAME, createLogger, openDatabase } from '@taskpilot/core';
import { InvalidArgumentError } from 'commander';
import { existsSync, mkdirSync, statSync } from 'node:fs';
import { delimiter, isAbsolute, join } from 'node:path';

export const DB_FILENAME = 'taskpilot.db';

export type CliDatabase = ReturnType<typeof openDatabase>;

export function getDbPath(projectDir?: string): string {
  const base = projectDir ?? process.cwd();
  const dbDir = join(base, DATA_DIRNAME, 'db');
  mkdirSync(dbDir, { recursive: true });
  return join(dbDir, DB_FILENAME);
}

/**
 * Run a command function with a database connection that is closed on every path.
 */
export async function withDatabase<T>(fn: (db: CliDatabase) => Promise<T>, projectDir?: string): Promise<T> {
  const db = openDatabase(getDbPath(projectDir));
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

export function createCliLogger(config: ProjectConfig, verbose?: boolean): Logger {
  const level: LogLevel = verbose ? 'debug' : config.advanced.logLevel;
  return createLogger(level, 'taskpilot');
}

/** Absolute path of an executable found on PATH, or null. */
export function findOnPath(command: string, pathEnv = process.env.PATH ?? ''): string | null {
  if (isAbsolute(command)) {
    return isFile(command) ? command : null;
  }
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, command);
    if (isFile(candidate)) return candidate;
  }
  return null;
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

export function parsePositiveInt(label: string): (value: string) => number {
  return (value: string) => {
    if (!/^\d+$/.test(value) || Number.parseInt(value, 10) <= 0) {
      throw new InvalidArgumentError(`${label} must be a positive integer`);
    }
    return Number.parseInt(value, 10);
  };
}
