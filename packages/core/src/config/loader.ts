// packages/core/src/config/loader.ts

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ProjectConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { isPlainRecord, loadPreset } from './presets.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.taskpilot.yml';
export const DATA_DIRNAME = '.taskpilot';

/** Deep partial used for programmatic overrides. Arrays are replaced whole. */
export type ConfigOverrides = {
  [K in keyof ProjectConfig]?: Partial<ProjectConfig[K]>;
};

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged.
 */
function deepMerge(target: object, source: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    if (srcVal === undefined) continue;
    const tgtVal = result[key];
    if (isPlainRecord(srcVal) && isPlainRecord(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

/**
 * Load config with precedence: overrides > .taskpilot.yml > preset > defaults.
 *
 * A `preset` key inside the file is honoured when no preset is passed in.
 */
export function loadConfig(options?: {
  projectDir?: string;
  preset?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}): ProjectConfig {
  const projectDir = options?.projectDir ?? process.cwd();

  let fileConfig: Record<string, unknown> = {};
  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${CONFIG_FILENAME}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (isPlainRecord(parsed)) {
      fileConfig = parsed;
    }
  }

  const { preset: filePreset, ...fileRest } = fileConfig;
  const presetName = options?.preset ?? (typeof filePreset === 'string' ? filePreset : undefined);

  let merged = deepMerge({}, structuredClone(DEFAULT_CONFIG));
  if (presetName) {
    merged = deepMerge(merged, loadPreset(presetName));
  }
  merged = deepMerge(merged, fileRest);
  if (options?.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}

/**
 * Write a ProjectConfig to .taskpilot.yml in the given directory.
 * Also creates .taskpilot/db/ and .taskpilot/snapshots/.
 */
export function writeConfig(config: ProjectConfig, dir: string): void {
  const configPath = join(dir, CONFIG_FILENAME);
  writeFileSync(configPath, stringifyYaml(config, { lineWidth: 100 }), 'utf-8');

  mkdirSync(join(dir, DATA_DIRNAME, 'db'), { recursive: true });
  mkdirSync(join(dir, DATA_DIRNAME, 'snapshots'), { recursive: true });

  const gitignorePath = join(dir, '.gitignore');
  const entry = `${DATA_DIRNAME}/`;
  if (existsSync(gitignorePath)) {
    const content = readFileSync(gitignorePath, 'utf-8');
    if (!content.includes(entry)) {
      appendFileSync(gitignorePath, `\n${entry}\n`);
    }
  } else {
    writeFileSync(gitignorePath, `${entry}\n`, 'utf-8');
  }
}

export { deepMerge };
