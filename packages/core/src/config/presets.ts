// packages/core/src/config/presets.ts

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import type { PresetName } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';

// src/config and dist/config both sit two levels below the package root.
const PRESETS_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'presets');

const VALID_PRESETS: readonly PresetName[] = ['offline', 'linux-x11', 'macos'];

export function isPresetName(name: string): name is PresetName {
  return VALID_PRESETS.some((preset) => preset === name);
}

/**
 * Load a built-in preset by name. Returns a partial config to be merged with defaults.
 */
export function loadPreset(name: string): Record<string, unknown> {
  if (!isPresetName(name)) {
    throw new ConfigError(
      `Unknown preset: "${name}". Valid presets: ${VALID_PRESETS.join(', ')}`,
      'preset',
    );
  }

  const filePath = join(PRESETS_DIR, `${name}.yml`);
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to load preset "${name}": ${err instanceof Error ? err.message : String(err)}`,
      'preset',
    );
  }
  if (!isPlainRecord(parsed)) {
    throw new ConfigError(`Preset "${name}" is not a mapping`, 'preset');
  }
  return parsed;
}

/** List available preset names. */
export function listPresets(): PresetName[] {
  return [...VALID_PRESETS];
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
