// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export type ExecutorKind = 'dry-run' | 'xdotool';

export type PresetName = 'offline' | 'linux-x11' | 'macos';

export interface SessionConfig {
  defaultStepBudget: number;
  maxStepBudget: number;
  snapshotDir: string;
  /** Optional browser hint passed to the reasoning engine. */
  browser: string;
}

/** A model reached through a CLI subprocess: prompt on stdin, reply on stdout. */
export interface TransportConfig {
  command: string;
  args: string[];
  /** Seconds. */
  timeout: number;
  envAllowlist?: string[];
}

export interface ReasoningConfig extends TransportConfig {
  enabled: boolean;
  model: string;
  /** Prior steps included in each prompt (most recent last). */
  historyLimit: number;
}

export interface VerificationConfig {
  enabled: boolean;
  /** Seconds. Falls back to the reasoning transport's command. */
  timeout: number;
}

export interface TranslatorConfig {
  rulesFile: string;
  builtins: boolean;
}

export interface CaptureConfig {
  /** Screenshot command; `{path}` in args is replaced with the target file. */
  command: string;
  args: string[];
  /** Seconds. */
  timeout: number;
}

export interface ExecutorConfig {
  kind: ExecutorKind;
  interActionDelayMs: number;
  settleDelayMs: number;
}

export interface DisplayConfig {
  width?: number;
  height?: number;
}

export interface AdvancedConfig {
  logLevel: LogLevel;
}

export interface ProjectConfig {
  session: SessionConfig;
  reasoning: ReasoningConfig;
  verification: VerificationConfig;
  translator: TranslatorConfig;
  capture: CaptureConfig;
  executor: ExecutorConfig;
  display: DisplayConfig;
  advanced: AdvancedConfig;
}
