// packages/core/src/capture/capture.ts — Snapshot capture contract and the command-backed adapter

import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { CaptureConfig } from '../types/config.js';
import { errorMessage } from '../utils/failure.js';
import type { Logger } from '../utils/logger.js';
import { runProcess } from '../utils/process.js';

export type CaptureResult = { ok: true; path: string } | { ok: false; error: string };

/** Writes a picture of the current display to `targetPath`. Never throws. */
export interface SnapshotCapture {
  capture(targetPath: string): Promise<CaptureResult>;
}

/**
 * Runs a screenshot command such as `import -window root {path}` or
 * `screencapture -x {path}`. Success means exit code 0 and the file exists.
 */
export class CommandCapture implements SnapshotCapture {
  constructor(
    private readonly config: CaptureConfig,
    private readonly logger?: Logger,
  ) {}

  get commandLine(): string {
    return [this.config.command, ...this.config.args].join(' ');
  }

  async capture(targetPath: string): Promise<CaptureResult> {
    const args = this.config.args.map((arg) => arg.replaceAll('{path}', targetPath));
    try {
      mkdirSync(dirname(targetPath), { recursive: true });
      await runProcess({
        command: this.config.command,
        args,
        timeoutMs: this.config.timeout * 1000,
      });
    } catch (err) {
      this.logger?.debug(`Capture command failed: ${errorMessage(err)}`);
      return { ok: false, error: errorMessage(err) };
    }
    if (!existsSync(targetPath)) {
      return { ok: false, error: `${this.config.command} exited without writing ${targetPath}` };
    }
    return { ok: true, path: targetPath };
  }
}
