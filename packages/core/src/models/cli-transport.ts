// packages/core/src/models/cli-transport.ts — Model access through a CLI subprocess

import { tmpdir } from 'node:os';
import type { TransportConfig } from '../types/config.js';
import { ModelError, ProcessError } from '../utils/errors.js';
import { BASE_ENV_ALLOWLIST, buildFilteredEnv, runProcess } from '../utils/process.js';
import type { CompletionRequest, ModelTransport } from './transport.js';

export interface CliTransportOptions extends TransportConfig {
  model?: string;
  cwd?: string;
}

/**
 * Spawns the configured command with the prompt on stdin and reads the reply from stdout.
 *
 * Placeholders in args: `{model}` becomes the configured model; `{image}` becomes the
 * screenshot path, and an arg carrying `{image}` is dropped when the request has none.
 * Without an `{image}` arg the path is appended to the prompt text instead.
 */
export class CliTransport implements ModelTransport {
  private readonly options: CliTransportOptions;

  constructor(options: CliTransportOptions) {
    this.options = options;
  }

  get name(): string {
    return this.options.model ? `${this.options.command}:${this.options.model}` : this.options.command;
  }

  buildArgs(imagePath?: string | null): string[] {
    const args: string[] = [];
    for (const arg of this.options.args) {
      if (arg.includes('{image}')) {
        if (imagePath) args.push(arg.replaceAll('{image}', imagePath));
        continue;
      }
      args.push(arg.replaceAll('{model}', this.options.model ?? ''));
    }
    return args;
  }

  buildPrompt(request: CompletionRequest): string {
    const sections = [request.system.trim(), request.user.trim()];
    const imageInArgs = this.options.args.some((a) => a.includes('{image}'));
    if (request.imagePath && !imageInArgs) {
      sections.push(`Screenshot: ${request.imagePath}`);
    }
    return `${sections.join('\n\n')}\n`;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const env = buildFilteredEnv([...BASE_ENV_ALLOWLIST, ...(this.options.envAllowlist ?? [])]);
    try {
      const { stdout } = await runProcess({
        command: this.options.command,
        args: this.buildArgs(request.imagePath),
        timeoutMs: this.options.timeout * 1000,
        stdin: this.buildPrompt(request),
        cwd: this.options.cwd ?? tmpdir(),
        env,
      });
      return stdout.trim();
    } catch (err) {
      if (err instanceof ProcessError) {
        throw new ModelError(err.message, err.command, err.exitCode ?? undefined);
      }
      throw err;
    }
  }
}
