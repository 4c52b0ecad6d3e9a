// packages/core/src/utils/process.ts — Subprocess runner shared by transports, capture and executors

import { spawn } from 'node:child_process';
import { ProcessError } from './errors.js';

const MAX_OUTPUT_BYTES = 512 * 1024;
const MAX_STDERR_CHARS = 10_000;

// Default env vars always passed to subprocesses
export const BASE_ENV_ALLOWLIST = [
  'PATH',
  'HOME',
  'TEMP',
  'TMP',
  'USERPROFILE',
  'SystemRoot',
  'COMSPEC',
  'SHELL',
  'DISPLAY',
  'XAUTHORITY',
  'WAYLAND_DISPLAY',
];

export interface RunProcessOptions {
  command: string;
  args: string[];
  /** Absolute limit in ms; the process tree is killed when it passes. */
  timeoutMs: number;
  stdin?: string;
  cwd?: string;
  env?: Record<string, string>;
}

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

export function buildFilteredEnv(allowlist: readonly string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of allowlist) {
    const val = process.env[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}

export function killProcessTree(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    if (process.platform === 'win32') {
      spawn('taskkill', ['/pid', String(pid), '/T', '/F'], { stdio: 'ignore' });
    } else {
      process.kill(-pid, 'SIGTERM');
      setTimeout(() => {
        try {
          process.kill(-pid, 'SIGKILL');
        } catch {
          // already exited
        }
      }, 5000).unref();
    }
  } catch {
    // already exited
  }
}

/**
 * Spawn a command, feed stdin, collect stdout. Resolves on exit code 0, rejects with
 * ProcessError on spawn failure, non-zero exit or timeout.
 */
export function runProcess(options: RunProcessOptions): Promise<ProcessOutput> {
  const { command, args, timeoutMs } = options;

  return new Promise((resolve, reject) => {
    const startTime = Date.now();

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
      detached: process.platform !== 'win32',
    });

    // stdout is decoded once at exit so a character split across chunks survives
    const stdoutChunks: Buffer[] = [];
    let stdoutBytes = 0;
    let stderr = '';
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      killProcessTree(child.pid);
      reject(
        new ProcessError(
          `${command} timeout (limit ${timeoutMs}ms, elapsed ${Date.now() - startTime}ms)`,
          command,
          null,
          true,
        ),
      );
    }, timeoutMs);

    child.stdout.on('data', (data: Buffer) => {
      if (stdoutBytes < MAX_OUTPUT_BYTES) {
        stdoutChunks.push(data.subarray(0, MAX_OUTPUT_BYTES - stdoutBytes));
      }
      stdoutBytes += data.byteLength;
    });
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      if (stderr.length < MAX_STDERR_CHARS) stderr += chunk;
    });

    // A child that exits without reading stdin raises EPIPE here; the exit code decides.
    child.stdin.on('error', () => undefined);
    if (options.stdin) {
      child.stdin.write(options.stdin);
    }
    child.stdin.end();

    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(new ProcessError(`${command} failed to start: ${err.message}`, command));
    });

    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (code !== 0) {
        reject(
          new ProcessError(`${command} exited with code ${code}: ${stderr.slice(0, 500)}`, command, code),
        );
        return;
      }
      resolve({ stdout: Buffer.concat(stdoutChunks).toString('utf8'), stderr });
    });
  });
}
