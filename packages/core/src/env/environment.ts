// packages/core/src/env/environment.ts — One-line host summary for prompts and translation

import { arch, platform, release } from 'node:os';
import type { DisplayConfig } from '../types/config.js';
import type { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/failure.js';

export interface HostInfo {
  platform: NodeJS.Platform;
  release: string;
  arch: string;
}

export interface ScreenGeometry {
  width: number;
  height: number;
}

export interface CursorPosition {
  x: number;
  y: number;
}

/** Optional display queries, answered by executors that control a display. */
export interface DisplayProbe {
  screenSize(): Promise<ScreenGeometry | null>;
  cursorPosition(): Promise<CursorPosition | null>;
}

export interface DescribeEnvironmentOptions {
  browser?: string | null;
  host?: HostInfo;
  probe?: DisplayProbe;
  display?: DisplayConfig;
  logger?: Logger;
}

const MAC_CONTEXT = /macos|darwin/i;

export function currentHost(): HostInfo {
  return { platform: platform(), release: release(), arch: arch() };
}

/** True when an environment summary names macOS or Darwin. */
export function isMacContext(environment: string | null | undefined): boolean {
  return environment ? MAC_CONTEXT.test(environment) : false;
}

function describeOs(host: HostInfo): string {
  switch (host.platform) {
    case 'darwin':
      return `macOS (Darwin ${host.release})`;
    case 'win32':
      return `Windows ${host.release}`;
    case 'linux':
      return `Linux ${host.release}`;
    default:
      return `${host.platform} ${host.release}`.trim();
  }
}

/**
 * e.g. `Linux 6.5.0; x64; Browser: firefox; Screen: 1920x1080 (width x height in pixels); Cursor: (10, 20)`
 *
 * Screen size comes from `display` when both dimensions are configured, otherwise
 * from the probe. Probe failures drop the part.
 */
export async function describeEnvironment(options: DescribeEnvironmentOptions = {}): Promise<string> {
  const host = options.host ?? currentHost();
  const parts = [describeOs(host)];
  if (host.arch) parts.push(host.arch);
  parts.push(`Browser: ${options.browser?.trim() || 'unknown'}`);

  let screen: ScreenGeometry | null = null;
  if (options.display?.width && options.display.height) {
    screen = { width: options.display.width, height: options.display.height };
  } else if (options.probe) {
    screen = await options.probe.screenSize().catch((err: unknown) => {
      options.logger?.debug(`Screen size unavailable: ${errorMessage(err)}`);
      return null;
    });
  }
  if (screen && screen.width > 0 && screen.height > 0) {
    parts.push(`Screen: ${screen.width}x${screen.height} (width x height in pixels)`);
  }

  if (options.probe) {
    const cursor = await options.probe.cursorPosition().catch((err: unknown) => {
      options.logger?.debug(`Cursor position unavailable: ${errorMessage(err)}`);
      return null;
    });
    if (cursor) parts.push(`Cursor: (${cursor.x}, ${cursor.y})`);
  }

  return parts.join('; ');
}
