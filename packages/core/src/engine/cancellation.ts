// packages/core/src/engine/cancellation.ts — Cooperative cancellation between steps

import type { Sleeper } from '../executor/executor.js';
import { sleep as defaultSleep } from '../executor/executor.js';

export class CancellationToken {
  private cancelled = false;
  private cancelReason: string | null = null;
  private callbacks = new Set<() => void>();

  /** Signal cancellation. Idempotent; the first reason wins. */
  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason ?? null;
    const callbacks = [...this.callbacks];
    this.callbacks.clear();
    for (const cb of callbacks) {
      cb();
    }
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | null {
    return this.cancelReason;
  }

  /**
   * Register a callback to run on cancellation.
   * If already cancelled, the callback fires immediately.
   */
  onCancel(callback: () => void): void {
    if (this.cancelled) {
      callback();
      return;
    }
    this.callbacks.add(callback);
  }

  /** Remove a previously registered callback. */
  offCancel(callback: () => void): void {
    this.callbacks.delete(callback);
  }

  /**
   * Resolves once `sleeper` finishes the pause, or early on cancellation.
   * Returns true if the full pause elapsed, false if cancelled.
   */
  sleep(ms: number, sleeper: Sleeper = defaultSleep): Promise<boolean> {
    if (this.cancelled) return Promise.resolve(false);

    return new Promise((resolve, reject) => {
      const onCancelHandler = () => resolve(false);
      this.onCancel(onCancelHandler);
      sleeper(ms).then(
        () => {
          this.offCancel(onCancelHandler);
          resolve(true);
        },
        (err: unknown) => {
          this.offCancel(onCancelHandler);
          reject(err);
        },
      );
    });
  }
}
