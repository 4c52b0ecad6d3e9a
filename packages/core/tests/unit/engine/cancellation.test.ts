import { describe, expect, it, vi } from 'vitest';
import { CancellationToken } from '../../../src/engine/cancellation.js';

describe('CancellationToken', () => {
  it('starts not cancelled', () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);
    expect(token.reason).toBeNull();
  });

  it('keeps the first reason and fires callbacks once', () => {
    const token = new CancellationToken();
    const cb = vi.fn();
    token.onCancel(cb);
    token.cancel('interrupted');
    token.cancel('again');
    expect(token.isCancelled).toBe(true);
    expect(token.reason).toBe('interrupted');
    expect(cb).toHaveBeenCalledTimes(1);
  });

  it('fires a callback registered after cancellation immediately', () => {
    const token = new CancellationToken();
    token.cancel();
    const cb = vi.fn();
    token.onCancel(cb);
    expect(cb).toHaveBeenCalledTimes(1);
  });

  it('does not fire a removed callback', () => {
    const token = new CancellationToken();
    const cb = vi.fn();
    token.onCancel(cb);
    token.offCancel(cb);
    token.cancel();
    expect(cb).not.toHaveBeenCalled();
  });

  it('sleep resolves true when the pause elapses', async () => {
    const token = new CancellationToken();
    await expect(token.sleep(5)).resolves.toBe(true);
  });

  it('sleep resolves false when cancelled mid-pause', async () => {
    const token = new CancellationToken();
    const pending = token.sleep(10_000, () => new Promise<void>(() => {}));
    token.cancel();
    await expect(pending).resolves.toBe(false);
  });

  it('sleep waits on the given sleeper and drops its cancel callback afterwards', async () => {
    const token = new CancellationToken();
    const sleeper = vi.fn(async (_ms: number) => {});
    await expect(token.sleep(250, sleeper)).resolves.toBe(true);
    expect(sleeper).toHaveBeenCalledWith(250);

    const cb = vi.fn();
    token.onCancel(cb);
    token.cancel();
    expect(cb).toHaveBeenCalledTimes(1);
  });

  it('sleep passes on a failing sleeper', async () => {
    const token = new CancellationToken();
    const failing = () => Promise.reject(new Error('timer broke'));
    await expect(token.sleep(5, failing)).rejects.toThrow('timer broke');
  });

  it('sleep resolves false at once after cancellation', async () => {
    const token = new CancellationToken();
    token.cancel();
    await expect(token.sleep(10_000)).resolves.toBe(false);
  });
});
