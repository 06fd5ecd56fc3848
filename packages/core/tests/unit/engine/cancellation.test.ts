import { describe, expect, it, vi } from 'vitest';
import { CancellationError, CancellationToken } from '../../../src/engine/cancellation.js';

describe('CancellationToken', () => {
  it('starts as not cancelled', () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);
    expect(token.reason).toBeNull();
  });

  it('keeps only the first reason', () => {
    const token = new CancellationToken();
    token.cancel('first');
    token.cancel('second');
    expect(token.isCancelled).toBe(true);
    expect(token.reason).toBe('first');
  });

  it('fires callbacks once on repeated cancel', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.cancel();
    token.cancel();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('throwIfCancelled does nothing when not cancelled', () => {
    const token = new CancellationToken();
    expect(() => token.throwIfCancelled()).not.toThrow();
  });

  it('throwIfCancelled throws the default message', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(() => token.throwIfCancelled()).toThrow(CancellationError);
    expect(() => token.throwIfCancelled()).toThrow('Build was cancelled');
  });

  it('throwIfCancelled carries the given reason', () => {
    const token = new CancellationToken();
    token.cancel('Build bld_1 cancelled by request');
    expect(() => token.throwIfCancelled()).toThrow('Build bld_1 cancelled by request');
  });

  it('onCancel fires immediately if already cancelled', () => {
    const token = new CancellationToken();
    token.cancel();
    const callback = vi.fn();
    token.onCancel(callback);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('disposer removes the callback', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    const dispose = token.onCancel(callback);
    dispose();
    token.cancel();
    expect(callback).not.toHaveBeenCalled();
  });

  it('keeps running callbacks after one throws', () => {
    const token = new CancellationToken();
    const after = vi.fn();
    token.onCancel(() => {
      throw new Error('callback error');
    });
    token.onCancel(after);
    expect(() => token.cancel()).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('aborts its signal on cancel', () => {
    const token = new CancellationToken();
    const signal = token.signal;
    expect(signal.aborted).toBe(false);
    token.cancel();
    expect(signal.aborted).toBe(true);
    expect(token.signal).toBe(signal);
  });

  it('hands out an aborted signal after cancellation', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(token.signal.aborted).toBe(true);
  });
});

describe('CancellationToken.sleep()', () => {
  it('resolves true after sleep completes', async () => {
    const token = new CancellationToken();
    expect(await token.sleep(10)).toBe(true);
  });

  it('resolves false immediately if already cancelled', async () => {
    const token = new CancellationToken();
    token.cancel();
    const start = Date.now();
    expect(await token.sleep(10_000)).toBe(false);
    expect(Date.now() - start).toBeLessThan(100);
  });

  it('resolves false when cancelled during sleep', async () => {
    const token = new CancellationToken();
    const promise = token.sleep(10_000);
    setTimeout(() => token.cancel(), 20);
    const start = Date.now();
    expect(await promise).toBe(false);
    expect(Date.now() - start).toBeLessThan(5_000);
  });
});

describe('CancellationError', () => {
  it('has correct name', () => {
    const err = new CancellationError('test');
    expect(err.name).toBe('CancellationError');
    expect(err.message).toBe('test');
    expect(err).toBeInstanceOf(Error);
  });
});
