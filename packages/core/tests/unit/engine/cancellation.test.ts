import { describe, expect, it, vi } from 'vitest';
import { CancellationError, CancellationToken } from '../../../src/engine/cancellation.js';

describe('CancellationToken', () => {
  it('starts as not cancelled', () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);
  });

  it('becomes cancelled after cancel()', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(token.isCancelled).toBe(true);
  });

  it('cancel() is idempotent', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.cancel();
    token.cancel();
    // Callback only fires once
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('throwIfCancelled does nothing when not cancelled', () => {
    const token = new CancellationToken();
    expect(() => token.throwIfCancelled()).not.toThrow();
  });

  it('throwIfCancelled throws CancellationError when cancelled', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(() => token.throwIfCancelled()).toThrow(CancellationError);
    expect(() => token.throwIfCancelled()).toThrow('Operation was cancelled');
  });

  it('onCancel fires callback on cancel', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.cancel();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('onCancel fires immediately if already cancelled', () => {
    const token = new CancellationToken();
    token.cancel();
    const callback = vi.fn();
    token.onCancel(callback);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('onCancel deduplicates same callback reference', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.onCancel(callback); // Same reference
    token.cancel();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('onCancel supports multiple different callbacks', () => {
    const token = new CancellationToken();
    const cb1 = vi.fn();
    const cb2 = vi.fn();
    token.onCancel(cb1);
    token.onCancel(cb2);
    token.cancel();
    expect(cb1).toHaveBeenCalledTimes(1);
    expect(cb2).toHaveBeenCalledTimes(1);
  });

  it('offCancel removes callback so it does not fire', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.offCancel(callback);
    token.cancel();
    expect(callback).not.toHaveBeenCalled();
  });

  it('keeps the first cancellation reason', () => {
    const token = new CancellationToken();
    token.cancel('deadline');
    token.cancel('user');
    expect(() => token.throwIfCancelled()).toThrow('deadline');
  });

  it('aborts its signal on cancel', () => {
    const token = new CancellationToken();
    expect(token.signal.aborted).toBe(false);
    token.cancel();
    expect(token.signal.aborted).toBe(true);
  });
});

describe('CancellationToken.race()', () => {
  it('settles with the promise when not cancelled', async () => {
    const token = new CancellationToken();
    await expect(token.race(Promise.resolve(7))).resolves.toBe(7);
    await expect(token.race(Promise.reject(new Error('boom')))).rejects.toThrow('boom');
  });

  it('rejects with CancellationError as soon as the token is cancelled', async () => {
    const token = new CancellationToken();
    const pending = token.race(new Promise<number>(() => undefined));
    token.cancel('stop');
    await expect(pending).rejects.toBeInstanceOf(CancellationError);
  });

  it('rejects immediately when already cancelled', async () => {
    const token = new CancellationToken();
    token.cancel();
    await expect(token.race(Promise.resolve(1))).rejects.toThrow('Operation was cancelled');
  });
});

describe('CancellationToken.child()', () => {
  it('is cancelled with its parent', () => {
    const parent = new CancellationToken();
    const child = parent.child();
    parent.cancel('parent stopped');
    expect(child.isCancelled).toBe(true);
    expect(() => child.throwIfCancelled()).toThrow('parent stopped');
  });

  it('can be cancelled alone', () => {
    const parent = new CancellationToken();
    const child = parent.child();
    child.cancel();
    expect(child.isCancelled).toBe(true);
    expect(parent.isCancelled).toBe(false);
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
