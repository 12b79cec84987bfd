import { describe, expect, it } from 'vitest';
import { CancellationError, CancellationToken } from '../../../src/engine/cancellation.js';

describe('CancellationToken', () => {
  it('starts as not cancelled', () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);
    expect(token.reason).toBeNull();
  });

  it('keeps the first reason across repeated cancels', () => {
    const token = new CancellationToken();
    token.cancel('operator stop');
    token.cancel('second stop');
    expect(token.isCancelled).toBe(true);
    expect(token.reason).toBe('operator stop');
    expect(() => token.throwIfCancelled()).toThrow('operator stop');
  });

  it('throwIfCancelled does nothing when not cancelled', () => {
    const token = new CancellationToken();
    expect(() => token.throwIfCancelled()).not.toThrow();
  });

  it('throwIfCancelled throws CancellationError carrying the reason', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(() => token.throwIfCancelled()).toThrow(CancellationError);
    expect(() => token.throwIfCancelled()).toThrow('Stopped by request');
  });
});
