import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Exchange } from '../../../src/backends/exchange.js';

describe('Exchange', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts when an armed deadline expires', () => {
    const exchange = new Exchange(1000);
    exchange.arm();
    vi.advanceTimersByTime(999);
    expect(exchange.signal.aborted).toBe(false);
    vi.advanceTimersByTime(1);
    expect(exchange.signal.aborted).toBe(true);
    expect(exchange.timedOut).toBe(true);
    expect(exchange.cancelled).toBe(false);
  });

  it('does not count time while disarmed', () => {
    const exchange = new Exchange(1000);
    exchange.arm();
    vi.advanceTimersByTime(800);
    exchange.disarm();
    vi.advanceTimersByTime(5000);
    exchange.arm();
    vi.advanceTimersByTime(800);
    expect(exchange.signal.aborted).toBe(false);
    expect(exchange.timedOut).toBe(false);
  });

  it('follows the caller signal', () => {
    const caller = new AbortController();
    const exchange = new Exchange(1000, caller.signal);
    exchange.arm();
    caller.abort();
    expect(exchange.signal.aborted).toBe(true);
    expect(exchange.cancelled).toBe(true);
    vi.advanceTimersByTime(2000);
    expect(exchange.timedOut).toBe(false);
  });

  it('starts aborted when the caller already is', () => {
    const caller = new AbortController();
    caller.abort();
    const exchange = new Exchange(1000, caller.signal);
    expect(exchange.signal.aborted).toBe(true);
    expect(exchange.cancelled).toBe(true);
  });

  it('stops listening to the caller after dispose()', () => {
    const caller = new AbortController();
    const exchange = new Exchange(1000, caller.signal);
    exchange.dispose();
    caller.abort();
    expect(exchange.signal.aborted).toBe(false);
  });

  it('abort() cancels the deadline', () => {
    const exchange = new Exchange(1000);
    exchange.arm();
    exchange.abort(new Error('client closed'));
    vi.advanceTimersByTime(2000);
    expect(exchange.signal.aborted).toBe(true);
    expect(exchange.timedOut).toBe(false);
  });
});
