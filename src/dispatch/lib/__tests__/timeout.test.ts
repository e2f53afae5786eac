import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { remainingOfDeadline, toMillis, withTimeout } from '../timeout.js';

describe('toMillis', () => {
  it('converts each unit', () => {
    expect(toMillis(250, 'milliseconds')).toBe(250);
    expect(toMillis(2, 'seconds')).toBe(2_000);
    expect(toMillis(1.5, 'minutes')).toBe(90_000);
  });
});

describe('withTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('settles with the promise when it wins', async () => {
    const result = withTimeout(Promise.resolve('fast'), 100, () => new Error('late'));

    await expect(result).resolves.toBe('fast');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects with the timeout error once the time elapses', async () => {
    const never = new Promise<string>(() => {});
    const result = withTimeout(never, 100, () => new Error('late'));
    const assertion = expect(result).rejects.toThrow('late');

    await vi.advanceTimersByTimeAsync(100);

    await assertion;
  });

  it('measures the remaining time against the clock', () => {
    vi.setSystemTime(1_000);

    expect(remainingOfDeadline(1_250)).toBe(250);
    expect(remainingOfDeadline(900)).toBe(-100);
  });
});
