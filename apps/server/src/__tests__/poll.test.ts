import { describe, it, expect, vi } from 'vitest';
import { pollUntil } from '../utils/poll.js';
import { FakeClock } from './helpers/fake-clock.js';

describe('pollUntil', () => {
  it('waits before each check and stops at the first value', async () => {
    const clock = new FakeClock();
    const check = vi.fn()
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce('ready');

    const outcome = await pollUntil(check, { intervalMs: 1000, maxAttempts: 10, clock });

    expect(outcome).toEqual({ status: 'done', value: 'ready', attempts: 3 });
    expect(clock.sleeps).toEqual([1000, 1000, 1000]);
    expect(check.mock.calls).toEqual([[1], [2], [3]]);
  });

  it('treats false as a value', async () => {
    const clock = new FakeClock();
    const outcome = await pollUntil(async () => false, { intervalMs: 10, maxAttempts: 3, clock });
    expect(outcome).toEqual({ status: 'done', value: false, attempts: 1 });
  });

  it('gives up after maxAttempts checks', async () => {
    const clock = new FakeClock();
    const check = vi.fn().mockResolvedValue(undefined);

    const outcome = await pollUntil(check, { intervalMs: 500, maxAttempts: 10, clock });

    expect(outcome).toEqual({ status: 'exhausted', attempts: 10 });
    expect(check).toHaveBeenCalledTimes(10);
    expect(clock.current).toBe(5000);
  });

  it('stops once the deadline has passed', async () => {
    const clock = new FakeClock();
    const check = vi.fn().mockResolvedValue(undefined);

    // 0 → 3000 → 6000 → 9000 → 12000，第 4 次之后已过 10000
    const outcome = await pollUntil(check, { intervalMs: 3000, deadline: 10_000, clock });

    expect(outcome).toEqual({ status: 'exhausted', attempts: 4 });
    expect(clock.current).toBe(12_000);
  });

  it('does not check at all when the deadline is already reached', async () => {
    const clock = new FakeClock();
    clock.current = 5000;
    const check = vi.fn();

    const outcome = await pollUntil(check, { intervalMs: 100, deadline: 5000, clock });

    expect(outcome).toEqual({ status: 'exhausted', attempts: 0 });
    expect(check).not.toHaveBeenCalled();
  });

  it('requires a bound', async () => {
    await expect(pollUntil(async () => 1, { intervalMs: 1 })).rejects.toThrow(
      'pollUntil requires maxAttempts or deadline',
    );
  });

  it('propagates errors thrown by the check', async () => {
    const clock = new FakeClock();
    await expect(
      pollUntil(async () => { throw new Error('boom'); }, { intervalMs: 1, maxAttempts: 3, clock }),
    ).rejects.toThrow('boom');
  });
});
