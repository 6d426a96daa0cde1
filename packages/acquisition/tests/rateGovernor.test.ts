import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { AdmissionCancelledError } from '@tunegrab/core';
import { RateGovernor } from '../src/rate/rateGovernor.js';

describe('RateGovernor', () => {
  let governor: RateGovernor;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    governor = new RateGovernor({ now: () => Date.now() });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('admits exactly burstAllowance calls at once, then spaces by minInterval', async () => {
    governor.configure('catalog', 100, 2);

    const dispatches = Promise.all([1, 2, 3, 4, 5].map(() => governor.admit('catalog')));
    await vi.advanceTimersByTimeAsync(500);

    expect(await dispatches).toEqual([0, 0, 100, 200, 300]);
    expect(governor.snapshot('catalog')).toMatchObject({ burstRemaining: 0, lastDispatchAt: 300, queued: 0 });
  });

  it('spaces every call when there is no burst allowance', async () => {
    governor.configure('catalog', 100, 0);

    const dispatches = Promise.all([1, 2, 3].map(() => governor.admit('catalog')));
    await vi.advanceTimersByTimeAsync(300);

    expect(await dispatches).toEqual([0, 100, 200]);
  });

  it('refills the burst after an idle period', async () => {
    governor.configure('catalog', 100, 2);
    const first = Promise.all([1, 2, 3].map(() => governor.admit('catalog')));
    await vi.advanceTimersByTimeAsync(100);
    expect(await first).toEqual([0, 0, 100]);

    await vi.advanceTimersByTimeAsync(200);
    const second = Promise.all([1, 2, 3, 4].map(() => governor.admit('catalog')));
    await vi.advanceTimersByTimeAsync(500);

    expect(await second).toEqual([300, 300, 400, 500]);
  });

  it('never makes another backend wait', async () => {
    governor.configure('slow', 10_000, 0);
    await governor.admit('slow');
    const blocked = governor.admit('slow');

    await expect(governor.admit('fast')).resolves.toBe(0);
    expect(governor.snapshot('fast')).toMatchObject({ minIntervalMs: 0, burstAllowance: 0 });
    expect(governor.snapshot('slow')?.queued).toBe(1);

    await vi.advanceTimersByTimeAsync(10_000);
    await expect(blocked).resolves.toBe(10_000);
  });

  it('releases a cancelled waiter without spending its slot', async () => {
    governor.configure('catalog', 1000, 0);
    await governor.admit('catalog');

    const controller = new AbortController();
    const cancelled = governor.admit('catalog', { signal: controller.signal });
    const next = governor.admit('catalog');

    await vi.advanceTimersByTimeAsync(10);
    controller.abort();
    await expect(cancelled).rejects.toBeInstanceOf(AdmissionCancelledError);
    expect(governor.snapshot('catalog')).toMatchObject({ lastDispatchAt: 0, queued: 1 });

    await vi.advanceTimersByTimeAsync(990);
    await expect(next).resolves.toBe(1000);
  });

  it('rejects an already aborted signal immediately', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(governor.admit('catalog', { signal: controller.signal })).rejects.toBeInstanceOf(AdmissionCancelledError);
  });

  it('keeps runtime state when configured with the same parameters', async () => {
    governor.configure('catalog', 100, 1);
    await governor.admit('catalog');
    expect(governor.snapshot('catalog')?.burstRemaining).toBe(0);

    governor.configure('catalog', 100, 1);
    expect(governor.snapshot('catalog')?.burstRemaining).toBe(0);

    governor.configure('catalog', 100, 3);
    expect(governor.snapshot('catalog')?.burstRemaining).toBe(3);
    expect(governor.snapshot('catalog')?.lastDispatchAt).toBe(0);
  });

  it('returns undefined for backends it has never seen', () => {
    expect(governor.snapshot('unknown')).toBeUndefined();
  });
});
