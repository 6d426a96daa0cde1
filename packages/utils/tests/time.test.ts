import { describe, it, expect } from 'vitest';
import { abortable, formatDuration, sleep } from '../src/time.js';

describe('sleep', () => {
  it('rejects at once when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));
    await expect(sleep(10_000, controller.signal)).rejects.toThrow('cancelled');
  });

  it('rejects with an AbortError when no reason is given', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });

  it('resolves after the delay', async () => {
    const started = Date.now();
    await sleep(20);
    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
  });
});

describe('abortable', () => {
  it('passes through the value when no abort happens', async () => {
    const controller = new AbortController();
    await expect(abortable(Promise.resolve(42), controller.signal)).resolves.toBe(42);
  });

  it('rejects with the abort reason while the operation is still pending', async () => {
    const controller = new AbortController();
    let finish: (value: string) => void = () => undefined;
    const operation = new Promise<string>((resolve) => {
      finish = resolve;
    });

    const guarded = abortable(operation, controller.signal);
    controller.abort(new Error('cancelled'));
    finish('late');

    await expect(guarded).rejects.toThrow('cancelled');
  });

  it('propagates the operation error', async () => {
    const controller = new AbortController();
    await expect(abortable(Promise.reject(new Error('boom')), controller.signal)).rejects.toThrow('boom');
  });
});

describe('formatDuration', () => {
  it('formats milliseconds, seconds, minutes and hours', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(4_200)).toBe('4s');
    expect(formatDuration(125_000)).toBe('2m 5s');
    expect(formatDuration(3_725_000)).toBe('1h 2m 5s');
  });
});
