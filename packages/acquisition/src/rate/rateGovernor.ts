/**
 * Rate Governor
 *
 * Per-backend admission control. Each backend has its own FIFO queue and
 * budget, so a slow backend never holds up another one.
 *
 * Every dispatch spends a burst credit while any remain, so a budget of N
 * admits N calls at once before spacing by `minIntervalMs` engages. Credits
 * refill to the full allowance once the backend has been idle for
 * `burstAllowance * minIntervalMs`.
 */

import { AdmissionCancelledError } from '@tunegrab/core';
import { createLogger } from '@tunegrab/utils';

const logger = createLogger({ component: 'rate-governor' });

export interface RateBudget {
  backendId: string;
  minIntervalMs: number;
  burstAllowance: number;
  burstRemaining: number;
  lastDispatchAt: number | null;
  queued: number;
}

export interface AdmitOptions {
  signal?: AbortSignal;
}

interface Waiter {
  resolve: (dispatchedAt: number) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

interface BudgetState {
  backendId: string;
  minIntervalMs: number;
  burstAllowance: number;
  burstRemaining: number;
  lastDispatchAt: number | null;
  queue: Waiter[];
  timer?: NodeJS.Timeout;
}

export class RateGovernor {
  private readonly budgets = new Map<string, BudgetState>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Set a backend's budget. Identical parameters leave runtime state alone.
   */
  configure(backendId: string, minIntervalMs: number, burstAllowance: number): void {
    const interval = Math.max(0, minIntervalMs);
    const burst = Math.max(0, Math.floor(burstAllowance));
    const existing = this.budgets.get(backendId);

    if (existing) {
      if (existing.minIntervalMs === interval && existing.burstAllowance === burst) {
        return;
      }
      existing.minIntervalMs = interval;
      existing.burstAllowance = burst;
      existing.burstRemaining = burst;
      logger.debug({ backendId, minIntervalMs: interval, burstAllowance: burst }, 'Rate budget reconfigured');
      this.reschedule(existing);
      return;
    }

    this.createBudget(backendId, interval, burst);
  }

  /**
   * Wait for a dispatch slot. Resolves with the recorded dispatch timestamp.
   */
  admit(backendId: string, options: AdmitOptions = {}): Promise<number> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new AdmissionCancelledError(backendId));
    }

    // Unknown backends are admitted unthrottled
    const state = this.budgets.get(backendId) ?? this.createBudget(backendId, 0, 0);

    return new Promise<number>((resolve, reject) => {
      const onAbort = () => {
        const index = state.queue.indexOf(waiter);
        if (index >= 0) {
          state.queue.splice(index, 1);
          if (state.queue.length === 0) this.reschedule(state);
          reject(new AdmissionCancelledError(backendId));
        }
      };
      const waiter: Waiter = {
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      state.queue.push(waiter);
      this.drain(state);
    });
  }

  /**
   * Copy of a backend's budget, or undefined for unknown backends
   */
  snapshot(backendId: string): RateBudget | undefined {
    const state = this.budgets.get(backendId);
    if (!state) return undefined;
    return {
      backendId: state.backendId,
      minIntervalMs: state.minIntervalMs,
      burstAllowance: state.burstAllowance,
      burstRemaining: state.burstRemaining,
      lastDispatchAt: state.lastDispatchAt,
      queued: state.queue.length,
    };
  }

  private createBudget(backendId: string, minIntervalMs: number, burstAllowance: number): BudgetState {
    const state: BudgetState = {
      backendId,
      minIntervalMs,
      burstAllowance,
      burstRemaining: burstAllowance,
      lastDispatchAt: null,
      queue: [],
    };
    this.budgets.set(backendId, state);
    return state;
  }

  private reschedule(state: BudgetState): void {
    if (state.timer) {
      clearTimeout(state.timer);
      state.timer = undefined;
    }
    this.drain(state);
  }

  private drain(state: BudgetState): void {
    if (state.timer) return;

    while (state.queue.length > 0) {
      const now = this.now();
      this.refill(state, now);

      const waitMs = this.waitTime(state, now);
      if (waitMs > 0) {
        state.timer = setTimeout(() => {
          state.timer = undefined;
          this.drain(state);
        }, waitMs);
        return;
      }

      const waiter = state.queue.shift();
      if (!waiter) return;
      waiter.cleanup();
      waiter.resolve(this.dispatch(state, now));
    }
  }

  private refill(state: BudgetState, now: number): void {
    if (state.lastDispatchAt === null || state.burstRemaining === state.burstAllowance) return;
    if (now - state.lastDispatchAt >= state.burstAllowance * state.minIntervalMs) {
      state.burstRemaining = state.burstAllowance;
    }
  }

  private waitTime(state: BudgetState, now: number): number {
    if (state.lastDispatchAt === null || state.burstRemaining > 0) return 0;
    return Math.max(0, state.lastDispatchAt + state.minIntervalMs - now);
  }

  private dispatch(state: BudgetState, now: number): number {
    const dispatchedAt = state.lastDispatchAt === null ? now : Math.max(now, state.lastDispatchAt);
    if (state.burstRemaining > 0) {
      state.burstRemaining -= 1;
    }
    state.lastDispatchAt = dispatchedAt;
    return dispatchedAt;
  }
}
