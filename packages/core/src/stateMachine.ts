/**
 * Job State Machine
 *
 * Strict state machine for acquisition job lifecycle management.
 *
 * State Flow:
 * QUEUED → AUTHORIZING → ADMITTED → FETCHING → DECRYPTING       → COMPLETED
 *                                            ↘ POLLING_TRANSFER ↗
 *        ↘ FAILED (from any non-terminal state)
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Retries and re-authorization re-enter AUTHORIZING
 */

import { StateTransitionError } from './errors/index.js';

export const JobState = {
  QUEUED: 'QUEUED',
  AUTHORIZING: 'AUTHORIZING',
  ADMITTED: 'ADMITTED',
  FETCHING: 'FETCHING',
  DECRYPTING: 'DECRYPTING',
  POLLING_TRANSFER: 'POLLING_TRANSFER',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type JobState = (typeof JobState)[keyof typeof JobState];

/**
 * Represents a state transition with metadata
 */
export interface JobStateTransition {
  from: JobState;
  to: JobState;
  timestamp: Date;
  reason?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<JobState, Set<JobState>> = {
  QUEUED: new Set<JobState>([
    'AUTHORIZING',
    'FAILED',
  ]),
  AUTHORIZING: new Set<JobState>([
    'ADMITTED',
    'AUTHORIZING', // Retry while refreshing credentials
    'FAILED',
  ]),
  ADMITTED: new Set<JobState>([
    'FETCHING',
    'FAILED',
  ]),
  FETCHING: new Set<JobState>([
    'DECRYPTING',
    'POLLING_TRANSFER',
    'AUTHORIZING',
    'FAILED',
  ]),
  DECRYPTING: new Set<JobState>([
    'COMPLETED',
    'AUTHORIZING',
    'FAILED',
  ]),
  POLLING_TRANSFER: new Set<JobState>([
    'COMPLETED',
    'AUTHORIZING',
    'FAILED',
  ]),
  COMPLETED: new Set<JobState>([]),
  FAILED: new Set<JobState>([]),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: JobState, to: JobState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: JobState): JobState[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalState(state: JobState): boolean {
  return state === 'COMPLETED' || state === 'FAILED';
}

/**
 * Job State Machine class
 * Manages state transitions with validation and history
 */
export class JobStateMachine {
  private currentState: JobState;
  private history: JobStateTransition[];
  private readonly jobId: string;

  constructor(jobId: string, initialState: JobState = 'QUEUED') {
    this.jobId = jobId;
    this.currentState = initialState;
    this.history = [];
  }

  /**
   * Get the current state
   */
  getState(): JobState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<JobStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: JobState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetState: JobState,
    reason?: string,
    metadata?: Record<string, unknown>
  ): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.jobId, this.currentState, targetState);
    }

    const transition: JobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
      metadata,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

}
