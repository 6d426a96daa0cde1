/**
 * Job Types
 */

import type { JobState } from '../stateMachine.js';

export type FailureReason =
  | 'Auth'
  | 'RateLimited'
  | 'Transport'
  | 'Timeout'
  | 'NotFound'
  | 'OutOfSequenceChunk'
  | 'Cancelled';

export interface JobError {
  reason: FailureReason;
  message: string;
  at: Date;
}

export type SinkOutcome = 'completed' | 'failed';

/**
 * Caller-provided destination for acquired bytes.
 * The orchestrator closes it exactly once, whatever the outcome.
 */
export interface OutputSink {
  write(chunk: Uint8Array): Promise<void>;
  /** Drop everything written so far; called before a retry writes again. */
  rewind(): Promise<void>;
  close(outcome: SinkOutcome): Promise<void>;
}

export interface AcquisitionJob {
  jobId: string;
  backendId: string;
  trackRef: string;
  state: JobState;
  attempt: number;
  createdAt: Date;
  updatedAt: Date;
  lastError?: JobError;
  outputSink: OutputSink;
  bytesWritten: number;
}

/**
 * Snapshot returned to callers
 */
export interface JobStatus {
  jobId: string;
  backendId: string;
  trackRef: string;
  state: JobState;
  attempt: number;
  lastError?: JobError;
  bytesWritten: number;
  createdAt: Date;
  updatedAt: Date;
}
