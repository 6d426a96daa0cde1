/**
 * Custom Error Classes
 */

import type { JobState } from '../stateMachine.js';
import type { FailureReason } from '../types/job.js';

/**
 * Base error class for all tunegrab errors
 */
export class TunegrabError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TunegrabError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends TunegrabError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      400,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends TunegrabError {
  constructor(
    jobId: string,
    fromState: JobState,
    toState: JobState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      400,
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends TunegrabError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

export type TransportErrorKind = 'Auth' | 'RateLimited' | 'Transport' | 'NotFound' | 'Timeout';

/**
 * Failure reported by a backend transport
 */
export class TransportError extends TunegrabError {
  public readonly kind: TransportErrorKind;
  public readonly status?: number;
  public readonly retryAfterMs?: number;

  constructor(
    kind: TransportErrorKind,
    message: string,
    options: { backendId?: string; status?: number; retryAfterMs?: number; cause?: unknown } = {}
  ) {
    super(message, `TRANSPORT_${kind.toUpperCase()}`, options.status ?? 502, {
      backendId: options.backendId,
      status: options.status,
    });
    this.name = 'TransportError';
    this.kind = kind;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * No usable credential and no way to obtain one without the user
 */
export class AuthExpiredError extends TunegrabError {
  constructor(backendId: string, message?: string) {
    super(
      message ?? `Credential for ${backendId} expired and cannot be refreshed`,
      'AUTH_EXPIRED',
      401,
      { backendId }
    );
    this.name = 'AuthExpiredError';
  }
}

/**
 * Admission wait abandoned before a slot was granted
 */
export class AdmissionCancelledError extends TunegrabError {
  constructor(backendId: string) {
    super(`Admission to ${backendId} cancelled`, 'ADMISSION_CANCELLED', 499, { backendId });
    this.name = 'AdmissionCancelledError';
  }
}

/**
 * Chunk index does not match the next index an ordered stream expects
 */
export class OutOfSequenceChunkError extends TunegrabError {
  constructor(trackRef: string, expected: number, received: number) {
    super(
      `Chunk ${received} of ${trackRef} is out of sequence (expected ${expected})`,
      'OUT_OF_SEQUENCE_CHUNK',
      500,
      { trackRef, expected, received }
    );
    this.name = 'OutOfSequenceChunkError';
  }
}

/**
 * Decryption context used against its contract
 */
export class DecryptionContextError extends TunegrabError {
  constructor(trackRef: string, message: string) {
    super(message, 'DECRYPTION_CONTEXT_MISUSE', 500, { trackRef });
    this.name = 'DecryptionContextError';
  }
}

/**
 * Job-level failure: the only error shape that crosses the orchestrator boundary
 */
export class AcquisitionError extends TunegrabError {
  public readonly reason: FailureReason;
  public readonly retryable: boolean;
  public readonly retryAfterMs?: number;

  constructor(
    reason: FailureReason,
    message: string,
    options: { retryable?: boolean; retryAfterMs?: number; cause?: unknown } = {}
  ) {
    super(message, `ACQUISITION_${reason.toUpperCase()}`, 500, { reason });
    this.name = 'AcquisitionError';
    this.reason = reason;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
