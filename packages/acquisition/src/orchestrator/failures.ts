/**
 * Failure classification
 *
 * Translates component errors into job-level failures. Nothing else
 * crosses the orchestrator boundary.
 */

import {
  AcquisitionError,
  AdmissionCancelledError,
  AuthExpiredError,
  DecryptionContextError,
  OutOfSequenceChunkError,
  TransportError,
} from '@tunegrab/core';

export function isAuthDenial(error: unknown): boolean {
  return error instanceof TransportError && error.kind === 'Auth';
}

export function isTransientTransportError(error: unknown): boolean {
  return error instanceof TransportError
    && (error.kind === 'Transport' || error.kind === 'RateLimited' || error.kind === 'Timeout');
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map any error raised during an attempt to a job failure.
 * An aborted job signal wins: its reason says why the job stopped.
 */
export function classifyFailure(error: unknown, signal?: AbortSignal): AcquisitionError {
  if (signal?.aborted) {
    const reason: unknown = signal.reason;
    return reason instanceof AcquisitionError
      ? reason
      : new AcquisitionError('Cancelled', 'Job cancelled', { cause: reason });
  }

  if (error instanceof AcquisitionError) return error;

  if (error instanceof AuthExpiredError) {
    return new AcquisitionError('Auth', error.message, { cause: error });
  }

  if (error instanceof TransportError) {
    switch (error.kind) {
      case 'Auth':
        return new AcquisitionError('Auth', error.message, { cause: error });
      case 'NotFound':
        return new AcquisitionError('NotFound', error.message, { cause: error });
      case 'RateLimited':
        return new AcquisitionError('RateLimited', error.message, {
          retryable: true,
          retryAfterMs: error.retryAfterMs,
          cause: error,
        });
      case 'Transport':
        return new AcquisitionError('Transport', error.message, { retryable: true, cause: error });
      case 'Timeout':
        return new AcquisitionError('Timeout', error.message, { retryable: true, cause: error });
    }
  }

  if (error instanceof AdmissionCancelledError) {
    return new AcquisitionError('Cancelled', error.message, { cause: error });
  }

  if (error instanceof OutOfSequenceChunkError || error instanceof DecryptionContextError) {
    return new AcquisitionError('OutOfSequenceChunk', error.message, { cause: error });
  }

  return new AcquisitionError('Transport', messageOf(error), { cause: error });
}
