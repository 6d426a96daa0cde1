import { describe, it, expect } from 'vitest';
import {
  AcquisitionError,
  AuthExpiredError,
  TransportError,
  TunegrabError,
} from '../src/errors/index.js';

describe('error taxonomy', () => {
  it('derives the code from the transport error kind', () => {
    const error = new TransportError('RateLimited', 'slow down', { status: 429, retryAfterMs: 2000 });
    expect(error).toBeInstanceOf(TunegrabError);
    expect(error.code).toBe('TRANSPORT_RATELIMITED');
    expect(error.statusCode).toBe(429);
    expect(error.retryAfterMs).toBe(2000);
  });

  it('defaults transport errors without a status to 502', () => {
    expect(new TransportError('Transport', 'socket hang up').statusCode).toBe(502);
  });

  it('keeps the cause on job-level failures', () => {
    const cause = new AuthExpiredError('catalog');
    const error = new AcquisitionError('Auth', cause.message, { cause });
    expect(error.reason).toBe('Auth');
    expect(error.retryable).toBe(false);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Credential for catalog expired and cannot be refreshed');
  });
});
