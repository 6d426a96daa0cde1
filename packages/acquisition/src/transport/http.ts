/**
 * HTTP helpers shared by the backend transports.
 * Every failure leaves here as a TransportError with a kind.
 */

import type { z } from 'zod';
import { TransportError, type TransportErrorKind } from '@tunegrab/core';

export interface HttpRequestOptions {
  backendId: string;
  method?: string;
  headers?: Record<string, string>;
  body?: string | URLSearchParams;
  timeoutMs: number;
  /** Map these statuses to Auth in addition to 401/403. */
  authStatuses?: number[];
  /** Hand these non-2xx responses back to the caller instead of throwing. */
  acceptStatuses?: number[];
}

/**
 * Normalise a base URL so relative paths resolve beneath it
 */
export function withTrailingSlash(baseUrl: string): string {
  return baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Track length from the `Content-Range` header of a 416 response
 */
export function parseUnsatisfiedRange(header: string | null): number | undefined {
  const match = header ? /^bytes \*\/(\d+)$/.exec(header.trim()) : null;
  return match?.[1] ? Number(match[1]) : undefined;
}

export function kindForStatus(status: number, authStatuses: number[] = []): TransportErrorKind {
  if (status === 401 || status === 403 || authStatuses.includes(status)) return 'Auth';
  if (status === 404) return 'NotFound';
  if (status === 429) return 'RateLimited';
  return 'Transport';
}

export async function httpRequest(url: string, options: HttpRequestOptions): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      headers: options.headers,
      body: options.body,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new TransportError('Timeout', `Request to ${url} timed out after ${options.timeoutMs}ms`, {
        backendId: options.backendId,
        cause: error,
      });
    }
    throw new TransportError('Transport', `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`, {
      backendId: options.backendId,
      cause: error,
    });
  }

  if (!response.ok && !options.acceptStatuses?.includes(response.status)) {
    const kind = kindForStatus(response.status, options.authStatuses);
    throw new TransportError(kind, `${options.method ?? 'GET'} ${url} returned ${response.status} ${response.statusText}`, {
      backendId: options.backendId,
      status: response.status,
      retryAfterMs: kind === 'RateLimited' ? parseRetryAfter(response.headers.get('retry-after')) : undefined,
    });
  }

  return response;
}

/**
 * Read a JSON body and validate it against a schema
 */
export async function readJson<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>, backendId: string): Promise<T> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new TransportError('Transport', `Response from ${response.url || backendId} is not JSON`, {
      backendId,
      cause: error,
    });
  }

  const parseResult = schema.safeParse(body);
  if (!parseResult.success) {
    throw new TransportError('Transport', `Unexpected response shape from ${backendId}: ${parseResult.error.issues[0]?.message ?? 'invalid'}`, {
      backendId,
      cause: parseResult.error,
    });
  }
  return parseResult.data;
}
