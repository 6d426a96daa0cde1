/**
 * HTTP Stream Transport
 *
 * OAuth2 bearer catalog serving encrypted audio in byte ranges.
 *
 * Endpoints (relative to baseUrl):
 * - GET tracks/:id          track metadata
 * - GET tracks/:id/stream   encrypted bytes, honours Range
 *
 * Tokens come from the configured token URL through the
 * client-credentials and refresh-token grants.
 */

import { z } from 'zod';
import { TransportError, type Credential } from '@tunegrab/core';
import { createLogger } from '@tunegrab/utils';
import { httpRequest, parseUnsatisfiedRange, readJson, withTrailingSlash } from './http.js';
import type {
  AuthHint,
  ByteRange,
  EncryptedStreamTransport,
  TrackMetadata,
} from './types.js';

const logger = createLogger({ component: 'http-stream-transport' });

export interface HttpStreamTransportConfig {
  backendId: string;
  baseUrl: string;
  auth: {
    tokenUrl: string;
    clientId: string;
    clientSecret?: string;
    scope: string;
  };
  requestTimeoutMs: number;
  now?: () => number;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive().optional(),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
});

const trackMetadataSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string().optional(),
  size: z.number().int().nonnegative().optional(),
  keySeed: z.string().min(1).optional(),
  mimeType: z.string().optional(),
});

export class HttpStreamTransport implements EncryptedStreamTransport {
  readonly backendId: string;
  private readonly config: HttpStreamTransportConfig;
  private readonly baseUrl: string;
  private readonly now: () => number;

  constructor(config: HttpStreamTransportConfig) {
    this.config = config;
    this.backendId = config.backendId;
    this.baseUrl = withTrailingSlash(config.baseUrl);
    this.now = config.now ?? Date.now;
  }

  private url(path: string): string {
    return new URL(path, this.baseUrl).toString();
  }

  private trackPath(trackRef: string, suffix = ''): string {
    return `tracks/${encodeURIComponent(trackRef)}${suffix}`;
  }

  /**
   * Client-credentials grant
   */
  async authenticate(hint?: AuthHint): Promise<Credential> {
    const { clientId, clientSecret, scope } = this.config.auth;
    if (!clientSecret) {
      throw new TransportError('Auth', `${this.backendId} has no client secret; store a credential first`, {
        backendId: this.backendId,
      });
    }

    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: clientId,
      client_secret: clientSecret,
    });
    const requestedScope = hint?.scope ?? scope;
    if (requestedScope) form.set('scope', requestedScope);

    const credential = await this.requestToken(form, requestedScope);
    logger.info({ backendId: this.backendId }, 'Obtained client-credentials token');
    return credential;
  }

  /**
   * Refresh-token grant
   */
  async refresh(credential: Credential): Promise<Credential> {
    if (!credential.refreshToken) {
      throw new TransportError('Auth', `${this.backendId} credential has no refresh token`, {
        backendId: this.backendId,
      });
    }

    const form = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: credential.refreshToken,
      client_id: this.config.auth.clientId,
    });
    if (this.config.auth.clientSecret) {
      form.set('client_secret', this.config.auth.clientSecret);
    }

    return this.requestToken(form, credential.scope);
  }

  async fetchMetadata(trackRef: string, credential: Credential): Promise<TrackMetadata> {
    const response = await httpRequest(this.url(this.trackPath(trackRef)), {
      backendId: this.backendId,
      headers: this.authHeaders(credential, { Accept: 'application/json' }),
      timeoutMs: this.config.requestTimeoutMs,
    });
    const metadata = await readJson(response, trackMetadataSchema, this.backendId);

    return {
      trackRef,
      size: metadata.size,
      keySeed: metadata.keySeed,
      title: metadata.title,
      mimeType: metadata.mimeType,
    };
  }

  async fetchEncryptedBytes(trackRef: string, range: ByteRange, credential: Credential): Promise<Uint8Array> {
    const url = this.url(this.trackPath(trackRef, '/stream'));
    const response = await httpRequest(url, {
      backendId: this.backendId,
      headers: this.authHeaders(credential, { Range: `bytes=${range.start}-${range.end - 1}` }),
      timeoutMs: this.config.requestTimeoutMs,
      acceptStatuses: [416],
    });

    if (response.status === 416) {
      await response.body?.cancel();
      // A range starting at or past the end of the track is the end of the stream
      const total = parseUnsatisfiedRange(response.headers.get('content-range'));
      if (total !== undefined && range.start < total) {
        throw new TransportError('Transport', `GET ${url} returned 416 for offset ${range.start} of ${total} bytes`, {
          backendId: this.backendId,
          status: 416,
        });
      }
      return new Uint8Array(0);
    }

    const body = new Uint8Array(await response.arrayBuffer());
    // Servers that ignore Range send the whole file
    if (response.status === 200 && body.length > range.end - range.start) {
      return body.subarray(range.start, range.end);
    }
    return body;
  }

  private authHeaders(credential: Credential, extra: Record<string, string> = {}): Record<string, string> {
    return {
      ...extra,
      Authorization: `Bearer ${credential.accessToken}`,
    };
  }

  private async requestToken(form: URLSearchParams, scope: string): Promise<Credential> {
    const response = await httpRequest(this.config.auth.tokenUrl, {
      backendId: this.backendId,
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: form,
      timeoutMs: this.config.requestTimeoutMs,
      // invalid_grant and invalid_client come back as 400
      authStatuses: [400],
    });
    const token = await readJson(response, tokenResponseSchema, this.backendId);

    return {
      backendId: this.backendId,
      accessToken: token.access_token,
      refreshToken: token.refresh_token,
      expiresAt: token.expires_in !== undefined
        ? new Date(this.now() + token.expires_in * 1000)
        : undefined,
      scope: token.scope ?? scope,
    };
  }
}
