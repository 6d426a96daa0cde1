/**
 * Credential Store
 *
 * Hands out credentials that are valid for at least one more request.
 * Expired or invalidated credentials are refreshed through the backend's
 * provider when a refresh token exists, otherwise re-obtained through
 * non-interactive authentication when the backend supports it.
 *
 * Resolution is coalesced per backend: concurrent callers share one
 * in-flight load/refresh.
 */

import {
  AuthExpiredError,
  TransportError,
  type Credential,
  type CredentialRepository,
} from '@tunegrab/core';
import { createLogger } from '@tunegrab/utils';
import type { AuthHint } from '../transport/types.js';

const logger = createLogger({ component: 'credential-store' });

export interface CredentialProvider {
  authenticate?(hint?: AuthHint): Promise<Credential>;
  refresh?(credential: Credential): Promise<Credential>;
}

export interface CredentialStoreOptions {
  repository: CredentialRepository;
  providers?: Record<string, CredentialProvider>;
  /** Refresh this long before expiry. */
  refreshSkewMs?: number;
  now?: () => number;
}

function isAuthDenied(error: unknown): boolean {
  return error instanceof TransportError && error.kind === 'Auth';
}

export class CredentialStore {
  private readonly repository: CredentialRepository;
  private readonly providers = new Map<string, CredentialProvider>();
  private readonly refreshSkewMs: number;
  private readonly now: () => number;

  private readonly cache = new Map<string, Credential>();
  private readonly invalidated = new Set<string>();
  private readonly inFlight = new Map<string, Promise<Credential>>();

  constructor(options: CredentialStoreOptions) {
    this.repository = options.repository;
    this.refreshSkewMs = options.refreshSkewMs ?? 60_000;
    this.now = options.now ?? Date.now;
    for (const [backendId, provider] of Object.entries(options.providers ?? {})) {
      this.providers.set(backendId, provider);
    }
  }

  registerProvider(backendId: string, provider: CredentialProvider): void {
    this.providers.set(backendId, provider);
  }

  /**
   * Return a credential usable for at least one request
   */
  async ensureValid(backendId: string): Promise<Credential> {
    const cached = this.cache.get(backendId);
    if (cached && this.isUsable(backendId, cached)) {
      return cached;
    }

    const pending = this.inFlight.get(backendId);
    if (pending) return pending;

    const resolution = this.resolve(backendId).finally(() => {
      this.inFlight.delete(backendId);
    });
    this.inFlight.set(backendId, resolution);
    return resolution;
  }

  /**
   * Persist a freshly obtained credential, replacing any prior one
   */
  async store(backendId: string, credential: Credential): Promise<void> {
    const normalized = { ...credential, backendId };
    await this.repository.save(backendId, normalized);
    this.cache.set(backendId, normalized);
    this.invalidated.delete(backendId);
  }

  /**
   * Mark the current credential unusable; the next ensureValid refreshes or fails
   */
  invalidate(backendId: string): void {
    this.invalidated.add(backendId);
    logger.info({ backendId }, 'Credential invalidated');
  }

  private isUsable(backendId: string, credential: Credential): boolean {
    if (this.invalidated.has(backendId)) return false;
    if (!credential.expiresAt) return true;
    return credential.expiresAt.getTime() - this.now() > this.refreshSkewMs;
  }

  private async resolve(backendId: string): Promise<Credential> {
    let current = this.cache.get(backendId) ?? null;
    if (!current) {
      current = await this.repository.load(backendId);
      if (current) this.cache.set(backendId, current);
    }

    if (current && this.isUsable(backendId, current)) {
      return current;
    }

    const provider = this.providers.get(backendId);

    if (current?.refreshToken && provider?.refresh) {
      logger.info({ backendId }, 'Refreshing credential');
      let refreshed: Credential;
      try {
        refreshed = await provider.refresh(current);
      } catch (error) {
        if (isAuthDenied(error)) {
          throw new AuthExpiredError(backendId, `Refresh rejected for ${backendId}`);
        }
        throw error;
      }
      const credential = {
        ...refreshed,
        refreshToken: refreshed.refreshToken ?? current.refreshToken,
      };
      await this.store(backendId, credential);
      return credential;
    }

    if (provider?.authenticate) {
      logger.info({ backendId, reason: current ? 'expired' : 'missing' }, 'Authenticating');
      let credential: Credential;
      try {
        credential = await provider.authenticate();
      } catch (error) {
        if (isAuthDenied(error)) {
          throw new AuthExpiredError(backendId, `Authentication rejected for ${backendId}`);
        }
        throw error;
      }
      await this.store(backendId, credential);
      return credential;
    }

    throw new AuthExpiredError(
      backendId,
      current ? undefined : `No credential stored for ${backendId}`
    );
  }
}
