/**
 * Redis Credential Repository
 *
 * Stores credentials as JSON strings; keys expire together with the
 * credential so Redis never serves a token past its lifetime.
 */

import { Redis } from 'ioredis';
import type { Credential, CredentialRepository } from '@tunegrab/core';
import { createLogger } from '@tunegrab/utils';
import { fromStored, storedCredentialSchema, toStored } from './serialization.js';

const logger = createLogger({ component: 'redis-credentials' });

/**
 * The subset of the ioredis client this repository talks to
 */
export interface RedisCredentialClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  pexpireat(key: string, unixTimeMs: number): Promise<unknown>;
  del(key: string): Promise<unknown>;
  quit(): Promise<unknown>;
}

export function createRedisClient(redisUrl: string): RedisCredentialClient {
  const redis = new Redis(redisUrl, { lazyConnect: true, maxRetriesPerRequest: 3 });
  return {
    get: (key) => redis.get(key),
    set: (key, value) => redis.set(key, value),
    pexpireat: (key, unixTimeMs) => redis.pexpireat(key, unixTimeMs),
    del: (key) => redis.del(key),
    quit: () => redis.quit(),
  };
}

export class RedisCredentialRepository implements CredentialRepository {
  private readonly keyPrefix = 'tunegrab:credential:';

  constructor(private readonly redis: RedisCredentialClient) {}

  private key(backendId: string): string {
    return `${this.keyPrefix}${backendId}`;
  }

  async load(backendId: string): Promise<Credential | null> {
    const data = await this.redis.get(this.key(backendId));
    if (data === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      logger.warn({ backendId, error: error instanceof Error ? error.message : String(error) }, 'Stored credential is not valid JSON, ignoring');
      return null;
    }

    const parseResult = storedCredentialSchema.safeParse(raw);
    if (!parseResult.success) {
      logger.warn({ backendId }, 'Stored credential failed validation, ignoring');
      return null;
    }
    return fromStored(parseResult.data);
  }

  async save(backendId: string, credential: Credential): Promise<void> {
    const key = this.key(backendId);
    await this.redis.set(key, JSON.stringify(toStored({ ...credential, backendId })));
    // Keep refreshable credentials: the refresh token outlives the access token
    if (credential.expiresAt && !credential.refreshToken) {
      await this.redis.pexpireat(key, credential.expiresAt.getTime());
    }
  }

  async remove(backendId: string): Promise<void> {
    await this.redis.del(this.key(backendId));
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
