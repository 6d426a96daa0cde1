/**
 * Credential serialization shared by the persistent repositories
 */

import { z } from 'zod';
import type { Credential } from '@tunegrab/core';

export const storedCredentialSchema = z.object({
  backendId: z.string().min(1),
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  expiresAt: z.string().datetime().optional(),
  scope: z.string().default(''),
});

export type StoredCredential = z.infer<typeof storedCredentialSchema>;

export function toStored(credential: Credential): StoredCredential {
  return {
    backendId: credential.backendId,
    accessToken: credential.accessToken,
    refreshToken: credential.refreshToken,
    expiresAt: credential.expiresAt?.toISOString(),
    scope: credential.scope,
  };
}

export function fromStored(stored: StoredCredential): Credential {
  return {
    backendId: stored.backendId,
    accessToken: stored.accessToken,
    refreshToken: stored.refreshToken,
    expiresAt: stored.expiresAt ? new Date(stored.expiresAt) : undefined,
    scope: stored.scope,
  };
}
