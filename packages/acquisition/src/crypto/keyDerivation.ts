/**
 * Key Derivation
 *
 * Per-track key material for encrypted streams. Both schemes are
 * deterministic: the same seed and track always give the same key and nonce.
 */

import { createHash, hkdfSync } from 'node:crypto';
import { ValidationError } from '@tunegrab/core';
import type { KeyDerivationScheme } from '../transport/types.js';

export const KEY_LENGTH = 16;
export const NONCE_LENGTH = 8;

export interface KeyMaterial {
  scheme: KeyDerivationScheme;
  seed: string;
}

export interface DerivedKey {
  key: Buffer;
  nonce: Buffer;
}

/**
 * Fold the hex md5 of the track id onto itself and mix in a 16-byte seed
 */
function deriveMd5Xor(seed: string, trackRef: string): DerivedKey {
  const seedBytes = Buffer.from(seed, 'utf8');
  if (seedBytes.length !== KEY_LENGTH) {
    throw new ValidationError('keySeed', `md5-xor needs a ${KEY_LENGTH}-byte seed, got ${seedBytes.length}`);
  }

  const digest = Buffer.from(createHash('md5').update(trackRef, 'utf8').digest('hex'), 'ascii');
  const key = Buffer.alloc(KEY_LENGTH);
  for (let i = 0; i < KEY_LENGTH; i++) {
    key[i] = (digest[i] ?? 0) ^ (digest[i + KEY_LENGTH] ?? 0) ^ (seedBytes[i] ?? 0);
  }

  const nonce = createHash('md5')
    .update(seedBytes)
    .update(trackRef, 'utf8')
    .digest()
    .subarray(0, NONCE_LENGTH);

  return { key, nonce: Buffer.from(nonce) };
}

function deriveHkdf(seed: string, trackRef: string): DerivedKey {
  if (seed.length === 0) {
    throw new ValidationError('keySeed', 'hkdf-sha256 needs a non-empty seed');
  }
  const key = hkdfSync('sha256', seed, trackRef, 'tunegrab/stream-key', KEY_LENGTH);
  const nonce = hkdfSync('sha256', seed, trackRef, 'tunegrab/stream-nonce', NONCE_LENGTH);
  return { key: Buffer.from(key), nonce: Buffer.from(nonce) };
}

/**
 * Derive a 16-byte AES key and an 8-byte CTR nonce for a track
 */
export function deriveKey(material: KeyMaterial, trackRef: string): DerivedKey {
  switch (material.scheme) {
    case 'md5-xor':
      return deriveMd5Xor(material.seed, trackRef);
    case 'hkdf-sha256':
      return deriveHkdf(material.seed, trackRef);
  }
}
