/**
 * Chunk Decryptor
 *
 * AES-128-CTR over fixed-size chunks. The counter block for chunk `n` is
 * `nonce || uint64be(n * chunkSize / 16)`, so every chunk decrypts on its
 * own and a contiguous range decrypts with a single cipher.
 *
 * A chunk shorter than `chunkSize` ends the stream. No integrity checks.
 */

import { createDecipheriv } from 'node:crypto';
import {
  DecryptionContextError,
  OutOfSequenceChunkError,
  ValidationError,
} from '@tunegrab/core';
import { deriveKey, type KeyMaterial } from './keyDerivation.js';

const BLOCK_SIZE = 16;

export interface StreamContextOptions extends KeyMaterial {
  chunkSize: number;
  ordered: boolean;
}

export interface EncryptedStreamContext {
  readonly trackRef: string;
  readonly derivedKey: Buffer;
  readonly nonce: Buffer;
  readonly chunkSize: number;
  readonly ordered: boolean;
  /** Next expected index when ordered; highest seen + 1 otherwise. */
  chunkIndex: number;
  finalChunkIndex: number | null;
  disposed: boolean;
}

function counterBlock(nonce: Buffer, blockOffset: number): Buffer {
  const counter = Buffer.alloc(BLOCK_SIZE);
  nonce.copy(counter, 0);
  counter.writeBigUInt64BE(BigInt(blockOffset), BLOCK_SIZE - 8);
  return counter;
}

export class ChunkDecryptor {
  /**
   * Start a fresh context for one attempt
   */
  begin(trackRef: string, options: StreamContextOptions): EncryptedStreamContext {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0 || options.chunkSize % BLOCK_SIZE !== 0) {
      throw new ValidationError('chunkSize', `must be a positive multiple of ${BLOCK_SIZE}, got ${options.chunkSize}`);
    }

    const { key, nonce } = deriveKey(options, trackRef);
    return {
      trackRef,
      derivedKey: key,
      nonce,
      chunkSize: options.chunkSize,
      ordered: options.ordered,
      chunkIndex: 0,
      finalChunkIndex: null,
      disposed: false,
    };
  }

  decrypt(context: EncryptedStreamContext, chunkIndex: number, encryptedChunk: Uint8Array): Buffer {
    if (encryptedChunk.length > context.chunkSize) {
      throw new DecryptionContextError(
        context.trackRef,
        `Chunk ${chunkIndex} is ${encryptedChunk.length} bytes, larger than the ${context.chunkSize}-byte chunk size`
      );
    }
    return this.decryptRange(context, chunkIndex, encryptedChunk);
  }

  /**
   * Decrypt consecutive chunks starting at `startChunk` in one pass.
   * Equivalent to decrypting each chunk in turn.
   */
  decryptRange(context: EncryptedStreamContext, startChunk: number, bytes: Uint8Array): Buffer {
    this.assertLive(context);
    if (!Number.isInteger(startChunk) || startChunk < 0) {
      throw new DecryptionContextError(context.trackRef, `Invalid chunk index ${startChunk}`);
    }
    if (context.ordered && startChunk !== context.chunkIndex) {
      throw new OutOfSequenceChunkError(context.trackRef, context.chunkIndex, startChunk);
    }

    const chunkCount = Math.max(1, Math.ceil(bytes.length / context.chunkSize));
    const lastChunk = startChunk + chunkCount - 1;
    if (context.finalChunkIndex !== null && lastChunk > context.finalChunkIndex) {
      throw new DecryptionContextError(
        context.trackRef,
        `Chunk ${lastChunk} comes after the final chunk ${context.finalChunkIndex}`
      );
    }

    const decipher = createDecipheriv(
      'aes-128-ctr',
      context.derivedKey,
      counterBlock(context.nonce, (startChunk * context.chunkSize) / BLOCK_SIZE)
    );
    const plaintext = Buffer.concat([decipher.update(bytes), decipher.final()]);

    if (bytes.length % context.chunkSize !== 0 || bytes.length === 0) {
      context.finalChunkIndex = lastChunk;
    }
    context.chunkIndex = context.ordered
      ? lastChunk + 1
      : Math.max(context.chunkIndex, lastChunk + 1);

    return plaintext;
  }

  /**
   * Zero the key material. Any later use of the context is an error.
   */
  end(context: EncryptedStreamContext): void {
    context.derivedKey.fill(0);
    context.nonce.fill(0);
    context.disposed = true;
  }

  private assertLive(context: EncryptedStreamContext): void {
    if (context.disposed) {
      throw new DecryptionContextError(context.trackRef, `Decryption context for ${context.trackRef} has ended`);
    }
  }
}
