/**
 * slskd Transport
 *
 * Peer-network transfers through the slskd daemon REST API.
 * API key authentication via the X-API-Key header.
 *
 * Track references name the peer and the remote file:
 *   `<username>::<remote path>`   e.g. `some-peer::Music\Artist\01 Track.flac`
 *
 * Completed files are read from the daemon's downloads directory, where
 * slskd places them under the remote file's parent directory name.
 */

import { createReadStream } from 'node:fs';
import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { TransportError, ValidationError, type Credential } from '@tunegrab/core';
import { createLogger, remoteBasename, remoteParentDir } from '@tunegrab/utils';
import { httpRequest, readJson, withTrailingSlash } from './http.js';
import type {
  PeerTransferTransport,
  RemoteTransferStatus,
  TrackMetadata,
  TransferInitiation,
} from './types.js';

const logger = createLogger({ component: 'slskd-transport' });

export const PEER_REF_SEPARATOR = '::';

export interface SlskdTransportConfig {
  backendId: string;
  baseUrl: string;
  apiKey: string;
  downloadsDir: string;
  requestTimeoutMs: number;
}

const transferFileSchema = z.object({
  id: z.string().optional(),
  filename: z.string(),
  state: z.string(),
  size: z.number().nonnegative().optional(),
  bytesTransferred: z.number().nonnegative().optional(),
  exception: z.string().nullish(),
});

const userTransfersSchema = z.object({
  username: z.string(),
  directories: z.array(z.object({
    directory: z.string(),
    files: z.array(transferFileSchema),
  })).default([]),
});

/**
 * Split a track reference into peer and remote file
 */
export function parsePeerTrackRef(trackRef: string): TransferInitiation {
  const separator = trackRef.indexOf(PEER_REF_SEPARATOR);
  const peerRef = separator > 0 ? trackRef.slice(0, separator) : '';
  const remoteFileRef = separator > 0 ? trackRef.slice(separator + PEER_REF_SEPARATOR.length) : '';
  if (!peerRef || !remoteFileRef) {
    throw new ValidationError('trackRef', `expected "<username>${PEER_REF_SEPARATOR}<remote path>", got "${trackRef}"`);
  }
  return { peerRef, remoteFileRef };
}

export class SlskdTransport implements PeerTransferTransport {
  readonly backendId: string;
  private readonly config: SlskdTransportConfig;
  private readonly baseUrl: string;

  constructor(config: SlskdTransportConfig) {
    this.config = config;
    this.backendId = config.backendId;
    this.baseUrl = withTrailingSlash(config.baseUrl);
  }

  private url(path: string): string {
    return new URL(path, this.baseUrl).toString();
  }

  private headers(credential: Credential, extra: Record<string, string> = {}): Record<string, string> {
    return { ...extra, 'X-API-Key': credential.accessToken };
  }

  /**
   * The API key is the credential; it does not expire
   */
  async authenticate(): Promise<Credential> {
    return {
      backendId: this.backendId,
      accessToken: this.config.apiKey,
      scope: 'api-key',
    };
  }

  async fetchMetadata(trackRef: string): Promise<TrackMetadata> {
    const { remoteFileRef } = parsePeerTrackRef(trackRef);
    return {
      trackRef,
      title: remoteBasename(remoteFileRef),
    };
  }

  async initiateTransfer(trackRef: string, credential: Credential): Promise<TransferInitiation> {
    const initiation = parsePeerTrackRef(trackRef);

    await httpRequest(this.url(`transfers/downloads/${encodeURIComponent(initiation.peerRef)}`), {
      backendId: this.backendId,
      method: 'POST',
      headers: this.headers(credential, { 'Content-Type': 'application/json' }),
      body: JSON.stringify([{ filename: initiation.remoteFileRef }]),
      timeoutMs: this.config.requestTimeoutMs,
    });

    logger.info({ backendId: this.backendId, peer: initiation.peerRef }, 'Transfer enqueued');
    return initiation;
  }

  async pollTransferStatus(
    peerRef: string,
    remoteFileRef: string,
    credential: Credential
  ): Promise<RemoteTransferStatus | null> {
    let response: Response;
    try {
      response = await httpRequest(this.url(`transfers/downloads/${encodeURIComponent(peerRef)}`), {
        backendId: this.backendId,
        headers: this.headers(credential, { Accept: 'application/json' }),
        timeoutMs: this.config.requestTimeoutMs,
      });
    } catch (error) {
      if (error instanceof TransportError && error.kind === 'NotFound') {
        return null;
      }
      throw error;
    }

    const transfers = await readJson(response, userTransfersSchema, this.backendId);
    const file = transfers.directories
      .flatMap((directory) => directory.files)
      .find((candidate) => candidate.filename === remoteFileRef);

    if (!file) return null;

    return {
      state: file.state,
      bytesTransferred: file.bytesTransferred,
      size: file.size,
      message: file.exception ?? undefined,
    };
  }

  /**
   * Local path of a completed download
   */
  localPathFor(remoteFileRef: string): string {
    const parent = remoteParentDir(remoteFileRef);
    const name = remoteBasename(remoteFileRef);
    return parent ? join(this.config.downloadsDir, parent, name) : join(this.config.downloadsDir, name);
  }

  async *retrieveTransferred(_peerRef: string, remoteFileRef: string): AsyncGenerator<Uint8Array> {
    const path = this.localPathFor(remoteFileRef);
    try {
      await access(path);
    } catch (error) {
      throw new TransportError('NotFound', `Completed transfer not found at ${path}`, {
        backendId: this.backendId,
        cause: error,
      });
    }

    const stream = createReadStream(path, { highWaterMark: 64 * 1024 });
    for await (const chunk of stream) {
      if (chunk instanceof Uint8Array) {
        yield chunk;
      }
    }
  }
}
