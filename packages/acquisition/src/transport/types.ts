/**
 * Transport Types
 *
 * Capability sets a backend adapter exposes to the engine. The delivery
 * mode is fixed per backend and carried as the binding's tag.
 */

import type { Credential, RetryPolicy } from '@tunegrab/core';

/**
 * How a transport may obtain a credential without the user
 */
export interface AuthHint {
  scope?: string;
}

export interface TrackMetadata {
  trackRef: string;
  /** Total encrypted size in bytes, when the backend reports it. */
  size?: number;
  /** Server-supplied seed that overrides the configured key seed. */
  keySeed?: string;
  title?: string;
  mimeType?: string;
}

/** Inclusive start, exclusive end. */
export interface ByteRange {
  start: number;
  end: number;
}

export interface TransferInitiation {
  peerRef: string;
  remoteFileRef: string;
}

export interface RemoteTransferStatus {
  /** Raw state string as the remote daemon reports it. */
  state: string;
  bytesTransferred?: number;
  size?: number;
  message?: string;
}

export interface BaseTransport {
  readonly backendId: string;
  authenticate(hint?: AuthHint): Promise<Credential>;
  refresh?(credential: Credential): Promise<Credential>;
  fetchMetadata(trackRef: string, credential: Credential): Promise<TrackMetadata>;
}

export interface EncryptedStreamTransport extends BaseTransport {
  fetchEncryptedBytes(trackRef: string, range: ByteRange, credential: Credential): Promise<Uint8Array>;
}

export interface PeerTransferTransport extends BaseTransport {
  initiateTransfer(trackRef: string, credential: Credential): Promise<TransferInitiation>;
  /** Resolves `null` when the remote side no longer knows the transfer. */
  pollTransferStatus(peerRef: string, remoteFileRef: string, credential: Credential): Promise<RemoteTransferStatus | null>;
  retrieveTransferred(peerRef: string, remoteFileRef: string, credential: Credential): AsyncIterable<Uint8Array>;
}

export type KeyDerivationScheme = 'md5-xor' | 'hkdf-sha256';

export interface StreamSettings {
  chunkSize: number;
  keyDerivation: KeyDerivationScheme;
  keySeed: string;
  ordered: boolean;
  chunkRetries: number;
}

export interface TransferSettings {
  pollIntervalMs: number;
  maxQueuedPolls: number;
}

export type BackendBinding =
  | {
      delivery: 'encrypted-stream';
      backendId: string;
      transport: EncryptedStreamTransport;
      stream: StreamSettings;
      /** Overrides the engine retry policy for this backend. */
      retry?: RetryPolicy;
    }
  | {
      delivery: 'peer-transfer';
      backendId: string;
      transport: PeerTransferTransport;
      transfer: TransferSettings;
      retry?: RetryPolicy;
    };
