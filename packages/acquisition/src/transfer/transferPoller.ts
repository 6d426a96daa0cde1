/**
 * Transfer Poller
 *
 * Tracks a peer-mediated transfer through snapshots. Each poll makes one
 * status query and returns a new handle; scheduling and poll limits are
 * the caller's business.
 *
 * State Flow:
 * INITIATED → QUEUED → TRANSFERRING → COMPLETED | FAILED | NOT_FOUND
 */

import type { Credential } from '@tunegrab/core';
import { createLogger } from '@tunegrab/utils';
import type { PeerTransferTransport, RemoteTransferStatus } from '../transport/types.js';

const logger = createLogger({ component: 'transfer-poller' });

export const TransferState = {
  INITIATED: 'INITIATED',
  QUEUED: 'QUEUED',
  TRANSFERRING: 'TRANSFERRING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  NOT_FOUND: 'NOT_FOUND',
} as const;

export type TransferState = (typeof TransferState)[keyof typeof TransferState];

export interface PeerTransferHandle {
  readonly jobId: string;
  readonly peerRef: string;
  readonly remoteFileRef: string;
  readonly remoteState: TransferState;
  readonly pollCount: number;
  readonly bytesTransferred?: number;
  readonly size?: number;
  readonly remoteMessage?: string;
}

const stateRank: Record<TransferState, number> = {
  INITIATED: 0,
  QUEUED: 1,
  TRANSFERRING: 2,
  COMPLETED: 3,
  FAILED: 3,
  NOT_FOUND: 3,
};

const FAILURE_WORDS = new Set(['failed', 'errored', 'cancelled', 'rejected', 'aborted', 'timedout']);
const COMPLETION_WORDS = new Set(['succeeded', 'completed']);
const ACTIVE_WORDS = new Set(['inprogress', 'transferring']);
const QUEUE_WORDS = new Set(['queued', 'initializing', 'requested', 'remotely', 'locally']);

export function isTerminalTransferState(state: TransferState): boolean {
  return state === 'COMPLETED' || state === 'FAILED' || state === 'NOT_FOUND';
}

/**
 * Map a remote state string to a transfer state.
 * Accepts slskd flag lists ("Completed, Errored") and plain words.
 * Returns null for vocabulary it does not recognise.
 */
export function mapRemoteState(remote: string): TransferState | null {
  const words = remote
    .split(/[,|]/)
    .map((word) => word.trim().toLowerCase().replace(/[\s_-]/g, ''))
    .filter((word) => word.length > 0);

  // "Completed, Errored" is a failure, so failure words win over completion
  if (words.some((word) => FAILURE_WORDS.has(word))) return 'FAILED';
  if (words.some((word) => COMPLETION_WORDS.has(word))) return 'COMPLETED';
  if (words.some((word) => ACTIVE_WORDS.has(word))) return 'TRANSFERRING';
  if (words.some((word) => QUEUE_WORDS.has(word))) return 'QUEUED';
  return null;
}

function nextState(previous: TransferState, status: RemoteTransferStatus | null): TransferState {
  if (status === null) return 'NOT_FOUND';

  let mapped = mapRemoteState(status.state) ?? previous;
  if ((status.bytesTransferred ?? 0) > 0 && stateRank[mapped] < stateRank.TRANSFERRING) {
    mapped = 'TRANSFERRING';
  }
  // Non-terminal states never go backwards
  if (!isTerminalTransferState(mapped) && stateRank[mapped] < stateRank[previous]) {
    return previous;
  }
  return mapped;
}

export class TransferPoller {
  constructor(private readonly transport: PeerTransferTransport) {}

  initiate(jobId: string, peerRef: string, remoteFileRef: string): PeerTransferHandle {
    return {
      jobId,
      peerRef,
      remoteFileRef,
      remoteState: 'INITIATED',
      pollCount: 0,
    };
  }

  /**
   * Query the remote side once and return the updated snapshot
   */
  async poll(handle: PeerTransferHandle, credential: Credential): Promise<PeerTransferHandle> {
    if (isTerminalTransferState(handle.remoteState)) {
      return handle;
    }

    const status = await this.transport.pollTransferStatus(handle.peerRef, handle.remoteFileRef, credential);
    const remoteState = nextState(handle.remoteState, status);

    if (remoteState !== handle.remoteState) {
      logger.debug({
        jobId: handle.jobId,
        from: handle.remoteState,
        to: remoteState,
        remote: status?.state,
      }, 'Transfer state changed');
    }

    return {
      ...handle,
      remoteState,
      pollCount: handle.pollCount + 1,
      bytesTransferred: status?.bytesTransferred ?? handle.bytesTransferred,
      size: status?.size ?? handle.size,
      remoteMessage: status?.message ?? handle.remoteMessage,
    };
  }
}
