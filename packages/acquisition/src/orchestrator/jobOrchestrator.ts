/**
 * Job Orchestrator
 *
 * Drives each acquisition job through its state machine:
 *
 * QUEUED → AUTHORIZING → ADMITTED → FETCHING → DECRYPTING       → COMPLETED
 *                                            ↘ POLLING_TRANSFER ↗
 *
 * Owns the retry policy, the job-level timeout and cancellation. Every
 * suspension point takes the job's AbortSignal; a cancelled job stops at the
 * next one and the results of calls still in flight are discarded.
 *
 * Events:
 * - job:state      { jobId, from, to, reason }
 * - job:completed  JobStatus
 * - job:failed     JobStatus
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import {
  AcquisitionError,
  JobStateMachine,
  NotFoundError,
  TransportError,
  ValidationError,
  type AcquisitionJob,
  type Credential,
  type EnginePolicy,
  type JobState,
  type JobStateTransition,
  type JobStatus,
  type OutputSink,
  type RetryPolicy,
} from '@tunegrab/core';
import { abortable, backoffDelay, createLogger, retry, sleep } from '@tunegrab/utils';
import type { CredentialStore } from '../credentials/credentialStore.js';
import type { RateGovernor } from '../rate/rateGovernor.js';
import { ChunkDecryptor } from '../crypto/chunkDecryptor.js';
import { TransferPoller, type PeerTransferHandle } from '../transfer/transferPoller.js';
import type { BackendBinding, ByteRange } from '../transport/types.js';
import { classifyFailure, isAuthDenial, isTransientTransportError } from './failures.js';

const logger = createLogger({ component: 'orchestrator' });

type EncryptedStreamBinding = Extract<BackendBinding, { delivery: 'encrypted-stream' }>;
type PeerTransferBinding = Extract<BackendBinding, { delivery: 'peer-transfer' }>;

export interface JobOrchestratorOptions {
  credentials: CredentialStore;
  governor: RateGovernor;
  policy: EnginePolicy;
  backends?: BackendBinding[];
  decryptor?: ChunkDecryptor;
  random?: () => number;
}

export interface JobStateEvent {
  jobId: string;
  from: JobState;
  to: JobState;
  reason?: string;
}

interface JobRecord {
  job: AcquisitionJob;
  machine: JobStateMachine;
  controller: AbortController;
  dedupKey: string;
  reauthorized: boolean;
  timeoutRetriesUsed: number;
  sinkClosed: boolean;
  timeoutTimer?: NodeJS.Timeout;
  running: Promise<void>;
}

function dedupKeyFor(backendId: string, trackRef: string): string {
  return `${backendId}\u0000${trackRef}`;
}

export class JobOrchestrator extends EventEmitter {
  private readonly credentials: CredentialStore;
  private readonly governor: RateGovernor;
  private readonly policy: EnginePolicy;
  private readonly decryptor: ChunkDecryptor;
  private readonly random: () => number;

  private readonly bindings = new Map<string, BackendBinding>();
  private readonly jobs = new Map<string, JobRecord>();
  private readonly activeByTrack = new Map<string, string>();
  private readonly finishedOrder: string[] = [];

  constructor(options: JobOrchestratorOptions) {
    super();
    this.credentials = options.credentials;
    this.governor = options.governor;
    this.policy = options.policy;
    this.decryptor = options.decryptor ?? new ChunkDecryptor();
    this.random = options.random ?? Math.random;
    for (const binding of options.backends ?? []) {
      this.registerBackend(binding);
    }
  }

  registerBackend(binding: BackendBinding): void {
    this.bindings.set(binding.backendId, binding);
  }

  backendIds(): string[] {
    return Array.from(this.bindings.keys());
  }

  /**
   * Submit a job. A live job for the same backend and track is reused
   * and its jobId returned; the new sink is then left untouched.
   */
  submit(backendId: string, trackRef: string, outputSink: OutputSink): string {
    if (!this.bindings.has(backendId)) {
      throw new ValidationError('backendId', `unknown backend "${backendId}"`);
    }
    if (trackRef.trim().length === 0) {
      throw new ValidationError('trackRef', 'must not be empty');
    }

    const dedupKey = dedupKeyFor(backendId, trackRef);
    const existing = this.activeByTrack.get(dedupKey);
    if (existing) {
      logger.debug({ jobId: existing, backendId, trackRef }, 'Duplicate submission, reusing job');
      return existing;
    }

    const jobId = randomUUID();
    const now = new Date();
    const record: JobRecord = {
      job: {
        jobId,
        backendId,
        trackRef,
        state: 'QUEUED',
        attempt: 1,
        createdAt: now,
        updatedAt: now,
        outputSink,
        bytesWritten: 0,
      },
      machine: new JobStateMachine(jobId),
      controller: new AbortController(),
      dedupKey,
      reauthorized: false,
      timeoutRetriesUsed: 0,
      sinkClosed: false,
      running: Promise.resolve(),
    };

    record.timeoutTimer = setTimeout(() => {
      record.controller.abort(
        new AcquisitionError('Timeout', `Job exceeded ${this.policy.jobTimeoutMs}ms`)
      );
    }, this.policy.jobTimeoutMs);

    this.jobs.set(jobId, record);
    this.activeByTrack.set(dedupKey, jobId);

    logger.info({ jobId, backendId, trackRef }, 'Job submitted');

    // Start on a later tick so callers see QUEUED and can subscribe first
    record.running = Promise.resolve().then(() => this.run(record)).catch((error: unknown) => {
      logger.error({ jobId, error: error instanceof Error ? error.message : String(error) }, 'Job runner crashed');
    });

    return jobId;
  }

  /**
   * Synchronous snapshot of a job
   */
  status(jobId: string): JobStatus {
    return this.snapshot(this.getRecord(jobId));
  }

  list(): JobStatus[] {
    return Array.from(this.jobs.values(), (record) => this.snapshot(record));
  }

  history(jobId: string): ReadonlyArray<JobStateTransition> {
    return this.getRecord(jobId).machine.getHistory();
  }

  /**
   * Request cancellation. Returns false when the job already finished.
   */
  cancel(jobId: string): boolean {
    const record = this.getRecord(jobId);
    if (record.machine.isTerminal() || record.controller.signal.aborted) {
      return false;
    }
    logger.info({ jobId }, 'Cancellation requested');
    record.controller.abort(new AcquisitionError('Cancelled', 'Job cancelled'));
    return true;
  }

  /**
   * Resolve with the job's terminal status
   */
  async waitFor(jobId: string): Promise<JobStatus> {
    const record = this.getRecord(jobId);
    await record.running;
    return this.snapshot(record);
  }

  /**
   * Cancel every live job and wait for all of them to settle
   */
  async shutdown(): Promise<void> {
    const records = Array.from(this.jobs.values());
    for (const record of records) {
      if (!record.machine.isTerminal()) {
        record.controller.abort(new AcquisitionError('Cancelled', 'Engine shutting down'));
      }
    }
    await Promise.all(records.map((record) => record.running));
  }

  private getRecord(jobId: string): JobRecord {
    const record = this.jobs.get(jobId);
    if (!record) {
      throw new NotFoundError('Job', jobId);
    }
    return record;
  }

  private snapshot(record: JobRecord): JobStatus {
    const { job } = record;
    return {
      jobId: job.jobId,
      backendId: job.backendId,
      trackRef: job.trackRef,
      state: job.state,
      attempt: job.attempt,
      lastError: job.lastError ? { ...job.lastError } : undefined,
      bytesWritten: job.bytesWritten,
      createdAt: job.createdAt,
      updatedAt: job.updatedAt,
    };
  }

  private transition(
    record: JobRecord,
    target: JobState,
    reason?: string,
    metadata?: Record<string, unknown>
  ): void {
    const transition = record.machine.transitionTo(target, reason, metadata);
    record.job.state = transition.to;
    record.job.updatedAt = transition.timestamp;

    logger.debug({ jobId: record.job.jobId, from: transition.from, to: transition.to, reason }, 'Job state changed');
    const event: JobStateEvent = { jobId: record.job.jobId, from: transition.from, to: transition.to, reason };
    this.emit('job:state', event);
  }

  private retryPolicyFor(binding: BackendBinding): RetryPolicy {
    return binding.retry ?? this.policy.retry;
  }

  private async run(record: JobRecord): Promise<void> {
    const { job } = record;
    const signal = record.controller.signal;
    const binding = this.bindings.get(job.backendId);
    if (!binding) {
      await this.finishFailed(record, new AcquisitionError('NotFound', `Backend ${job.backendId} is not registered`));
      return;
    }
    const retryPolicy = this.retryPolicyFor(binding);

    try {
      for (;;) {
        try {
          await this.attempt(record, binding, retryPolicy);
          this.finishCompleted(record);
          return;
        } catch (error) {
          if (isAuthDenial(error) && !record.reauthorized && !signal.aborted) {
            record.reauthorized = true;
            this.credentials.invalidate(job.backendId);
            logger.warn({ jobId: job.jobId, backendId: job.backendId }, 'Authorization denied, re-authorizing once');
            this.transition(record, 'AUTHORIZING', 'authorization denied');
            await this.rewindSink(record);
            continue;
          }

          const failure = classifyFailure(error, signal);
          job.lastError = { reason: failure.reason, message: failure.message, at: new Date() };

          if (!this.shouldRetry(record, failure, retryPolicy)) {
            await this.finishFailed(record, failure);
            return;
          }

          const delayMs = failure.retryAfterMs !== undefined
            ? Math.min(failure.retryAfterMs, retryPolicy.maxDelayMs)
            : backoffDelay(job.attempt, {
                initialDelay: retryPolicy.initialDelayMs,
                maxDelay: retryPolicy.maxDelayMs,
                backoffMultiplier: retryPolicy.backoffMultiplier,
                jitterRatio: retryPolicy.jitterRatio,
                random: this.random,
              });

          logger.warn({
            jobId: job.jobId,
            attempt: job.attempt,
            reason: failure.reason,
            error: failure.message,
            delayMs,
          }, 'Attempt failed, retrying');

          job.attempt += 1;
          this.transition(record, 'AUTHORIZING', `retry ${job.attempt} after ${failure.reason}`, {
            delayMs,
            error: failure.message,
          });
          await this.rewindSink(record);
          await sleep(delayMs, signal);
        }
      }
    } catch (error) {
      // Aborted backoff, or a sink that could not be rewound
      await this.finishFailed(record, classifyFailure(error, signal));
    }
  }

  private shouldRetry(record: JobRecord, failure: AcquisitionError, retryPolicy: RetryPolicy): boolean {
    if (!failure.retryable) return false;
    if (record.job.attempt >= retryPolicy.maxAttempts) return false;
    if (failure.reason === 'Timeout') {
      if (record.timeoutRetriesUsed >= this.policy.timeoutRetries) return false;
      record.timeoutRetriesUsed += 1;
    }
    return true;
  }

  private async attempt(record: JobRecord, binding: BackendBinding, retryPolicy: RetryPolicy): Promise<void> {
    const { job } = record;
    const signal = record.controller.signal;

    if (record.machine.getState() !== 'AUTHORIZING') {
      this.transition(record, 'AUTHORIZING', `attempt ${job.attempt}`);
    }
    const credential = await abortable(this.credentials.ensureValid(job.backendId), signal);

    await this.governor.admit(job.backendId, { signal });
    this.transition(record, 'ADMITTED');

    this.transition(record, 'FETCHING');
    switch (binding.delivery) {
      case 'encrypted-stream':
        await this.fetchEncryptedStream(record, binding, credential, retryPolicy);
        break;
      case 'peer-transfer':
        await this.fetchPeerTransfer(record, binding, credential);
        break;
    }
  }

  private async fetchEncryptedStream(
    record: JobRecord,
    binding: EncryptedStreamBinding,
    credential: Credential,
    retryPolicy: RetryPolicy
  ): Promise<void> {
    const { job } = record;
    const { transport, stream } = binding;
    const signal = record.controller.signal;

    const metadata = await abortable(transport.fetchMetadata(job.trackRef, credential), signal);
    this.transition(record, 'DECRYPTING', metadata.size !== undefined ? `${metadata.size} bytes` : 'size unknown');

    const context = this.decryptor.begin(job.trackRef, {
      scheme: stream.keyDerivation,
      seed: metadata.keySeed ?? stream.keySeed,
      chunkSize: stream.chunkSize,
      ordered: stream.ordered,
    });

    try {
      for (let chunkIndex = 0; ; chunkIndex++) {
        const start = chunkIndex * stream.chunkSize;
        if (metadata.size !== undefined && start >= metadata.size) break;

        const end = metadata.size !== undefined
          ? Math.min(metadata.size, start + stream.chunkSize)
          : start + stream.chunkSize;

        signal.throwIfAborted();
        const encrypted = await this.fetchChunk(record, binding, credential, retryPolicy, {
          start,
          end,
        }, metadata.size !== undefined);
        // Nothing past the end of a stream whose size was not reported
        if (encrypted.length === 0) break;

        const plaintext = this.decryptor.decrypt(context, chunkIndex, encrypted);
        await job.outputSink.write(plaintext);
        job.bytesWritten += plaintext.length;
        job.updatedAt = new Date();

        if (encrypted.length < stream.chunkSize) break;
      }
    } finally {
      this.decryptor.end(context);
    }

    await this.closeSink(record);
  }

  /**
   * One chunk, retried on transient transport errors
   */
  private fetchChunk(
    record: JobRecord,
    binding: EncryptedStreamBinding,
    credential: Credential,
    retryPolicy: RetryPolicy,
    range: ByteRange,
    exactLength: boolean
  ): Promise<Uint8Array> {
    const { job } = record;
    const signal = record.controller.signal;
    const expected = range.end - range.start;

    return retry(async () => {
      const bytes = await abortable(
        binding.transport.fetchEncryptedBytes(job.trackRef, range, credential),
        signal
      );
      if (bytes.length > expected || (exactLength && bytes.length !== expected)) {
        throw new TransportError('Transport', `Expected ${expected} bytes at offset ${range.start}, got ${bytes.length}`, {
          backendId: job.backendId,
        });
      }
      return bytes;
    }, {
      maxAttempts: binding.stream.chunkRetries + 1,
      initialDelay: retryPolicy.initialDelayMs,
      maxDelay: retryPolicy.maxDelayMs,
      backoffMultiplier: retryPolicy.backoffMultiplier,
      jitterRatio: retryPolicy.jitterRatio,
      random: this.random,
      signal,
      retryIf: (error) => !signal.aborted && isTransientTransportError(error),
      onRetry: (error, attempt, delayMs) => {
        logger.warn({
          jobId: job.jobId,
          offset: range.start,
          attempt,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        }, 'Chunk fetch failed, retrying');
      },
    });
  }

  private async fetchPeerTransfer(
    record: JobRecord,
    binding: PeerTransferBinding,
    credential: Credential
  ): Promise<void> {
    const { job } = record;
    const { transport, transfer } = binding;
    const signal = record.controller.signal;
    const poller = new TransferPoller(transport);

    const initiation = await abortable(transport.initiateTransfer(job.trackRef, credential), signal);
    this.transition(record, 'POLLING_TRANSFER', `peer ${initiation.peerRef}`);

    let handle: PeerTransferHandle = poller.initiate(job.jobId, initiation.peerRef, initiation.remoteFileRef);

    for (;;) {
      await sleep(transfer.pollIntervalMs, signal);
      handle = await abortable(poller.poll(handle, credential), signal);
      job.updatedAt = new Date();

      switch (handle.remoteState) {
        case 'COMPLETED':
          await this.copyTransferred(record, binding, credential, handle);
          await this.closeSink(record);
          return;
        case 'NOT_FOUND':
          throw new AcquisitionError('NotFound', `Transfer of ${handle.remoteFileRef} from ${handle.peerRef} no longer exists`);
        case 'FAILED':
          throw new AcquisitionError(
            'Transport',
            `Remote transfer failed${handle.remoteMessage ? `: ${handle.remoteMessage}` : ''}`,
            { retryable: true }
          );
        case 'INITIATED':
        case 'QUEUED':
          if (handle.pollCount >= transfer.maxQueuedPolls) {
            throw new AcquisitionError(
              'Timeout',
              `Transfer still queued after ${handle.pollCount} polls`,
              { retryable: true }
            );
          }
          break;
        case 'TRANSFERRING':
          break;
      }
    }
  }

  private async copyTransferred(
    record: JobRecord,
    binding: PeerTransferBinding,
    credential: Credential,
    handle: PeerTransferHandle
  ): Promise<void> {
    const { job } = record;
    const signal = record.controller.signal;

    for await (const chunk of binding.transport.retrieveTransferred(handle.peerRef, handle.remoteFileRef, credential)) {
      signal.throwIfAborted();
      await job.outputSink.write(chunk);
      job.bytesWritten += chunk.length;
    }
    job.updatedAt = new Date();
  }

  private async rewindSink(record: JobRecord): Promise<void> {
    if (record.job.bytesWritten === 0) return;
    await record.job.outputSink.rewind();
    record.job.bytesWritten = 0;
  }

  private async closeSink(record: JobRecord): Promise<void> {
    record.sinkClosed = true;
    await record.job.outputSink.close('completed');
  }

  private finishCompleted(record: JobRecord): void {
    const { job } = record;
    this.transition(record, 'COMPLETED', `${job.bytesWritten} bytes`, {
      attempt: job.attempt,
      bytes: job.bytesWritten,
    });
    job.lastError = undefined;
    this.settle(record);

    logger.info({ jobId: job.jobId, backendId: job.backendId, bytes: job.bytesWritten, attempt: job.attempt }, 'Job completed');
    this.emit('job:completed', this.snapshot(record));
  }

  private async finishFailed(record: JobRecord, failure: AcquisitionError): Promise<void> {
    const { job } = record;

    if (!record.sinkClosed) {
      record.sinkClosed = true;
      try {
        await job.outputSink.close('failed');
      } catch (error) {
        logger.error({ jobId: job.jobId, error: error instanceof Error ? error.message : String(error) }, 'Failed to close output sink');
      }
    }

    job.lastError = { reason: failure.reason, message: failure.message, at: new Date() };
    if (!record.machine.isTerminal()) {
      this.transition(record, 'FAILED', failure.reason, {
        attempt: job.attempt,
        error: failure.message,
      });
    }
    this.settle(record);

    logger.warn({
      jobId: job.jobId,
      backendId: job.backendId,
      reason: failure.reason,
      error: failure.message,
      attempt: job.attempt,
    }, 'Job failed');
    this.emit('job:failed', this.snapshot(record));
  }

  private settle(record: JobRecord): void {
    if (record.timeoutTimer) {
      clearTimeout(record.timeoutTimer);
      record.timeoutTimer = undefined;
    }
    if (this.activeByTrack.get(record.dedupKey) === record.job.jobId) {
      this.activeByTrack.delete(record.dedupKey);
    }

    this.finishedOrder.push(record.job.jobId);
    while (this.finishedOrder.length > this.policy.retainFinishedJobs) {
      const evicted = this.finishedOrder.shift();
      if (evicted) this.jobs.delete(evicted);
    }
  }
}
