/**
 * @tunegrab/acquisition
 *
 * Unified acquisition engine:
 * - Credential store and repositories
 * - Per-backend rate governor
 * - Chunk decryptor
 * - Transfer poller
 * - Job orchestrator
 * - Backend transports and output sinks
 */

// Credentials
export {
  CredentialStore,
  type CredentialProvider,
  type CredentialStoreOptions,
} from './credentials/credentialStore.js';
export { InMemoryCredentialRepository } from './credentials/memoryCredentialRepository.js';
export { FileCredentialRepository } from './credentials/fileCredentialRepository.js';
export {
  RedisCredentialRepository,
  createRedisClient,
  type RedisCredentialClient,
} from './credentials/redisCredentialRepository.js';

// Rate limiting
export { RateGovernor, type RateBudget, type AdmitOptions } from './rate/rateGovernor.js';

// Decryption
export {
  ChunkDecryptor,
  type EncryptedStreamContext,
  type StreamContextOptions,
} from './crypto/chunkDecryptor.js';
export { deriveKey, type KeyMaterial, type DerivedKey } from './crypto/keyDerivation.js';

// Peer transfers
export {
  TransferPoller,
  TransferState,
  mapRemoteState,
  isTerminalTransferState,
  type PeerTransferHandle,
} from './transfer/transferPoller.js';

// Transports
export type {
  AuthHint,
  BackendBinding,
  BaseTransport,
  ByteRange,
  EncryptedStreamTransport,
  KeyDerivationScheme,
  PeerTransferTransport,
  RemoteTransferStatus,
  StreamSettings,
  TrackMetadata,
  TransferInitiation,
  TransferSettings,
} from './transport/types.js';
export { HttpStreamTransport, type HttpStreamTransportConfig } from './transport/httpStreamTransport.js';
export {
  SlskdTransport,
  parsePeerTrackRef,
  PEER_REF_SEPARATOR,
  type SlskdTransportConfig,
} from './transport/slskdTransport.js';

// Sinks
export { FileSink } from './sinks/fileSink.js';

// Orchestration
export {
  JobOrchestrator,
  type JobOrchestratorOptions,
  type JobStateEvent,
} from './orchestrator/jobOrchestrator.js';
export { classifyFailure } from './orchestrator/failures.js';

// Composition
export { createEngine, bindBackend, type Engine, type CreateEngineOptions } from './engine.js';
