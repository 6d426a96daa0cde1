/**
 * @tunegrab/core
 *
 * Core package containing:
 * - Job state machine
 * - Error taxonomy
 * - Shared types
 * - Engine configuration
 */

// State machine
export {
  JobState,
  JobStateMachine,
  isValidTransition,
  getNextStates,
  isTerminalState,
} from './stateMachine.js';

export type {
  JobStateTransition,
} from './stateMachine.js';

// Types
export type {
  AcquisitionJob,
  FailureReason,
  JobError,
  JobStatus,
  OutputSink,
  SinkOutcome,
} from './types/job.js';

export type {
  Credential,
  CredentialRepository,
} from './types/credential.js';

// Errors
export {
  TunegrabError,
  ValidationError,
  StateTransitionError,
  NotFoundError,
  TransportError,
  AuthExpiredError,
  AdmissionCancelledError,
  OutOfSequenceChunkError,
  DecryptionContextError,
  AcquisitionError,
  type TransportErrorKind,
} from './errors/index.js';

// Engine configuration
export {
  loadEngineConfig,
  parseBackendDefinitions,
  resolveEnvReferences,
  resolveRetryPolicy,
  backendDefinitionSchema,
  MAX_TIMER_MS,
  type EngineConfig,
  type EnginePolicy,
  type RetryPolicy,
  type RetryOverride,
  type BackendDefinition,
  type EncryptedStreamBackendDefinition,
  type PeerTransferBackendDefinition,
} from './config/engine.js';
