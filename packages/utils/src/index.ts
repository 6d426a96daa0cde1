/**
 * @tunegrab/utils
 *
 * Shared utilities package containing:
 * - Structured logging
 * - Retry and backoff
 * - Abortable timers
 * - File and path helpers
 */

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  removeFile,
  moveFile,
} from './file.js';

// Retry logic
export { retry, backoffDelay, type RetryOptions, type BackoffOptions } from './retry.js';

// Path utilities
export {
  sanitizeFilename,
  getExtension,
  remoteBasename,
  remoteParentDir,
} from './path.js';

// Time utilities
export {
  sleep,
  abortable,
  formatDuration,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
