/**
 * Engine Configuration
 *
 * Engine-wide policy comes from the environment; backend definitions come
 * from a JSON file. Both are validated with zod before anything is wired.
 *
 * String values of the form `$env:NAME` inside backend definitions are
 * replaced with the named environment variable, so secrets stay out of the file.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

/** Longest delay a Node timer honours; larger values fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

const delayMs = () => z.coerce.number().int().min(0).max(MAX_TIMER_MS);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Retry policy (backends may override)
  TUNEGRAB_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(4),
  TUNEGRAB_BACKOFF_INITIAL_MS: delayMs().default(1000),
  TUNEGRAB_BACKOFF_MAX_MS: delayMs().default(30000),
  TUNEGRAB_BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2),
  TUNEGRAB_JITTER_RATIO: z.coerce.number().min(0).max(1).default(0.2),

  // Job settings
  TUNEGRAB_JOB_TIMEOUT_MS: delayMs().min(1000).default(900000), // 15 minutes
  TUNEGRAB_TIMEOUT_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
  TUNEGRAB_REFRESH_SKEW_MS: z.coerce.number().int().min(0).default(60000),
  TUNEGRAB_RETAIN_FINISHED: z.coerce.number().int().min(0).default(500),

  // Persistence
  TUNEGRAB_CREDENTIALS_DIR: z.string().min(1).default(join(homedir(), '.tunegrab', 'credentials')),
  TUNEGRAB_REDIS_URL: z.string().min(1).optional(),
  TUNEGRAB_BACKENDS_FILE: z.string().min(1).default('./backends.json'),
});

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterRatio: number;
}

export interface EnginePolicy {
  retry: RetryPolicy;
  jobTimeoutMs: number;
  /** How many times a stalled transfer queue may be retried after timing out. */
  timeoutRetries: number;
  refreshSkewMs: number;
  retainFinishedJobs: number;
}

export interface EngineConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  policy: EnginePolicy;
  credentialsDir: string;
  redisUrl?: string;
  backendsFile: string;
}

const backendIdSchema = z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'lowercase letters, digits, "-" and "_" only');

const rateSchema = z.object({
  minIntervalMs: z.number().int().min(0).max(MAX_TIMER_MS),
  burstAllowance: z.number().int().min(0).default(0),
});

const retryOverrideSchema = z.object({
  maxAttempts: z.number().int().min(1).max(20),
  initialDelayMs: z.number().int().min(0).max(MAX_TIMER_MS),
  maxDelayMs: z.number().int().min(0).max(MAX_TIMER_MS),
  backoffMultiplier: z.number().min(1),
  jitterRatio: z.number().min(0).max(1),
}).partial();

const oauthSchema = z.object({
  tokenUrl: z.string().url(),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1).optional(),
  scope: z.string().default(''),
});

const streamSchema = z.object({
  chunkSize: z.number().int().positive().refine((size) => size % 16 === 0, 'must be a multiple of 16 bytes'),
  keyDerivation: z.enum(['md5-xor', 'hkdf-sha256']),
  keySeed: z.string().min(1),
  ordered: z.boolean().default(true),
  chunkRetries: z.number().int().min(0).max(10),
}).superRefine((stream, ctx) => {
  if (stream.keyDerivation === 'md5-xor' && Buffer.byteLength(stream.keySeed, 'utf8') !== 16) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['keySeed'],
      message: 'md5-xor key derivation needs a 16-byte seed',
    });
  }
});

const encryptedStreamBackendSchema = z.object({
  id: backendIdSchema,
  delivery: z.literal('encrypted-stream'),
  baseUrl: z.string().url(),
  auth: oauthSchema,
  rate: rateSchema,
  retry: retryOverrideSchema.optional(),
  requestTimeoutMs: z.number().int().min(100).max(MAX_TIMER_MS).default(15000),
  stream: streamSchema,
});

const peerTransferBackendSchema = z.object({
  id: backendIdSchema,
  delivery: z.literal('peer-transfer'),
  baseUrl: z.string().url(),
  apiKey: z.string().min(1),
  downloadsDir: z.string().min(1),
  rate: rateSchema,
  retry: retryOverrideSchema.optional(),
  requestTimeoutMs: z.number().int().min(100).max(MAX_TIMER_MS).default(15000),
  transfer: z.object({
    pollIntervalMs: z.number().int().min(1).max(MAX_TIMER_MS),
    maxQueuedPolls: z.number().int().min(1),
  }),
});

export const backendDefinitionSchema = z.discriminatedUnion('delivery', [
  encryptedStreamBackendSchema,
  peerTransferBackendSchema,
]);

const backendsFileSchema = z.object({
  backends: z.array(backendDefinitionSchema),
}).superRefine((file, ctx) => {
  const seen = new Set<string>();
  file.backends.forEach((backend, index) => {
    if (seen.has(backend.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['backends', index, 'id'],
        message: `duplicate backend id "${backend.id}"`,
      });
    }
    seen.add(backend.id);
  });
});

export type BackendDefinition = z.infer<typeof backendDefinitionSchema>;
export type EncryptedStreamBackendDefinition = z.infer<typeof encryptedStreamBackendSchema>;
export type PeerTransferBackendDefinition = z.infer<typeof peerTransferBackendSchema>;
export type RetryOverride = z.infer<typeof retryOverrideSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse engine configuration from environment variables
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parseResult = envSchema.safeParse(env);
  if (!parseResult.success) {
    throw new ValidationError('environment', formatIssues(parseResult.error));
  }

  const parsed = parseResult.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    policy: {
      retry: {
        maxAttempts: parsed.TUNEGRAB_MAX_ATTEMPTS,
        initialDelayMs: parsed.TUNEGRAB_BACKOFF_INITIAL_MS,
        maxDelayMs: parsed.TUNEGRAB_BACKOFF_MAX_MS,
        backoffMultiplier: parsed.TUNEGRAB_BACKOFF_MULTIPLIER,
        jitterRatio: parsed.TUNEGRAB_JITTER_RATIO,
      },
      jobTimeoutMs: parsed.TUNEGRAB_JOB_TIMEOUT_MS,
      timeoutRetries: parsed.TUNEGRAB_TIMEOUT_RETRIES,
      refreshSkewMs: parsed.TUNEGRAB_REFRESH_SKEW_MS,
      retainFinishedJobs: parsed.TUNEGRAB_RETAIN_FINISHED,
    },
    credentialsDir: parsed.TUNEGRAB_CREDENTIALS_DIR,
    redisUrl: parsed.TUNEGRAB_REDIS_URL,
    backendsFile: parsed.TUNEGRAB_BACKENDS_FILE,
  };
}

const ENV_REFERENCE = /^\$env:([A-Za-z_][A-Za-z0-9_]*)$/;

/**
 * Replace `$env:NAME` strings anywhere in a parsed JSON value
 */
export function resolveEnvReferences(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    const match = ENV_REFERENCE.exec(value);
    if (!match?.[1]) return value;
    const resolved = env[match[1]];
    if (resolved === undefined) {
      throw new ValidationError('backends', `environment variable ${match[1]} is not set`);
    }
    return resolved;
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvReferences(item, env));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, resolveEnvReferences(item, env)])
    );
  }
  return value;
}

/**
 * Validate the contents of a backends file
 */
export function parseBackendDefinitions(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): BackendDefinition[] {
  const parseResult = backendsFileSchema.safeParse(resolveEnvReferences(raw, env));
  if (!parseResult.success) {
    throw new ValidationError('backends', formatIssues(parseResult.error));
  }
  return parseResult.data.backends;
}

/**
 * Engine retry policy with a backend's overrides applied
 */
export function resolveRetryPolicy(base: RetryPolicy, override?: RetryOverride): RetryPolicy {
  return {
    maxAttempts: override?.maxAttempts ?? base.maxAttempts,
    initialDelayMs: override?.initialDelayMs ?? base.initialDelayMs,
    maxDelayMs: override?.maxDelayMs ?? base.maxDelayMs,
    backoffMultiplier: override?.backoffMultiplier ?? base.backoffMultiplier,
    jitterRatio: override?.jitterRatio ?? base.jitterRatio,
  };
}
