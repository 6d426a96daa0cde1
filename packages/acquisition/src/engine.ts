/**
 * Engine
 *
 * Composition root: turns validated configuration into a wired
 * orchestrator with one transport, rate budget and credential
 * provider per backend.
 */

import {
  resolveRetryPolicy,
  type BackendDefinition,
  type CredentialRepository,
  type EngineConfig,
} from '@tunegrab/core';
import { createLogger } from '@tunegrab/utils';
import { CredentialStore, type CredentialProvider } from './credentials/credentialStore.js';
import { FileCredentialRepository } from './credentials/fileCredentialRepository.js';
import {
  RedisCredentialRepository,
  createRedisClient,
} from './credentials/redisCredentialRepository.js';
import { RateGovernor } from './rate/rateGovernor.js';
import { JobOrchestrator } from './orchestrator/jobOrchestrator.js';
import { HttpStreamTransport } from './transport/httpStreamTransport.js';
import { SlskdTransport } from './transport/slskdTransport.js';
import type { BackendBinding, BaseTransport } from './transport/types.js';

const logger = createLogger({ component: 'engine' });

export interface Engine {
  orchestrator: JobOrchestrator;
  credentials: CredentialStore;
  governor: RateGovernor;
  backends: BackendDefinition[];
  close(): Promise<void>;
}

export interface CreateEngineOptions {
  config: EngineConfig;
  backends: BackendDefinition[];
  /** Overrides the repository chosen from the config. */
  repository?: CredentialRepository;
}

/**
 * Build the transport binding for a backend definition
 */
export function bindBackend(definition: BackendDefinition, config: EngineConfig): BackendBinding {
  const retry = definition.retry ? resolveRetryPolicy(config.policy.retry, definition.retry) : undefined;

  switch (definition.delivery) {
    case 'encrypted-stream':
      return {
        delivery: 'encrypted-stream',
        backendId: definition.id,
        transport: new HttpStreamTransport({
          backendId: definition.id,
          baseUrl: definition.baseUrl,
          auth: definition.auth,
          requestTimeoutMs: definition.requestTimeoutMs,
        }),
        stream: definition.stream,
        retry,
      };
    case 'peer-transfer':
      return {
        delivery: 'peer-transfer',
        backendId: definition.id,
        transport: new SlskdTransport({
          backendId: definition.id,
          baseUrl: definition.baseUrl,
          apiKey: definition.apiKey,
          downloadsDir: definition.downloadsDir,
          requestTimeoutMs: definition.requestTimeoutMs,
        }),
        transfer: definition.transfer,
        retry,
      };
  }
}

function providerFor(transport: BaseTransport): CredentialProvider {
  const provider: CredentialProvider = {
    authenticate: (hint) => transport.authenticate(hint),
  };
  if (transport.refresh) {
    provider.refresh = transport.refresh.bind(transport);
  }
  return provider;
}

export function createEngine(options: CreateEngineOptions): Engine {
  const { config, backends } = options;

  let redisRepository: RedisCredentialRepository | undefined;
  let repository = options.repository;
  if (!repository) {
    if (config.redisUrl) {
      redisRepository = new RedisCredentialRepository(createRedisClient(config.redisUrl));
      repository = redisRepository;
    } else {
      repository = new FileCredentialRepository(config.credentialsDir);
    }
  }

  const credentials = new CredentialStore({
    repository,
    refreshSkewMs: config.policy.refreshSkewMs,
  });
  const governor = new RateGovernor();
  const orchestrator = new JobOrchestrator({
    credentials,
    governor,
    policy: config.policy,
  });

  for (const definition of backends) {
    const binding = bindBackend(definition, config);
    governor.configure(definition.id, definition.rate.minIntervalMs, definition.rate.burstAllowance);
    credentials.registerProvider(definition.id, providerFor(binding.transport));
    orchestrator.registerBackend(binding);
  }

  logger.info({ backends: backends.map((backend) => backend.id) }, 'Engine ready');

  return {
    orchestrator,
    credentials,
    governor,
    backends,
    async close() {
      await orchestrator.shutdown();
      await redisRepository?.close();
    },
  };
}
