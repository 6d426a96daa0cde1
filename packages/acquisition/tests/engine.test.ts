import { describe, it, expect } from 'vitest';
import { parseBackendDefinitions, type EngineConfig } from '@tunegrab/core';
import { bindBackend, createEngine } from '../src/engine.js';
import { InMemoryCredentialRepository } from '../src/credentials/memoryCredentialRepository.js';
import { HttpStreamTransport } from '../src/transport/httpStreamTransport.js';
import { SlskdTransport } from '../src/transport/slskdTransport.js';

const config: EngineConfig = {
  nodeEnv: 'test',
  logLevel: 'silent',
  policy: {
    retry: { maxAttempts: 4, initialDelayMs: 1000, maxDelayMs: 30000, backoffMultiplier: 2, jitterRatio: 0.2 },
    jobTimeoutMs: 60000,
    timeoutRetries: 1,
    refreshSkewMs: 60000,
    retainFinishedJobs: 10,
  },
  credentialsDir: '/tmp/tunegrab-test-credentials',
  backendsFile: './backends.json',
};

const backends = parseBackendDefinitions({
  backends: [
    {
      id: 'catalog',
      delivery: 'encrypted-stream',
      baseUrl: 'https://catalog.example.test/v1/',
      auth: { tokenUrl: 'https://catalog.example.test/oauth/token', clientId: 'test-client' },
      rate: { minIntervalMs: 250, burstAllowance: 2 },
      retry: { maxAttempts: 2 },
      stream: { chunkSize: 2048, keyDerivation: 'hkdf-sha256', keySeed: 'test-secret', chunkRetries: 1 },
    },
    {
      id: 'peers',
      delivery: 'peer-transfer',
      baseUrl: 'http://localhost:5030/api/v0/',
      apiKey: 'test-api-key',
      downloadsDir: '/tmp/downloads',
      rate: { minIntervalMs: 0 },
      transfer: { pollIntervalMs: 2000, maxQueuedPolls: 30 },
    },
  ],
}, {});

describe('bindBackend', () => {
  it('binds each delivery mode to its transport', () => {
    const [catalog, peers] = backends.map((definition) => bindBackend(definition, config));

    expect(catalog?.delivery).toBe('encrypted-stream');
    expect(catalog?.transport).toBeInstanceOf(HttpStreamTransport);
    expect(peers?.transport).toBeInstanceOf(SlskdTransport);
  });

  it('merges backend retry overrides into the engine policy', () => {
    const [catalog, peers] = backends.map((definition) => bindBackend(definition, config));

    expect(catalog?.retry).toEqual({ ...config.policy.retry, maxAttempts: 2 });
    expect(peers?.retry).toBeUndefined();
  });
});

describe('createEngine', () => {
  it('configures rate budgets and registers every backend', async () => {
    const engine = createEngine({ config, backends, repository: new InMemoryCredentialRepository() });

    expect(engine.orchestrator.backendIds()).toEqual(['catalog', 'peers']);
    expect(engine.governor.snapshot('catalog')).toMatchObject({ minIntervalMs: 250, burstAllowance: 2 });
    await expect(engine.credentials.ensureValid('peers')).resolves.toMatchObject({ accessToken: 'test-api-key' });

    await engine.close();
  });
});
