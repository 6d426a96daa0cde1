import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { loadBackendsFile, loadCliConfig } from '../src/config/index.js';

const peerBackend = {
  id: 'peers',
  delivery: 'peer-transfer',
  baseUrl: 'http://localhost:5030/api/v0/',
  apiKey: '$env:SLSKD_API_KEY',
  downloadsDir: '/srv/slskd/downloads',
  rate: { minIntervalMs: 500 },
  transfer: { pollIntervalMs: 2000, maxQueuedPolls: 30 },
};

describe('CLI configuration', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'tunegrab-cli-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('loads backends and resolves environment references', async () => {
    const file = join(directory, 'backends.json');
    await writeFile(file, JSON.stringify({ backends: [peerBackend] }));

    const [backend] = await loadBackendsFile(file, { SLSKD_API_KEY: 'test-api-key' });

    expect(backend).toMatchObject({
      id: 'peers',
      apiKey: 'test-api-key',
      rate: { minIntervalMs: 500, burstAllowance: 0 },
      requestTimeoutMs: 15000,
    });
  });

  it('reports a missing backends file', async () => {
    const file = join(directory, 'missing.json');
    await expect(loadBackendsFile(file, {})).rejects.toThrow(
      `Validation failed for backends: ${file} does not exist`
    );
  });

  it('reports malformed JSON', async () => {
    const file = join(directory, 'backends.json');
    await writeFile(file, '{ "backends": [');
    await expect(loadBackendsFile(file, {})).rejects.toThrow(`${file} is not valid JSON`);
  });

  it('combines engine settings with the backends file they name', async () => {
    const file = join(directory, 'backends.json');
    await writeFile(file, JSON.stringify({ backends: [peerBackend] }));

    const config = await loadCliConfig({
      TUNEGRAB_BACKENDS_FILE: file,
      TUNEGRAB_MAX_ATTEMPTS: '2',
      SLSKD_API_KEY: 'test-api-key',
    });

    expect(config.engine.backendsFile).toBe(file);
    expect(config.engine.policy.retry.maxAttempts).toBe(2);
    expect(config.backends.map((backend) => backend.id)).toEqual(['peers']);
  });
});
