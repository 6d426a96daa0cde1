import { join, resolve } from 'node:path';
import { describe, it, expect } from 'vitest';
import { parseBackendDefinitions } from '@tunegrab/core';
import { buildCredential } from '../src/commands/auth.js';
import { describeBackend } from '../src/commands/backends.js';
import { defaultFileName, resolveDestination } from '../src/lib/destination.js';
import { formatBytes } from '../src/lib/output.js';

describe('destination', () => {
  const cwd = resolve('/music');

  it('names peer downloads after the remote file', () => {
    expect(defaultFileName('peer-transfer', 'alice::@@share\\Albums\\Intro: Live.flac')).toBe('Intro_ Live.flac');
  });

  it('names stream downloads after the track reference', () => {
    expect(defaultFileName('encrypted-stream', 'catalog/track/42')).toBe('catalog_track_42');
  });

  it('treats an output with an extension as the file', () => {
    expect(resolveDestination('encrypted-stream', 'trk-1', 'out/song.flac', cwd)).toBe(join(cwd, 'out', 'song.flac'));
  });

  it('treats an output without an extension as a directory', () => {
    expect(resolveDestination('peer-transfer', 'bob::music/track.ogg', 'inbox', cwd)).toBe(join(cwd, 'inbox', 'track.ogg'));
  });

  it('defaults to the working directory', () => {
    expect(resolveDestination('encrypted-stream', 'trk-1', undefined, cwd)).toBe(join(cwd, 'trk-1'));
  });

  it('rejects peer references without a username', () => {
    expect(() => defaultFileName('peer-transfer', 'music/track.ogg')).toThrow('Validation failed for trackRef');
  });
});

describe('buildCredential', () => {
  const now = 1_700_000_000_000;

  it('converts expires-in seconds to an absolute expiry', () => {
    const credential = buildCredential('catalog', {
      accessToken: 'test-token',
      refreshToken: 'test-refresh',
      expiresIn: '3600',
      scope: 'stream',
    }, now);

    expect(credential).toEqual({
      backendId: 'catalog',
      accessToken: 'test-token',
      refreshToken: 'test-refresh',
      expiresAt: new Date(now + 3_600_000),
      scope: 'stream',
    });
  });

  it('leaves optional fields out when not given', () => {
    expect(buildCredential('catalog', { accessToken: 'test-token', scope: '' }, now)).toEqual({
      backendId: 'catalog',
      accessToken: 'test-token',
      scope: '',
    });
  });

  it('rejects a non-positive lifetime', () => {
    expect(() => buildCredential('catalog', { accessToken: 'test-token', scope: '', expiresIn: '-5' }, now))
      .toThrow('Validation failed for expires-in: expected a positive number of seconds');
  });
});

describe('describeBackend', () => {
  it('summarises each delivery mode', () => {
    const [stream, peers] = parseBackendDefinitions({
      backends: [
        {
          id: 'catalog',
          delivery: 'encrypted-stream',
          baseUrl: 'https://catalog.example.test/v1/',
          auth: { tokenUrl: 'https://catalog.example.test/oauth/token', clientId: 'test-client' },
          rate: { minIntervalMs: 250, burstAllowance: 2 },
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

    expect(stream && describeBackend(stream)).toEqual({
      id: 'catalog',
      delivery: 'encrypted-stream',
      baseUrl: 'https://catalog.example.test/v1/',
      minIntervalMs: 250,
      burst: 2,
      detail: 'hkdf-sha256, 2048-byte chunks',
    });
    expect(peers && describeBackend(peers)).toMatchObject({ burst: 0, detail: 'polls every 2000ms' });
  });
});

describe('formatBytes', () => {
  it('picks a binary unit', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(196_608)).toBe('192.0 KiB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MiB');
  });
});
