import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { TransportError, ValidationError } from '@tunegrab/core';
import { HttpStreamTransport } from '../src/transport/httpStreamTransport.js';
import { SlskdTransport, parsePeerTrackRef } from '../src/transport/slskdTransport.js';
import { parseRetryAfter } from '../src/transport/http.js';
import { fakeCredential } from './fakes.js';

const NOW = 1_700_000_000_000;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(...responses: Array<Response | Error>) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const next = responses.shift();
    if (!next) throw new Error('unexpected fetch');
    if (next instanceof Error) throw next;
    return next;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function requestOf(fetchMock: ReturnType<typeof stubFetch>, index = 0): { url: string; init: RequestInit } {
  const call = fetchMock.mock.calls[index];
  if (!call) throw new Error(`no fetch call ${index}`);
  return { url: String(call[0]), init: call[1] ?? {} };
}

function headerOf(init: RequestInit, name: string): string | undefined {
  const headers = init.headers;
  if (!headers || headers instanceof Headers || Array.isArray(headers)) return undefined;
  const value = headers[name];
  return typeof value === 'string' ? value : undefined;
}

async function expectTransportError(promise: Promise<unknown>): Promise<TransportError> {
  const error = await promise.then(() => undefined, (reason: unknown) => reason);
  if (!(error instanceof TransportError)) {
    throw new Error(`expected a TransportError, got ${String(error)}`);
  }
  return error;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('parseRetryAfter', () => {
  it('reads delta seconds and HTTP dates', () => {
    expect(parseRetryAfter('3')).toBe(3000);
    expect(parseRetryAfter(new Date(NOW + 5000).toUTCString(), NOW)).toBe(5000);
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('HttpStreamTransport', () => {
  const transport = new HttpStreamTransport({
    backendId: 'catalog',
    baseUrl: 'https://catalog.example.test/v1',
    auth: {
      tokenUrl: 'https://catalog.example.test/oauth/token',
      clientId: 'test-client',
      clientSecret: 'test-secret',
      scope: 'stream',
    },
    requestTimeoutMs: 1000,
    now: () => NOW,
  });
  const credential = fakeCredential('catalog');

  it('obtains a client-credentials token', async () => {
    const fetchMock = stubFetch(jsonResponse({ access_token: 'test-token', expires_in: 3600, token_type: 'Bearer' }));

    const result = await transport.authenticate();

    expect(result).toEqual({
      backendId: 'catalog',
      accessToken: 'test-token',
      refreshToken: undefined,
      expiresAt: new Date(NOW + 3_600_000),
      scope: 'stream',
    });
    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('https://catalog.example.test/oauth/token');
    expect(init.method).toBe('POST');
    expect(String(init.body)).toBe('grant_type=client_credentials&client_id=test-client&client_secret=test-secret&scope=stream');
  });

  it('refuses client credentials without a secret', async () => {
    const publicClient = new HttpStreamTransport({
      backendId: 'catalog',
      baseUrl: 'https://catalog.example.test/v1/',
      auth: { tokenUrl: 'https://catalog.example.test/oauth/token', clientId: 'test-client', scope: '' },
      requestTimeoutMs: 1000,
    });
    const error = await expectTransportError(publicClient.authenticate());
    expect(error.kind).toBe('Auth');
  });

  it('reports a rejected refresh token as an auth failure', async () => {
    stubFetch(jsonResponse({ error: 'invalid_grant' }, 400));

    const error = await expectTransportError(transport.refresh({ ...credential, refreshToken: 'test-refresh' }));

    expect(error.kind).toBe('Auth');
    expect(error.status).toBe(400);
  });

  it('fetches metadata with the bearer token', async () => {
    const fetchMock = stubFetch(jsonResponse({ id: 42, title: 'Test Track', size: 4096, keySeed: 'server-seed' }));

    const metadata = await transport.fetchMetadata('42', credential);

    expect(metadata).toEqual({ trackRef: '42', size: 4096, keySeed: 'server-seed', title: 'Test Track', mimeType: undefined });
    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('https://catalog.example.test/v1/tracks/42');
    expect(headerOf(init, 'Authorization')).toBe('Bearer test-token');
  });

  it('rejects metadata of the wrong shape', async () => {
    stubFetch(jsonResponse({ id: 42, size: 'large' }));
    const error = await expectTransportError(transport.fetchMetadata('42', credential));
    expect(error.kind).toBe('Transport');
  });

  it('requests byte ranges', async () => {
    const fetchMock = stubFetch(new Response(new Uint8Array([1, 2, 3, 4]), { status: 206 }));

    const bytes = await transport.fetchEncryptedBytes('42', { start: 16, end: 20 }, credential);

    expect(Array.from(bytes)).toEqual([1, 2, 3, 4]);
    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('https://catalog.example.test/v1/tracks/42/stream');
    expect(headerOf(init, 'Range')).toBe('bytes=16-19');
  });

  it('slices the range out of a full response', async () => {
    stubFetch(new Response(new Uint8Array([0, 1, 2, 3, 4, 5, 6, 7]), { status: 200 }));
    const bytes = await transport.fetchEncryptedBytes('42', { start: 2, end: 5 }, credential);
    expect(Array.from(bytes)).toEqual([2, 3, 4]);
  });

  it('treats an unsatisfiable range past the end as the end of the stream', async () => {
    stubFetch(
      new Response(null, { status: 416, headers: { 'Content-Range': 'bytes */1024' } }),
      new Response(null, { status: 416 }),
    );

    const atEnd = await transport.fetchEncryptedBytes('42', { start: 1024, end: 1536 }, credential);
    const unknownLength = await transport.fetchEncryptedBytes('42', { start: 2048, end: 2560 }, credential);

    expect(atEnd.length).toBe(0);
    expect(unknownLength.length).toBe(0);
  });

  it('fails an unsatisfiable range that starts inside the track', async () => {
    stubFetch(new Response(null, { status: 416, headers: { 'Content-Range': 'bytes */1024' } }));

    const error = await expectTransportError(transport.fetchEncryptedBytes('42', { start: 512, end: 1024 }, credential));

    expect(error.kind).toBe('Transport');
    expect(error.status).toBe(416);
    expect(error.message).toBe('GET https://catalog.example.test/v1/tracks/42/stream returned 416 for offset 512 of 1024 bytes');
  });

  it('reports a request cut off by its timeout as Timeout', async () => {
    stubFetch(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }));

    const error = await expectTransportError(transport.fetchMetadata('42', credential));

    expect(error.kind).toBe('Timeout');
    expect(error.message).toBe('Request to https://catalog.example.test/v1/tracks/42 timed out after 1000ms');
  });

  it('maps HTTP failures to transport error kinds', async () => {
    stubFetch(
      new Response('', { status: 401 }),
      new Response('', { status: 404 }),
      new Response('', { status: 429, headers: { 'Retry-After': '2' } }),
      new Response('', { status: 503 }),
      new TypeError('fetch failed'),
    );

    const kinds: Array<[string, number | undefined, number | undefined]> = [];
    for (let i = 0; i < 5; i++) {
      const error = await expectTransportError(transport.fetchMetadata('42', credential));
      kinds.push([error.kind, error.status, error.retryAfterMs]);
    }

    expect(kinds).toEqual([
      ['Auth', 401, undefined],
      ['NotFound', 404, undefined],
      ['RateLimited', 429, 2000],
      ['Transport', 503, undefined],
      ['Transport', undefined, undefined],
    ]);
  });
});

describe('parsePeerTrackRef', () => {
  it('splits the peer from the remote path', () => {
    expect(parsePeerTrackRef('test-peer::Music\\Artist\\01 Track.flac')).toEqual({
      peerRef: 'test-peer',
      remoteFileRef: 'Music\\Artist\\01 Track.flac',
    });
  });

  it('rejects references without both parts', () => {
    expect(() => parsePeerTrackRef('Music/track.flac')).toThrow(ValidationError);
    expect(() => parsePeerTrackRef('::Music/track.flac')).toThrow(ValidationError);
  });
});

describe('SlskdTransport', () => {
  let downloadsDir: string;
  let transport: SlskdTransport;
  const credential = fakeCredential('peers', 'test-api-key');
  const remoteFile = 'Music\\Artist\\01 Track.flac';

  beforeEach(async () => {
    downloadsDir = await mkdtemp(join(tmpdir(), 'tunegrab-downloads-'));
    transport = new SlskdTransport({
      backendId: 'peers',
      baseUrl: 'http://localhost:5030/api/v0/',
      apiKey: 'test-api-key',
      downloadsDir,
      requestTimeoutMs: 1000,
    });
  });

  afterEach(async () => {
    await rm(downloadsDir, { recursive: true, force: true });
  });

  it('uses the API key as a non-expiring credential', async () => {
    await expect(transport.authenticate()).resolves.toEqual({
      backendId: 'peers',
      accessToken: 'test-api-key',
      scope: 'api-key',
    });
  });

  it('enqueues a download for the peer', async () => {
    const fetchMock = stubFetch(new Response(null, { status: 201 }));

    const initiation = await transport.initiateTransfer(`test-peer::${remoteFile}`, credential);

    expect(initiation).toEqual({ peerRef: 'test-peer', remoteFileRef: remoteFile });
    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('http://localhost:5030/api/v0/transfers/downloads/test-peer');
    expect(init.method).toBe('POST');
    expect(headerOf(init, 'X-API-Key')).toBe('test-api-key');
    expect(JSON.parse(String(init.body))).toEqual([{ filename: remoteFile }]);
  });

  it('reports the status of the matching file', async () => {
    stubFetch(jsonResponse({
      username: 'test-peer',
      directories: [{
        directory: 'Music\\Artist',
        files: [
          { filename: 'Music\\Artist\\02 Other.flac', state: 'Queued, Remotely' },
          { filename: remoteFile, state: 'InProgress', bytesTransferred: 512, size: 2048 },
        ],
      }],
    }));

    await expect(transport.pollTransferStatus('test-peer', remoteFile, credential)).resolves.toEqual({
      state: 'InProgress',
      bytesTransferred: 512,
      size: 2048,
      message: undefined,
    });
  });

  it('returns null when the peer or file is unknown', async () => {
    stubFetch(
      new Response('', { status: 404 }),
      jsonResponse({ username: 'test-peer', directories: [] }),
    );

    await expect(transport.pollTransferStatus('test-peer', remoteFile, credential)).resolves.toBeNull();
    await expect(transport.pollTransferStatus('test-peer', remoteFile, credential)).resolves.toBeNull();
  });

  it('streams the completed file from the downloads directory', async () => {
    await mkdir(join(downloadsDir, 'Artist'), { recursive: true });
    await writeFile(join(downloadsDir, 'Artist', '01 Track.flac'), 'peer-audio');

    const chunks: Buffer[] = [];
    for await (const chunk of transport.retrieveTransferred('test-peer', remoteFile)) {
      chunks.push(Buffer.from(chunk));
    }

    expect(Buffer.concat(chunks).toString()).toBe('peer-audio');
  });

  it('reports a missing completed file as NotFound', async () => {
    const iterator = transport.retrieveTransferred('test-peer', remoteFile);
    const error = await expectTransportError(iterator.next());
    expect(error.kind).toBe('NotFound');
  });
});
