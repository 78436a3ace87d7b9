/**
 * RepoPulse — Connection Manager Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../../src/config';
import {
  classifyStoreFailure,
  openConnections,
  withConnections,
  type ConnectionFactories,
} from '../../src/db/connections';
import { ConnectionError, StoreError } from '../../src/lib/errors';
import { MemoryPipelineStore } from '../helpers/memory-store';
import { FakeHttpError, makeFakeGitHub, ok } from '../helpers/fake-github';

const CONFIG = loadConfig({
  GITHUB_ACCESS_TOKEN: 'ghp_test-token',
  SUPABASE_URL: 'https://example.supabase.co',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
});

const FAST_PROBE = { maxAttempts: 3, baseDelayMs: 1 };

function factoriesFor(store: MemoryPipelineStore, rateLimitStatus: 'ok' | 'unauthorized' = 'ok'): ConnectionFactories {
  const { client } = makeFakeGitHub({
    'GET /rate_limit': () => {
      if (rateLimitStatus === 'unauthorized') throw new FakeHttpError(401, 'Bad credentials');
      return ok({}, { 'x-ratelimit-remaining': '4999', 'x-ratelimit-reset': '1773576000' });
    },
  });
  return { github: () => client, store: () => store };
}

// ============================================================
// CLASSIFICATION
// ============================================================

describe('classifyStoreFailure', () => {
  it('should treat connection-level PostgREST codes as transient', () => {
    expect(classifyStoreFailure(new StoreError('unreachable', { code: 'PGRST001', status: 503 }))).toBe('transient');
  });

  it('should treat rejected JWTs as authentication failures', () => {
    expect(classifyStoreFailure(new StoreError('JWT expired', { code: 'PGRST301', status: 401 }))).toBe(
      'authentication'
    );
    expect(classifyStoreFailure(new StoreError('forbidden', { status: 403 }))).toBe('authentication');
  });

  it('should recognize a missing database or table', () => {
    expect(classifyStoreFailure(new StoreError('no such table', { code: '42P01', status: 404 }))).toBe(
      'missing_database'
    );
    expect(classifyStoreFailure(new StoreError('no such database', { code: '3D000' }))).toBe('missing_database');
  });

  it('should treat network errors and 5xx as transient', () => {
    expect(classifyStoreFailure(new TypeError('fetch failed'))).toBe('transient');
    expect(classifyStoreFailure(new StoreError('bad gateway', { status: 502 }))).toBe('transient');
  });

  it('should leave client errors unclassified', () => {
    expect(classifyStoreFailure(new StoreError('bad request', { code: '22P02', status: 400 }))).toBe('other');
    expect(classifyStoreFailure('not an error')).toBe('other');
  });
});

// ============================================================
// LIFECYCLE
// ============================================================

describe('openConnections', () => {
  it('should retry a transient probe failure and then open', async () => {
    const store = new MemoryPipelineStore();
    const ping = vi
      .spyOn(store, 'ping')
      .mockRejectedValueOnce(new StoreError('upstream unavailable', { code: 'PGRST001', status: 503 }));

    const connections = await openConnections(CONFIG, factoriesFor(store), FAST_PROBE);

    expect(ping).toHaveBeenCalledTimes(2);
    expect(connections.store).toBe(store);
    expect(connections.github.getRateLimitState().remaining).toBe(4999);
  });

  it('should fail at once on rejected store credentials and close the store', async () => {
    const store = new MemoryPipelineStore();
    store.pingError = new StoreError('Invalid API key', { status: 401 });

    await expect(openConnections(CONFIG, factoriesFor(store), FAST_PROBE)).rejects.toMatchObject({
      name: 'ConnectionError',
      kind: 'authentication',
    });
    expect(store.pingCalls).toBe(1);
    expect(store.closed).toBe(true);
  });

  it('should report a missing schema', async () => {
    const store = new MemoryPipelineStore();
    store.pingError = new StoreError('relation does not exist', { code: '42P01' });

    await expect(openConnections(CONFIG, factoriesFor(store), FAST_PROBE)).rejects.toMatchObject({
      kind: 'missing_database',
    });
  });

  it('should give up after the last transient attempt', async () => {
    const store = new MemoryPipelineStore();
    store.pingError = new StoreError('gateway timeout', { status: 504 });

    const error = await openConnections(CONFIG, factoriesFor(store), FAST_PROBE).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error instanceof ConnectionError && error.kind).toBe('unavailable');
    expect(store.pingCalls).toBe(3);
  });

  it('should fail on a rejected GitHub token and close the store', async () => {
    const store = new MemoryPipelineStore();

    await expect(openConnections(CONFIG, factoriesFor(store, 'unauthorized'), FAST_PROBE)).rejects.toMatchObject({
      kind: 'authentication',
    });
    expect(store.closed).toBe(true);
  });
});

describe('withConnections', () => {
  it('should release the store after the operation', async () => {
    const store = new MemoryPipelineStore();

    const result = await withConnections(CONFIG, async () => 'done', factoriesFor(store), FAST_PROBE);

    expect(result).toBe('done');
    expect(store.closed).toBe(true);
  });

  it('should release the store when the operation throws', async () => {
    const store = new MemoryPipelineStore();

    await expect(
      withConnections(
        CONFIG,
        async () => {
          throw new Error('stage failed');
        },
        factoriesFor(store),
        FAST_PROBE
      )
    ).rejects.toThrow('stage failed');
    expect(store.closed).toBe(true);
  });
});
