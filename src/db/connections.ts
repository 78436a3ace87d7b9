/**
 * RepoPulse — Connection Manager
 *
 * Opens the GitHub client and the store at the start of a run and releases
 * them at the end, early exits included. The store probe retries transient
 * failures; bad credentials and a missing database fail at once.
 */

import type { AppConfig } from '../config';
import { ConnectionError, StoreError } from '../lib/errors';
import { describeError, logger } from '../lib/logger';
import { withRetry } from '../lib/retry';
import { GitHubClient, createGitHubClient } from '../providers/github';
import { createSupabase } from './client';
import { SupabasePipelineStore } from './queries';
import type { PipelineStore } from './store';

export interface Connections {
  github: GitHubClient;
  store: PipelineStore;
}

export interface ConnectionFactories {
  github: (config: AppConfig) => GitHubClient;
  store: (config: AppConfig) => PipelineStore;
}

export interface ProbePolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export const DEFAULT_PROBE_POLICY: ProbePolicy = { maxAttempts: 3, baseDelayMs: 1000 };

export const defaultFactories: ConnectionFactories = {
  github: config => createGitHubClient(config.github.token),
  store: config => new SupabasePipelineStore(createSupabase(config.supabase)),
};

const log = logger.child({ component: 'connections' });

// ============================================================
// FAILURE CLASSIFICATION
// ============================================================

const TRANSIENT_CODES = new Set(['PGRST000', 'PGRST001', 'PGRST002', 'PGRST003']);
const AUTH_CODES = new Set(['PGRST301', 'PGRST302']);
const MISSING_DATABASE_CODES = new Set(['3D000', '42P01', 'PGRST205']);

export type StoreFailureKind = 'transient' | 'authentication' | 'missing_database' | 'other';

export function classifyStoreFailure(error: unknown): StoreFailureKind {
  if (!(error instanceof StoreError)) {
    // fetch failures surface as plain errors
    return error instanceof Error ? 'transient' : 'other';
  }

  const { code, status } = error;
  if (code && AUTH_CODES.has(code)) return 'authentication';
  if (code && MISSING_DATABASE_CODES.has(code)) return 'missing_database';
  if (code && TRANSIENT_CODES.has(code)) return 'transient';
  if (status === 401 || status === 403) return 'authentication';
  if (status === undefined || status === 0 || status >= 500) return 'transient';
  return 'other';
}

// ============================================================
// LIFECYCLE
// ============================================================

async function probeStore(store: PipelineStore, policy: ProbePolicy): Promise<void> {
  try {
    await withRetry(() => store.ping(), {
      ...policy,
      isRetryable: error => classifyStoreFailure(error) === 'transient',
      onFailedAttempt: (error, attempt, retriesLeft) => {
        if (retriesLeft > 0) {
          log.warn('Store unavailable, retrying', { attempt, retriesLeft, error: error.message });
        }
      },
    });
  } catch (error) {
    const kind = classifyStoreFailure(error);
    if (kind === 'authentication') {
      throw new ConnectionError('Store rejected the service credentials', 'authentication', { cause: error });
    }
    if (kind === 'missing_database') {
      throw new ConnectionError('Store database or schema is missing', 'missing_database', { cause: error });
    }
    throw new ConnectionError(`Store unreachable: ${describeError(error)}`, 'unavailable', { cause: error });
  }
}

async function closeStore(store: PipelineStore): Promise<void> {
  try {
    await store.close();
  } catch (error) {
    log.warn('Failed to release store connection', { error: describeError(error) });
  }
}

export async function openConnections(
  config: AppConfig,
  factories: ConnectionFactories = defaultFactories,
  policy: ProbePolicy = DEFAULT_PROBE_POLICY
): Promise<Connections> {
  const store = factories.store(config);

  try {
    await probeStore(store, policy);
    const github = factories.github(config);
    const quota = await github.verifyCredentials();
    log.info('Connections open', { githubRemaining: quota.remaining });
    return { github, store };
  } catch (error) {
    await closeStore(store);
    throw error;
  }
}

export async function releaseConnections(connections: Connections): Promise<void> {
  await closeStore(connections.store);
  log.debug('Connections released');
}

export async function withConnections<T>(
  config: AppConfig,
  operation: (connections: Connections) => Promise<T>,
  factories: ConnectionFactories = defaultFactories,
  policy: ProbePolicy = DEFAULT_PROBE_POLICY
): Promise<T> {
  const connections = await openConnections(config, factories, policy);
  try {
    return await operation(connections);
  } finally {
    await releaseConnections(connections);
  }
}
