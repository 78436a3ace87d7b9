/**
 * RepoPulse — GitHub API Client
 *
 * Single point of contact with the GitHub REST and search APIs.
 * Owns rate-limit bookkeeping (via RateLimiter) and the retry policy.
 *
 * FAILURE RULES:
 * - 404, 403, 422 and exhausted transient errors return null / []
 * - Only malformed input (programmer error) throws
 */

import { Octokit } from 'octokit';
import type { RepositoryCandidate } from '../types';
import { ConnectionError } from '../lib/errors';
import { describeError, logger } from '../lib/logger';
import { withRetry } from '../lib/retry';
import { runInChunks, successes } from '../pipeline/task-group';
import { RateLimiter, type HeaderBag, type RateLimitSnapshot } from './rate-limit';
import {
  CodeSearchItemSchema,
  DirectoryListingSchema,
  SearchResponseSchema,
  countArray,
  countIssues,
  decodeFileContent,
  needsBackfill,
  normalizeRepositories,
  normalizeRepository,
  type DirectoryEntry,
} from './normalizer';

// ============================================================
// TYPES
// ============================================================

export interface GitHubResponse {
  status: number;
  headers: HeaderBag;
  data: unknown;
}

export type GitHubRequestParams = Record<string, unknown>;

/** Sends one request; rejects with an error carrying `status` on non-2xx. */
export type GitHubTransport = (route: string, params: GitHubRequestParams) => Promise<GitHubResponse>;

export type SearchSort = 'stars' | 'forks' | 'updated';

export interface SearchOptions {
  language: string;
  sort?: SearchSort;
  updatedSince?: Date;
  createdSince?: Date;
  perPage?: number;
}

export interface GitHubClientOptions {
  transport: GitHubTransport;
  rateLimiter?: RateLimiter;
  maxAttempts?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
  /** Concurrency bound for metadata backfill */
  backfillChunkSize?: number;
}

interface HttpFailure {
  status: number;
  message: string;
  headers: HeaderBag;
}

// ============================================================
// CONSTANTS
// ============================================================

export const README_MAX_CHARS = 5000;
export const README_CANDIDATES = ['README', 'README.md', 'README.rst', 'README.txt', 'README.markdown'] as const;
export const SEARCH_PAGE_SIZE = 100;
export const MAX_SEARCH_PAGES = 10;
/** Extra code-search results collected before client-side date filtering */
const MARKER_OVERFETCH = 2;
const API_VERSION = '2022-11-28';

// ============================================================
// ERROR CLASSIFICATION
// ============================================================

function isHeaderBag(value: unknown): value is HeaderBag {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBodyMessage(data: unknown): string {
  if (typeof data !== 'object' || data === null || !('message' in data)) return '';
  return typeof data.message === 'string' ? data.message : '';
}

export function asHttpFailure(error: unknown): HttpFailure | null {
  if (!(error instanceof Error) || !('status' in error)) return null;
  const status = error.status;
  if (typeof status !== 'number') return null;

  let headers: HeaderBag = {};
  let bodyMessage = '';
  const response = 'response' in error ? error.response : undefined;
  if (typeof response === 'object' && response !== null) {
    if ('headers' in response && isHeaderBag(response.headers)) headers = response.headers;
    if ('data' in response) bodyMessage = readBodyMessage(response.data);
  }

  return { status, message: bodyMessage || error.message, headers };
}

/**
 * Timeouts, 5xx and network errors are worth another attempt.
 * Octokit reports fetch failures as status 500.
 */
export function isTransientGitHubError(error: unknown): boolean {
  const failure = asHttpFailure(error);
  if (!failure) return error instanceof Error && !(error instanceof GitHubInputError);
  return failure.status >= 500 || failure.status === 408;
}

export type ForbiddenReason = 'rate_limit' | 'insufficient_scope' | 'forbidden';

export function classifyForbidden(failure: HttpFailure): ForbiddenReason {
  const message = failure.message.toLowerCase();
  const remaining = failure.headers['x-ratelimit-remaining'];
  if (message.includes('rate limit') || remaining === '0' || remaining === 0) {
    return 'rate_limit';
  }
  if (message.includes('resource not accessible') || message.includes('scope') || message.includes('permission')) {
    return 'insufficient_scope';
  }
  return 'forbidden';
}

export class GitHubInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitHubInputError';
  }
}

function requireSegment(label: string, value: string): void {
  if (value.trim() === '' || value.includes('/')) {
    throw new GitHubInputError(`${label} must be a single non-empty path segment, got "${value}"`);
  }
}

function isoDate(date: Date): string {
  return date.toISOString().split('T')[0] ?? date.toISOString();
}

export function buildSearchQuery(options: Pick<SearchOptions, 'language' | 'updatedSince' | 'createdSince'>): string {
  const language = options.language.trim();
  // Multi-word languages ("Jupyter Notebook") must be quoted to stay one qualifier
  const parts = [`language:${/\s/.test(language) ? `"${language}"` : language}`];
  if (options.updatedSince) parts.push(`pushed:>=${isoDate(options.updatedSince)}`);
  if (options.createdSince) parts.push(`created:>=${isoDate(options.createdSince)}`);
  return parts.join(' ');
}

function compareByStarsDesc(a: RepositoryCandidate, b: RepositoryCandidate): number {
  return (b.stars ?? -1) - (a.stars ?? -1);
}

// ============================================================
// CLIENT
// ============================================================

export class GitHubClient {
  private readonly transport: GitHubTransport;
  private readonly rateLimiter: RateLimiter;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly timeoutMs: number;
  private readonly backfillChunkSize: number;
  private readonly log = logger.child({ component: 'github' });

  constructor(options: GitHubClientOptions) {
    this.transport = options.transport;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.maxAttempts = options.maxAttempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.backfillChunkSize = options.backfillChunkSize ?? 10;
  }

  getRateLimitState(): RateLimitSnapshot {
    return this.rateLimiter.snapshot();
  }

  /**
   * Probe the token against /rate_limit and seed the quota state.
   * Bad credentials are fatal; an unreachable API is left to per-call handling.
   */
  async verifyCredentials(): Promise<RateLimitSnapshot> {
    try {
      await withRetry(
        async () => {
          const response = await this.transport('GET /rate_limit', {
            request: { signal: AbortSignal.timeout(this.timeoutMs) },
          });
          this.rateLimiter.afterResponse(response.headers);
        },
        { maxAttempts: this.maxAttempts, baseDelayMs: this.baseDelayMs, isRetryable: isTransientGitHubError }
      );
    } catch (error) {
      if (asHttpFailure(error)?.status === 401) {
        throw new ConnectionError('GitHub rejected the access token', 'authentication', { cause: error });
      }
      this.log.warn('GitHub credential probe failed', { error: describeError(error) });
    }
    return this.rateLimiter.snapshot();
  }

  /**
   * One logical API call: rate-limit gate, timeout, retry, soft failure.
   */
  private async request(route: string, params: GitHubRequestParams = {}): Promise<GitHubResponse | null> {
    try {
      return await withRetry(
        async () => {
          await this.rateLimiter.beforeRequest();
          try {
            const response = await this.transport(route, {
              ...params,
              headers: { accept: 'application/vnd.github+json', 'x-github-api-version': API_VERSION },
              request: { signal: AbortSignal.timeout(this.timeoutMs) },
            });
            this.rateLimiter.afterResponse(response.headers);
            return response;
          } catch (error) {
            const failure = asHttpFailure(error);
            if (failure) this.rateLimiter.afterResponse(failure.headers);
            throw error;
          }
        },
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.baseDelayMs,
          isRetryable: isTransientGitHubError,
          onFailedAttempt: (error, attemptNumber, retriesLeft) => {
            if (retriesLeft > 0 && isTransientGitHubError(error)) {
              this.log.warn('Transient GitHub failure, retrying', {
                route,
                attempt: attemptNumber,
                retriesLeft,
                error: error.message,
              });
            }
          },
        }
      );
    } catch (error) {
      this.handleFailure(route, params, error);
      return null;
    }
  }

  private handleFailure(route: string, params: GitHubRequestParams, error: unknown): void {
    const failure = asHttpFailure(error);
    const context = { route, owner: params.owner, repo: params.repo, path: params.path };

    if (!failure) {
      this.log.warn('GitHub request failed after retries', { ...context, error: describeError(error) });
      return;
    }

    switch (failure.status) {
      case 404:
        this.log.debug('GitHub resource not found', context);
        return;
      case 403: {
        const reason = classifyForbidden(failure);
        if (reason === 'rate_limit') {
          this.log.warn('GitHub rate limit exceeded', { ...context, rateLimit: this.rateLimiter.snapshot() });
        } else if (reason === 'insufficient_scope') {
          this.log.warn('GitHub token lacks required scope', { ...context, message: failure.message });
        } else {
          this.log.warn('GitHub request forbidden', { ...context, message: failure.message });
        }
        return;
      }
      case 422:
        this.log.warn('GitHub rejected malformed query', { ...context, message: failure.message });
        return;
      default:
        this.log.warn('GitHub request failed', { ...context, status: failure.status, message: failure.message });
    }
  }

  // ============================================================
  // SEARCH
  // ============================================================

  async search(options: SearchOptions): Promise<RepositoryCandidate[]> {
    if (options.language.trim() === '') {
      throw new GitHubInputError('search language must not be empty');
    }
    const perPage = options.perPage ?? SEARCH_PAGE_SIZE;
    if (!Number.isInteger(perPage) || perPage < 1 || perPage > SEARCH_PAGE_SIZE) {
      throw new GitHubInputError(`perPage must be between 1 and ${SEARCH_PAGE_SIZE}, got ${perPage}`);
    }

    const response = await this.request('GET /search/repositories', {
      q: buildSearchQuery(options),
      sort: options.sort ?? 'stars',
      order: 'desc',
      per_page: perPage,
    });
    if (!response) return [];

    const parsed = SearchResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      this.log.warn('Unexpected search response shape', { language: options.language });
      return [];
    }
    return normalizeRepositories(parsed.data.items);
  }

  /**
   * Repositories containing a file with the given name, newest-first filtering
   * done client-side since code search has no date qualifier.
   */
  async searchByMarkerFile(filename: string, limit: number, createdSince?: Date): Promise<RepositoryCandidate[]> {
    if (filename.trim() === '') {
      throw new GitHubInputError('marker filename must not be empty');
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new GitHubInputError(`limit must be a positive integer, got ${limit}`);
    }

    const byName = new Map<string, RepositoryCandidate>();
    const target = limit * MARKER_OVERFETCH;

    for (let page = 1; page <= MAX_SEARCH_PAGES && byName.size < target; page++) {
      const response = await this.request('GET /search/code', {
        q: `filename:${filename}`,
        per_page: SEARCH_PAGE_SIZE,
        page,
      });
      if (!response) break;

      const parsed = SearchResponseSchema.safeParse(response.data);
      if (!parsed.success) break;

      for (const item of parsed.data.items) {
        const hit = CodeSearchItemSchema.safeParse(item);
        if (!hit.success) continue;
        const candidate = normalizeRepository(hit.data.repository);
        if (candidate && !byName.has(candidate.fullName)) {
          byName.set(candidate.fullName, candidate);
        }
      }

      if (parsed.data.items.length < SEARCH_PAGE_SIZE) break;
    }

    const candidates = await this.backfill([...byName.values()]);
    const cutoff = createdSince?.getTime();

    return candidates
      .filter(candidate => {
        if (cutoff === undefined) return true;
        if (candidate.createdAt === null) return false;
        const created = Date.parse(candidate.createdAt);
        return Number.isFinite(created) && created >= cutoff;
      })
      .sort(compareByStarsDesc)
      .slice(0, limit);
  }

  private async backfill(candidates: RepositoryCandidate[]): Promise<RepositoryCandidate[]> {
    const results = await runInChunks(
      candidates,
      async candidate => {
        if (!needsBackfill(candidate)) return candidate;
        const detailed = await this.getRepository(candidate.owner, candidate.name);
        return detailed ?? candidate;
      },
      { chunkSize: this.backfillChunkSize }
    );
    return successes(results);
  }

  // ============================================================
  // REPOSITORY CONTENT
  // ============================================================

  async getRepository(owner: string, repo: string): Promise<RepositoryCandidate | null> {
    requireSegment('owner', owner);
    requireSegment('repo', repo);

    const response = await this.request('GET /repos/{owner}/{repo}', { owner, repo });
    if (!response) return null;
    return normalizeRepository(response.data);
  }

  /**
   * Decoded text of a file, or null when it does not exist.
   */
  async fetchFileContents(owner: string, repo: string, path: string): Promise<string | null> {
    requireSegment('owner', owner);
    requireSegment('repo', repo);
    if (path.trim() === '') throw new GitHubInputError('path must not be empty');

    const response = await this.request('GET /repos/{owner}/{repo}/contents/{path}', { owner, repo, path });
    if (!response) return null;
    return decodeFileContent(response.data);
  }

  async listRootContents(owner: string, repo: string): Promise<DirectoryEntry[] | null> {
    requireSegment('owner', owner);
    requireSegment('repo', repo);

    const response = await this.request('GET /repos/{owner}/{repo}/contents/{path}', { owner, repo, path: '' });
    if (!response) return null;

    const parsed = DirectoryListingSchema.safeParse(response.data);
    return parsed.success ? parsed.data : null;
  }

  private async fetchRawFile(owner: string, repo: string, path: string): Promise<string | null> {
    const response = await this.request('GET /repos/{owner}/{repo}/contents/{path}', {
      owner,
      repo,
      path,
      mediaType: { format: 'raw' },
    });
    if (!response) return null;
    return typeof response.data === 'string' ? response.data : null;
  }

  async fetchReadme(owner: string, repo: string): Promise<string | null> {
    const entries = await this.listRootContents(owner, repo);
    if (!entries) return null;

    const readme = pickReadme(entries);
    if (!readme) return null;

    const content = await this.fetchRawFile(owner, repo, readme.path);
    return content === null ? null : content.slice(0, README_MAX_CHARS);
  }

  // ============================================================
  // ACTIVITY
  // ============================================================

  async countRecentCommits(owner: string, repo: string, since: Date): Promise<number | null> {
    requireSegment('owner', owner);
    requireSegment('repo', repo);
    const response = await this.request('GET /repos/{owner}/{repo}/commits', {
      owner,
      repo,
      since: since.toISOString(),
      per_page: SEARCH_PAGE_SIZE,
    });
    return response ? countArray(response.data) : null;
  }

  async countClosedIssues(owner: string, repo: string, since: Date): Promise<number | null> {
    requireSegment('owner', owner);
    requireSegment('repo', repo);
    const response = await this.request('GET /repos/{owner}/{repo}/issues', {
      owner,
      repo,
      state: 'closed',
      since: since.toISOString(),
      per_page: SEARCH_PAGE_SIZE,
    });
    return response ? countIssues(response.data) : null;
  }

  async countContributors(owner: string, repo: string): Promise<number | null> {
    requireSegment('owner', owner);
    requireSegment('repo', repo);
    const response = await this.request('GET /repos/{owner}/{repo}/contributors', {
      owner,
      repo,
      per_page: SEARCH_PAGE_SIZE,
    });
    if (!response) return null;
    // Empty repositories answer 204 with no body
    if (response.status === 204) return 0;
    return countArray(response.data);
  }
}

/**
 * Case-insensitive README match, first by preference order.
 */
export function pickReadme(entries: DirectoryEntry[]): DirectoryEntry | null {
  const files = entries.filter(entry => entry.type === 'file');
  for (const name of README_CANDIDATES) {
    const match = files.find(entry => entry.name.toLowerCase() === name.toLowerCase());
    if (match) return match;
  }
  return null;
}

// ============================================================
// TRANSPORT
// ============================================================

/**
 * Octokit-backed transport. Octokit's own retry and throttling are turned
 * off so the client's policy is the only one in effect.
 */
export function createOctokitTransport(token: string): GitHubTransport {
  const octokit = new Octokit({
    auth: token,
    userAgent: 'repopulse',
    retry: { enabled: false },
    throttle: {
      enabled: false,
      onRateLimit: () => false,
      onSecondaryRateLimit: () => false,
    },
  });

  return async (route, params) => {
    const response = await octokit.request(route, params);
    return { status: response.status, headers: response.headers, data: response.data };
  };
}

export function createGitHubClient(token: string, options: Omit<GitHubClientOptions, 'transport'> = {}): GitHubClient {
  return new GitHubClient({ ...options, transport: createOctokitTransport(token) });
}
