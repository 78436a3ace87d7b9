/**
 * RepoPulse — GitHub Client Tests
 *
 * All requests go through a fake transport; nothing leaves the process.
 */

import { describe, it, expect } from 'vitest';
import {
  GitHubInputError,
  README_MAX_CHARS,
  buildSearchQuery,
  classifyForbidden,
  isTransientGitHubError,
  pickReadme,
} from '../../src/providers/github';
import { FakeHttpError, makeFakeGitHub, ok } from '../helpers/fake-github';

// ============================================================
// FAKES
// ============================================================

const makeClient = makeFakeGitHub;

function repoPayload(fullName: string, stars: number, createdAt: string) {
  return {
    full_name: fullName,
    html_url: `https://github.com/${fullName}`,
    language: 'TypeScript',
    description: null,
    stargazers_count: stars,
    forks_count: 1,
    open_issues_count: 0,
    created_at: createdAt,
    updated_at: createdAt,
    topics: ['render'],
  };
}

// ============================================================
// STATUS HANDLING
// ============================================================

describe('GitHubClient status handling', () => {
  it('should return null on 404 without retrying', async () => {
    const { client, transport } = makeClient({
      'GET /repos/{owner}/{repo}': () => {
        throw new FakeHttpError(404, 'Not Found');
      },
    });

    expect(await client.getRepository('acme', 'missing')).toBeNull();
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('should fail soft on a rate-limit 403', async () => {
    const { client, transport } = makeClient({
      'GET /repos/{owner}/{repo}': () => {
        throw new FakeHttpError(403, 'API rate limit exceeded for user', { 'x-ratelimit-remaining': '0' });
      },
    });

    expect(await client.getRepository('acme', 'api')).toBeNull();
    expect(transport).toHaveBeenCalledTimes(1);
    expect(client.getRateLimitState().remaining).toBe(0);
  });

  it('should fail soft on an insufficient-scope 403', async () => {
    const { client } = makeClient({
      'GET /repos/{owner}/{repo}/contents/{path}': () => {
        throw new FakeHttpError(403, 'Resource not accessible by integration');
      },
    });

    expect(await client.fetchFileContents('acme', 'api', 'render.yaml')).toBeNull();
  });

  it('should return an empty page on 422', async () => {
    const { client, transport } = makeClient({
      'GET /search/repositories': () => {
        throw new FakeHttpError(422, 'Validation Failed');
      },
    });

    expect(await client.search({ language: 'Go' })).toEqual([]);
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('should retry a 5xx and return the later success', async () => {
    let calls = 0;
    const { client, transport } = makeClient({
      'GET /repos/{owner}/{repo}': () => {
        calls++;
        if (calls === 1) throw new FakeHttpError(502, 'Bad Gateway');
        return ok(repoPayload('acme/api', 10, '2026-01-01T00:00:00Z'));
      },
    });

    const repo = await client.getRepository('acme', 'api');

    expect(repo?.fullName).toBe('acme/api');
    expect(transport).toHaveBeenCalledTimes(2);
  });

  it('should retry network errors and give up after three attempts', async () => {
    const { client, transport } = makeClient({
      'GET /repos/{owner}/{repo}': () => {
        throw new Error('socket hang up');
      },
    });

    expect(await client.getRepository('acme', 'api')).toBeNull();
    expect(transport).toHaveBeenCalledTimes(3);
  });

  it('should refresh rate-limit state from response headers', async () => {
    const { client } = makeClient({
      'GET /repos/{owner}/{repo}': () =>
        ok(repoPayload('acme/api', 10, '2026-01-01T00:00:00Z'), {
          'x-ratelimit-remaining': '4321',
          'x-ratelimit-reset': '1760000000',
        }),
    });

    await client.getRepository('acme', 'api');

    expect(client.getRateLimitState()).toEqual({ remaining: 4321, resetAt: 1760000000 });
  });

  it('should pass a timeout signal with every request', async () => {
    const { client, transport } = makeClient({
      'GET /repos/{owner}/{repo}': () => ok(repoPayload('acme/api', 10, '2026-01-01T00:00:00Z')),
    });

    await client.getRepository('acme', 'api');

    const params = transport.mock.calls[0]?.[1];
    expect(params?.request).toEqual({ signal: expect.any(AbortSignal) });
  });

  it('should throw on malformed input', async () => {
    const { client } = makeClient({});

    await expect(client.getRepository('', 'api')).rejects.toBeInstanceOf(GitHubInputError);
    await expect(client.getRepository('acme', 'a/b')).rejects.toBeInstanceOf(GitHubInputError);
    await expect(client.search({ language: ' ' })).rejects.toBeInstanceOf(GitHubInputError);
  });
});

describe('error classification', () => {
  it('should treat 5xx and plain errors as transient', () => {
    expect(isTransientGitHubError(new FakeHttpError(503, 'unavailable'))).toBe(true);
    expect(isTransientGitHubError(new Error('ECONNRESET'))).toBe(true);
    expect(isTransientGitHubError(new FakeHttpError(404, 'Not Found'))).toBe(false);
    expect(isTransientGitHubError(new GitHubInputError('bad'))).toBe(false);
  });

  it('should distinguish rate limits from missing scope', () => {
    expect(classifyForbidden({ status: 403, message: 'API rate limit exceeded', headers: {} })).toBe('rate_limit');
    expect(classifyForbidden({ status: 403, message: 'Forbidden', headers: { 'x-ratelimit-remaining': '0' } }))
      .toBe('rate_limit');
    expect(classifyForbidden({ status: 403, message: 'Resource not accessible by integration', headers: {} }))
      .toBe('insufficient_scope');
    expect(classifyForbidden({ status: 403, message: 'Repository access blocked', headers: {} })).toBe('forbidden');
  });
});

// ============================================================
// SEARCH
// ============================================================

describe('GitHubClient.search', () => {
  it('should build the query from language and dates', () => {
    expect(buildSearchQuery({
      language: 'Go',
      updatedSince: new Date('2026-02-13T08:00:00Z'),
      createdSince: new Date('2025-03-15T00:00:00Z'),
    })).toBe('language:Go pushed:>=2026-02-13 created:>=2025-03-15');
  });

  it('should quote a language name containing spaces', () => {
    expect(buildSearchQuery({ language: 'Jupyter Notebook' })).toBe('language:"Jupyter Notebook"');
  });

  it('should normalize items and drop malformed ones', async () => {
    const { client, transport } = makeClient({
      'GET /search/repositories': () =>
        ok({
          total_count: 3,
          items: [
            repoPayload('acme/api', 10, '2026-01-01T00:00:00Z'),
            { id: 7 },
            { full_name: 'no-slash' },
          ],
        }),
    });

    const results = await client.search({ language: 'TypeScript', sort: 'stars' });

    expect(results.map(repo => repo.fullName)).toEqual(['acme/api']);
    expect(results[0]).toMatchObject({ owner: 'acme', name: 'api', stars: 10, language: 'TypeScript' });
    expect(transport.mock.calls[0]?.[1]).toMatchObject({
      q: 'language:TypeScript',
      sort: 'stars',
      order: 'desc',
      per_page: 100,
    });
  });
});

describe('GitHubClient.searchByMarkerFile', () => {
  it('should dedupe, backfill, filter by creation date and sort by stars', async () => {
    const details: Record<string, ReturnType<typeof repoPayload>> = {
      'acme/api': repoPayload('acme/api', 50, '2026-03-01T00:00:00Z'),
      'zed/site': repoPayload('zed/site', 500, '2026-02-01T00:00:00Z'),
      'old/app': repoPayload('old/app', 900, '2023-01-01T00:00:00Z'),
    };

    const { client } = makeClient({
      'GET /search/code': () =>
        ok({
          total_count: 4,
          items: [
            { name: 'render.yaml', repository: { full_name: 'acme/api' } },
            { name: 'render.yaml', repository: { full_name: 'acme/api' } },
            { name: 'render.yaml', repository: { full_name: 'zed/site' } },
            { name: 'render.yaml', repository: { full_name: 'old/app' } },
          ],
        }),
      'GET /repos/{owner}/{repo}': params => {
        const detail = details[`${String(params.owner)}/${String(params.repo)}`];
        if (!detail) throw new FakeHttpError(404, 'Not Found');
        return ok(detail);
      },
    });

    const results = await client.searchByMarkerFile('render.yaml', 5, new Date('2025-06-01T00:00:00Z'));

    expect(results.map(repo => [repo.fullName, repo.stars])).toEqual([
      ['zed/site', 500],
      ['acme/api', 50],
    ]);
  });

  it('should cap the result at the limit', async () => {
    const { client } = makeClient({
      'GET /search/code': () =>
        ok({
          items: [
            { repository: repoPayload('a/one', 1, '2026-01-01T00:00:00Z') },
            { repository: repoPayload('b/two', 2, '2026-01-01T00:00:00Z') },
            { repository: repoPayload('c/three', 3, '2026-01-01T00:00:00Z') },
          ],
        }),
    });

    const results = await client.searchByMarkerFile('render.yaml', 2);

    expect(results.map(repo => repo.fullName)).toEqual(['c/three', 'b/two']);
  });
});

// ============================================================
// CONTENT
// ============================================================

describe('GitHubClient content', () => {
  it('should decode base64 file contents', async () => {
    const { client } = makeClient({
      'GET /repos/{owner}/{repo}/contents/{path}': () =>
        ok({ type: 'file', encoding: 'base64', content: Buffer.from('services: []\n').toString('base64') }),
    });

    expect(await client.fetchFileContents('acme', 'api', 'render.yaml')).toBe('services: []\n');
  });

  it('should fetch the preferred README raw and truncate it', async () => {
    const { client, transport } = makeClient({
      'GET /repos/{owner}/{repo}/contents/{path}': params => {
        if (params.path === '') {
          return ok([
            { name: 'docs', path: 'docs', type: 'dir' },
            { name: 'readme.rst', path: 'readme.rst', type: 'file' },
            { name: 'Readme.md', path: 'Readme.md', type: 'file' },
          ]);
        }
        return ok('#'.repeat(README_MAX_CHARS + 1000));
      },
    });

    const readme = await client.fetchReadme('acme', 'api');

    expect(readme).toHaveLength(README_MAX_CHARS);
    expect(transport.mock.calls[1]?.[1]).toMatchObject({ path: 'Readme.md', mediaType: { format: 'raw' } });
  });

  it('should return null when no README exists', async () => {
    const { client } = makeClient({
      'GET /repos/{owner}/{repo}/contents/{path}': () => ok([{ name: 'main.go', path: 'main.go', type: 'file' }]),
    });

    expect(await client.fetchReadme('acme', 'api')).toBeNull();
  });

  it('should pick README variants case-insensitively in preference order', () => {
    const entries = [
      { name: 'README.txt', path: 'README.txt', type: 'file' },
      { name: 'readme', path: 'readme', type: 'file' },
    ];
    expect(pickReadme(entries)?.path).toBe('readme');
  });
});

describe('GitHubClient activity counts', () => {
  it('should count commits, closed issues without pull requests, and contributors', async () => {
    const { client } = makeClient({
      'GET /repos/{owner}/{repo}/commits': () => ok([{}, {}, {}]),
      'GET /repos/{owner}/{repo}/issues': () => ok([{}, { pull_request: {} }, {}]),
      'GET /repos/{owner}/{repo}/contributors': () => ({ status: 204, headers: {}, data: '' }),
    });
    const since = new Date('2026-03-08T00:00:00Z');

    expect(await client.countRecentCommits('acme', 'api', since)).toBe(3);
    expect(await client.countClosedIssues('acme', 'api', since)).toBe(2);
    expect(await client.countContributors('acme', 'api')).toBe(0);
  });
});
