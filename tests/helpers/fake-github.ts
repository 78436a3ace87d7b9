/**
 * RepoPulse — Fake GitHub Transport
 *
 * Route table in, GitHubClient out. Unknown routes answer 404.
 */

import { vi } from 'vitest';
import { GitHubClient, type GitHubRequestParams, type GitHubResponse } from '../../src/providers/github';
import { RateLimiter } from '../../src/providers/rate-limit';

export class FakeHttpError extends Error {
  readonly status: number;
  readonly response: { headers: Record<string, string>; data: { message: string } };

  constructor(status: number, message: string, headers: Record<string, string> = {}) {
    super(message);
    this.status = status;
    this.response = { headers, data: { message } };
  }
}

export type RouteHandler = (params: GitHubRequestParams) => GitHubResponse | Promise<GitHubResponse>;

export function ok(data: unknown, headers: Record<string, string> = {}): GitHubResponse {
  return { status: 200, headers, data };
}

export function makeFakeGitHub(routes: Record<string, RouteHandler>) {
  const transport = vi.fn(async (route: string, params: GitHubRequestParams): Promise<GitHubResponse> => {
    const handler = routes[route];
    if (!handler) throw new FakeHttpError(404, 'Not Found');
    return handler(params);
  });
  const client = new GitHubClient({
    transport,
    rateLimiter: new RateLimiter({ sleep: async () => {} }),
    baseDelayMs: 1,
  });
  return { client, transport };
}
