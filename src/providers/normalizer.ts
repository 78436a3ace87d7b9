/**
 * RepoPulse — GitHub Payload Normalizer
 *
 * Validates raw API payloads with zod and maps them onto RepositoryCandidate.
 * Anything that does not carry a usable owner/name identity is dropped.
 */

import { z } from 'zod';
import type { RepositoryCandidate } from '../types';

// ============================================================
// PAYLOAD SCHEMAS
// ============================================================

export const GitHubRepoPayloadSchema = z.object({
  full_name: z.string(),
  html_url: z.string().nullish(),
  language: z.string().nullish(),
  description: z.string().nullish(),
  stargazers_count: z.number().int().nullish(),
  forks_count: z.number().int().nullish(),
  open_issues_count: z.number().int().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  topics: z.array(z.string()).nullish(),
});
export type GitHubRepoPayload = z.infer<typeof GitHubRepoPayloadSchema>;

export const SearchResponseSchema = z.object({
  total_count: z.number().optional(),
  items: z.array(z.unknown()),
});

export const CodeSearchItemSchema = z.object({
  name: z.string().optional(),
  path: z.string().optional(),
  repository: z.unknown(),
});

export const FileContentSchema = z.object({
  type: z.literal('file'),
  content: z.string(),
  encoding: z.string().optional(),
});

export const DirectoryEntrySchema = z.object({
  name: z.string(),
  path: z.string(),
  type: z.string(),
});
export const DirectoryListingSchema = z.array(DirectoryEntrySchema);
export type DirectoryEntry = z.infer<typeof DirectoryEntrySchema>;

const IssueListSchema = z.array(z.object({ pull_request: z.unknown().optional() }));

// ============================================================
// IDENTITY
// ============================================================

const FULL_NAME_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

export function isWellFormedFullName(fullName: string): boolean {
  return FULL_NAME_PATTERN.test(fullName);
}

export function splitFullName(fullName: string): { owner: string; name: string } | null {
  if (!isWellFormedFullName(fullName)) return null;
  const [owner, name] = fullName.split('/');
  if (!owner || !name) return null;
  return { owner, name };
}

// ============================================================
// MAPPING
// ============================================================

export function toCandidate(payload: GitHubRepoPayload): RepositoryCandidate | null {
  const identity = splitFullName(payload.full_name);
  if (!identity) return null;

  return {
    fullName: payload.full_name,
    owner: identity.owner,
    name: identity.name,
    url: payload.html_url ?? null,
    language: payload.language ?? null,
    description: payload.description ?? null,
    stars: payload.stargazers_count ?? null,
    forks: payload.forks_count ?? null,
    openIssues: payload.open_issues_count ?? null,
    createdAt: payload.created_at ?? null,
    updatedAt: payload.updated_at ?? null,
    topics: payload.topics ?? [],
  };
}

export function normalizeRepository(payload: unknown): RepositoryCandidate | null {
  const parsed = GitHubRepoPayloadSchema.safeParse(payload);
  if (!parsed.success) return null;
  return toCandidate(parsed.data);
}

export function normalizeRepositories(payloads: unknown[]): RepositoryCandidate[] {
  const candidates: RepositoryCandidate[] = [];
  for (const payload of payloads) {
    const candidate = normalizeRepository(payload);
    if (candidate) candidates.push(candidate);
  }
  return candidates;
}

/**
 * Code search only returns a minimal repository object.
 */
export function needsBackfill(candidate: RepositoryCandidate): boolean {
  return candidate.stars === null || candidate.createdAt === null || candidate.updatedAt === null;
}

export function countIssues(data: unknown): number | null {
  const parsed = IssueListSchema.safeParse(data);
  if (!parsed.success) return null;
  return parsed.data.filter(issue => issue.pull_request === undefined).length;
}

export function countArray(data: unknown): number | null {
  return Array.isArray(data) ? data.length : null;
}

export function decodeFileContent(data: unknown): string | null {
  const parsed = FileContentSchema.safeParse(data);
  if (!parsed.success) return null;
  if (parsed.data.encoding && parsed.data.encoding !== 'base64') {
    return parsed.data.content;
  }
  return Buffer.from(parsed.data.content, 'base64').toString('utf-8');
}
