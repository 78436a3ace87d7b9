/**
 * RepoPulse — Test Fixtures
 */

import type { RepositoryCandidate, StagingRecord } from '../../src/types';

export const NOW = new Date('2026-03-15T12:00:00.000Z');

export function daysAgo(days: number, from: Date = NOW): string {
  return new Date(from.getTime() - days * 24 * 60 * 60 * 1000).toISOString();
}

export function makeCandidate(overrides: Partial<RepositoryCandidate> & { fullName?: string } = {}): RepositoryCandidate {
  const fullName = overrides.fullName ?? 'octo/widget';
  const [owner = '', name = ''] = fullName.split('/');
  return {
    owner,
    name,
    url: `https://github.com/${fullName}`,
    language: 'Go',
    description: null,
    stars: 120,
    forks: null,
    openIssues: null,
    createdAt: daysAgo(200),
    updatedAt: daysAgo(1),
    topics: [],
    ...overrides,
    fullName,
  };
}

export function makeStagingRecord(overrides: Partial<StagingRecord> = {}): StagingRecord {
  const fullName = overrides.fullName ?? 'octo/widget';
  return {
    url: `https://github.com/${fullName}`,
    language: 'Go',
    primaryLanguage: 'Go',
    description: 'A widget',
    readmeContent: null,
    stars: 100,
    forks: 10,
    openIssues: 2,
    createdAt: daysAgo(10),
    updatedAt: daysAgo(1),
    commitsLast7Days: null,
    issuesClosedLast7Days: null,
    activeContributors: null,
    usesRender: false,
    renderCategory: null,
    renderServices: [],
    renderComplexityScore: null,
    hasBlueprintButton: false,
    serviceCount: 0,
    dataQualityScore: 0.9,
    loadedAt: NOW.toISOString(),
    ...overrides,
    fullName,
  };
}
