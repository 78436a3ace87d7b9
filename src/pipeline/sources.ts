/**
 * RepoPulse — Candidate Collection
 *
 * Language searches and the render.yaml ecosystem search. Every fetched
 * candidate lands in the raw layer before analysis.
 */

import type { PipelineStore } from '../db/store';
import { describeError, logger } from '../lib/logger';
import type { SearchOptions } from '../providers/github';
import { DAY_MS } from '../scoring/time';
import type { CandidateSource, RepositoryCandidate } from '../types';
import { MARKER_FILE } from '../detection/render-usage';

export interface CandidateSearch {
  search(options: SearchOptions): Promise<RepositoryCandidate[]>;
  searchByMarkerFile(filename: string, limit: number, createdSince?: Date): Promise<RepositoryCandidate[]>;
}

export const LANGUAGE_WINDOW_DAYS = 30;
export const MARKER_WINDOW_DAYS = 365;

const log = logger.child({ component: 'sources' });

function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

async function recordRaw(
  store: Pick<PipelineStore, 'upsertRawRepos'>,
  candidates: RepositoryCandidate[],
  sourceType: CandidateSource,
  sourceLanguage: string | null
): Promise<void> {
  try {
    await store.upsertRawRepos(
      candidates.map(candidate => ({ fullName: candidate.fullName, payload: candidate, sourceType, sourceLanguage }))
    );
  } catch (error) {
    log.warn('Raw layer write failed', { sourceType, sourceLanguage, error: describeError(error) });
  }
}

export async function collectLanguageCandidates(
  github: CandidateSearch,
  store: Pick<PipelineStore, 'upsertRawRepos'>,
  language: string,
  limit: number,
  now: Date
): Promise<RepositoryCandidate[]> {
  const found = await github.search({
    language,
    sort: 'stars',
    updatedSince: daysBefore(now, LANGUAGE_WINDOW_DAYS),
  });
  const candidates = found.slice(0, limit);

  await recordRaw(store, candidates, 'trending', language);
  log.info('Language candidates collected', { language, count: candidates.length });
  return candidates;
}

export async function collectMarkerCandidates(
  github: CandidateSearch,
  store: Pick<PipelineStore, 'upsertRawRepos'>,
  limit: number,
  now: Date
): Promise<RepositoryCandidate[]> {
  const candidates = await github.searchByMarkerFile(MARKER_FILE, limit, daysBefore(now, MARKER_WINDOW_DAYS));

  await recordRaw(store, candidates, 'render_ecosystem', null);
  log.info('Marker candidates collected', { marker: MARKER_FILE, count: candidates.length });
  return candidates;
}
