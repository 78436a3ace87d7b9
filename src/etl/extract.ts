/**
 * RepoPulse — Extract
 *
 * Qualified staging rows: the top N by stars per language, plus every
 * marker-cohort row, deduplicated by full name.
 */

import type { PipelineStore } from '../db/store';
import { logger } from '../lib/logger';
import type { StagingRecord } from '../types';

export interface ExtractOptions {
  qualityThreshold: number;
  perLanguageLimit: number;
  markerCohort: string;
}

const log = logger.child({ component: 'extract' });

/** Stable: equal star counts keep their input order. */
export function byStarsDesc<T extends { stars: number }>(rows: readonly T[]): T[] {
  return rows
    .map((row, index) => ({ row, index }))
    .sort((a, b) => b.row.stars - a.row.stars || a.index - b.index)
    .map(entry => entry.row);
}

export function selectForRanking(rows: readonly StagingRecord[], options: ExtractOptions): StagingRecord[] {
  const qualified = rows.filter(row => row.dataQualityScore >= options.qualityThreshold);

  const byLanguage = new Map<string, StagingRecord[]>();
  const cohort: StagingRecord[] = [];
  for (const row of qualified) {
    if (row.language === options.markerCohort) {
      cohort.push(row);
      continue;
    }
    const group = byLanguage.get(row.language) ?? [];
    group.push(row);
    byLanguage.set(row.language, group);
  }

  const selected = new Map<string, StagingRecord>();
  for (const group of byLanguage.values()) {
    for (const row of byStarsDesc(group).slice(0, options.perLanguageLimit)) {
      selected.set(row.fullName, row);
    }
  }
  for (const row of cohort) {
    if (!selected.has(row.fullName)) selected.set(row.fullName, row);
  }

  return [...selected.values()];
}

export async function extractFromStaging(
  store: Pick<PipelineStore, 'listQualifiedStaging'>,
  options: ExtractOptions
): Promise<StagingRecord[]> {
  const rows = await store.listQualifiedStaging(options.qualityThreshold);
  const selected = selectForRanking(rows, options);

  log.info('Staging extracted', { qualified: rows.length, selected: selected.length });
  return selected;
}
