/**
 * RepoPulse — Load
 *
 * Dimension upsert, key lookup, then fact upserts, one row at a time.
 * A row whose keys cannot be found is skipped; a row that throws is counted
 * as failed. Neither stops the loop.
 */

import type { PipelineStore } from '../db/store';
import { describeError, logger } from '../lib/logger';
import type { LoadReport, RankedRepository } from '../types';

const log = logger.child({ component: 'load' });

export function toSnapshotDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

type RowOutcome = { status: 'loaded'; usageRows: number } | { status: 'skipped'; reason: string };

async function loadRow(store: PipelineStore, row: RankedRepository, snapshotDate: string): Promise<RowOutcome> {
  await store.upsertRepositoryDimension({
    fullName: row.fullName,
    url: row.url,
    description: row.description,
    readmeContent: row.readmeContent,
    language: row.language,
    createdAt: row.createdAt,
    usesRender: row.usesRender,
    renderCategory: row.renderCategory,
    isCurrent: true,
  });

  const repoKey = await store.findRepositoryKey(row.fullName);
  if (repoKey === null) return { status: 'skipped', reason: 'repository key not found' };

  const languageKey = await store.findLanguageKey(row.language);
  if (languageKey === null) return { status: 'skipped', reason: `language "${row.language}" not in dimension` };

  await store.upsertSnapshot({
    repoKey,
    languageKey,
    snapshotDate,
    stars: row.stars,
    forks: row.forks,
    starVelocity: row.starVelocity,
    activityScore: row.activityScore,
    momentumScore: row.momentumScore,
    commitsLast7Days: row.commitsLast7Days,
    issuesClosedLast7Days: row.issuesClosedLast7Days,
    activeContributors: row.activeContributors,
    rankOverall: row.rankOverall,
    rankInLanguage: row.rankInLanguage,
  });

  let usageRows = 0;
  if (row.usesRender) {
    for (const serviceType of new Set(row.renderServices)) {
      const serviceKey = await store.findServiceKey(serviceType);
      if (serviceKey === null) {
        log.debug('Unknown service type, usage row skipped', { repo: row.fullName, serviceType });
        continue;
      }
      await store.upsertServiceUsage({
        repoKey,
        serviceKey,
        snapshotDate,
        serviceCount: row.serviceCount,
        complexityScore: row.renderComplexityScore,
        hasBlueprint: row.hasBlueprintButton,
      });
      usageRows++;
    }
  }

  return { status: 'loaded', usageRows };
}

export async function loadToAnalytics(
  store: PipelineStore,
  rows: readonly RankedRepository[],
  now: Date
): Promise<LoadReport> {
  const snapshotDate = toSnapshotDate(now);
  const report: LoadReport = { loaded: 0, skipped: 0, failed: 0, usageRows: 0 };

  for (const row of rows) {
    try {
      const outcome = await loadRow(store, row, snapshotDate);
      if (outcome.status === 'skipped') {
        report.skipped++;
        log.warn('Row skipped', { repo: row.fullName, reason: outcome.reason });
        continue;
      }
      report.loaded++;
      report.usageRows += outcome.usageRows;
    } catch (error) {
      report.failed++;
      log.error('Row load failed', { repo: row.fullName, error: describeError(error) });
    }
  }

  log.info('Analytics load complete', { snapshotDate, ...report });
  return report;
}
