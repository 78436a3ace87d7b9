/**
 * RepoPulse — Load Tests
 */

import { describe, it, expect } from 'vitest';
import { loadToAnalytics, toSnapshotDate } from '../../src/etl/load';
import type { RankedRepository } from '../../src/types';
import { MemoryPipelineStore } from '../helpers/memory-store';
import { NOW, makeStagingRecord } from '../helpers/fixtures';

function makeRanked(overrides: Partial<RankedRepository> = {}): RankedRepository {
  return {
    ...makeStagingRecord(overrides),
    recencyScore: 1,
    normalizedStars: 0.5,
    momentumScore: 0.85,
    starVelocity: 10,
    activityScore: null,
    rankOverall: 1,
    rankInLanguage: 1,
    ...overrides,
  };
}

function seededStore(): MemoryPipelineStore {
  return new MemoryPipelineStore({ languages: ['Go', 'render'], services: ['web', 'worker'] });
}

describe('toSnapshotDate', () => {
  it('should use the UTC calendar date', () => {
    expect(toSnapshotDate(new Date('2026-03-15T23:59:59.000Z'))).toBe('2026-03-15');
  });
});

describe('loadToAnalytics', () => {
  it('should write a dimension row and a snapshot keyed by repository, language and date', async () => {
    const store = seededStore();

    const report = await loadToAnalytics(store, [makeRanked({ fullName: 'go/app', rankOverall: 3 })], NOW);

    expect(report).toEqual({ loaded: 1, skipped: 0, failed: 0, usageRows: 0 });
    expect(store.dimensions.get('go/app')).toMatchObject({ repoKey: 1, isCurrent: true, language: 'Go' });
    expect(store.snapshots.get('1:1:2026-03-15')).toMatchObject({ stars: 100, rankOverall: 3, momentumScore: 0.85 });
  });

  it('should skip a row whose language is not in the dimension', async () => {
    const store = seededStore();

    const report = await loadToAnalytics(
      store,
      [makeRanked({ fullName: 'py/app', language: 'Python' }), makeRanked({ fullName: 'go/app' })],
      NOW
    );

    expect(report).toEqual({ loaded: 1, skipped: 1, failed: 0, usageRows: 0 });
    expect(store.snapshots.has('1:1:2026-03-15')).toBe(false);
    expect(store.snapshots.has('2:1:2026-03-15')).toBe(true);
  });

  it('should count a failing snapshot write and continue', async () => {
    const store = seededStore();
    store.failingSnapshotKeys.add(1);

    const report = await loadToAnalytics(
      store,
      [makeRanked({ fullName: 'go/broken' }), makeRanked({ fullName: 'go/fine' })],
      NOW
    );

    expect(report).toEqual({ loaded: 1, skipped: 0, failed: 1, usageRows: 0 });
    expect(store.snapshots.size).toBe(1);
  });

  it('should write one usage row per known distinct service', async () => {
    const store = seededStore();
    const row = makeRanked({
      fullName: 'r/app',
      language: 'render',
      usesRender: true,
      renderCategory: 'community',
      renderServices: ['web', 'web', 'cron', 'worker'],
      serviceCount: 4,
      renderComplexityScore: 6,
      hasBlueprintButton: true,
    });

    const report = await loadToAnalytics(store, [row], NOW);

    expect(report.usageRows).toBe(2);
    expect([...store.usage.keys()]).toEqual(['1:1:2026-03-15', '1:2:2026-03-15']);
    expect(store.usage.get('1:1:2026-03-15')).toEqual({
      repoKey: 1,
      serviceKey: 1,
      snapshotDate: '2026-03-15',
      serviceCount: 4,
      complexityScore: 6,
      hasBlueprint: true,
    });
  });

  it('should produce the same rows when run twice on the same day', async () => {
    const store = seededStore();
    const rows = [makeRanked({ fullName: 'go/a' }), makeRanked({ fullName: 'go/b', stars: 40 })];

    await loadToAnalytics(store, rows, NOW);
    await loadToAnalytics(store, rows, NOW);

    expect(store.dimensions.size).toBe(2);
    expect(store.snapshots.size).toBe(2);
  });
});
