/**
 * RepoPulse — Transform
 *
 * Momentum, velocity and activity per row, plus star-ordered ranks.
 * Stars are normalized against the maximum of the row's own cohort.
 */

import {
  calculateActivityScore,
  calculateMomentumScore,
  calculateRecencyScore,
  calculateStarVelocity,
  normalizeStars,
} from '../scoring/metrics';
import type { ScoringPolicy } from '../scoring/policy';
import { daysSince } from '../scoring/time';
import type { RankedRepository, StagingRecord } from '../types';
import { byStarsDesc } from './extract';

function maxStars(rows: readonly StagingRecord[]): number {
  return rows.reduce((max, row) => Math.max(max, row.stars), 0);
}

/** Ordinal by descending stars, ties broken by input position. */
export function assignRanks(rows: readonly StagingRecord[]): Map<string, number> {
  const ranks = new Map<string, number>();
  byStarsDesc(rows).forEach((row, index) => ranks.set(row.fullName, index + 1));
  return ranks;
}

export function transformForRanking(
  rows: readonly StagingRecord[],
  now: Date,
  policy: ScoringPolicy,
  markerCohort: string
): RankedRepository[] {
  const generalMax = maxStars(rows.filter(row => row.language !== markerCohort));
  const cohortMax = maxStars(rows.filter(row => row.language === markerCohort));

  const overall = assignRanks(rows);
  const inLanguage = new Map<string, number>();
  const languages = new Set(rows.map(row => row.language));
  for (const language of languages) {
    for (const [fullName, rank] of assignRanks(rows.filter(row => row.language === language))) {
      inLanguage.set(fullName, rank);
    }
  }

  const ranked = rows.map((row): RankedRepository => {
    const recencyScore = calculateRecencyScore(row.createdAt, now, policy);
    const normalizedStars = normalizeStars(row.stars, row.language === markerCohort ? cohortMax : generalMax);
    const { commitsLast7Days, issuesClosedLast7Days, activeContributors } = row;

    return {
      ...row,
      recencyScore,
      normalizedStars,
      momentumScore: calculateMomentumScore({ recencyScore, normalizedStars }, policy),
      starVelocity: calculateStarVelocity(row.stars, daysSince(row.createdAt, now)),
      activityScore:
        commitsLast7Days !== null && issuesClosedLast7Days !== null && activeContributors !== null
          ? calculateActivityScore(commitsLast7Days, issuesClosedLast7Days, activeContributors, policy)
          : null,
      rankOverall: overall.get(row.fullName) ?? rows.length,
      rankInLanguage: inLanguage.get(row.fullName) ?? rows.length,
    };
  });

  return ranked.sort((a, b) => b.momentumScore - a.momentumScore || a.rankOverall - b.rankOverall);
}
