/**
 * RepoPulse — Metrics
 *
 * Velocity, activity, recency decay and momentum. All pure.
 */

import { DEFAULT_SCORING_POLICY, stepScore, type ScoringPolicy } from './policy';
import { daysSince, roundTo } from './time';

/**
 * Stars per day since creation. Repositories younger than a day count as one day old.
 */
export function calculateStarVelocity(stars: number, ageDays: number | null): number {
  if (stars <= 0 || ageDays === null) return 0;
  return roundTo(stars / Math.max(ageDays, 1), 2);
}

export function calculateActivityScore(
  commits: number,
  issuesClosed: number,
  contributors: number,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): number {
  const { commitsWeight, issuesClosedWeight, contributorsWeight } = policy.activity;
  return roundTo(
    commits * commitsWeight + issuesClosed * issuesClosedWeight + contributors * contributorsWeight,
    2
  );
}

/**
 * Step decay on repository age: 1.0 up to 14 days, down to 0.01 past a year.
 */
export function calculateRecencyScore(
  createdAt: string | null,
  now: Date,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): number {
  const ageDays = daysSince(createdAt, now);
  if (ageDays === null) return policy.momentum.minimumRecency;
  return stepScore(ageDays, policy.momentum.recencyBuckets, policy.momentum.minimumRecency);
}

/**
 * Stars divided by the cohort maximum, clamped to [0, 1].
 */
export function normalizeStars(stars: number, cohortMaxStars: number): number {
  if (cohortMaxStars <= 0 || stars <= 0) return 0;
  return roundTo(Math.min(stars / cohortMaxStars, 1), 4);
}

export function calculateMomentumScore(
  components: { recencyScore: number; normalizedStars: number },
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): number {
  const { recencyWeight, starsWeight } = policy.momentum;
  return roundTo(
    components.recencyScore * recencyWeight + components.normalizedStars * starsWeight,
    4
  );
}
