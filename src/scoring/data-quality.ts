/**
 * RepoPulse — Data Quality Scoring
 *
 * score = 0.4 × completeness + 0.3 × freshness + 0.3 × validity,
 * rounded to 2 decimals. Pure; the caller supplies "now".
 */

import { DEFAULT_SCORING_POLICY, stepScore, type ScoringPolicy } from './policy';
import { daysSince, parseTimestamp, roundTo } from './time';

export interface QualityInput {
  fullName: string | null;
  url: string | null;
  language: string | null;
  stars: number | null;
  createdAt: string | null;
  updatedAt: string | null;
  description: string | null;
  forks: number | null;
  openIssues: number | null;
  commitsLast7Days: number | null;
  activeContributors: number | null;
}

export interface QualityBreakdown {
  completeness: number;
  freshness: number;
  validity: number;
  score: number;
}

const REQUIRED_FIELDS = ['fullName', 'url', 'language', 'stars', 'createdAt', 'updatedAt'] as const;
const OPTIONAL_FIELDS = ['description', 'forks', 'openIssues', 'commitsLast7Days', 'activeContributors'] as const;

// Zero is a real count; only null or an empty string is missing.
function isPresent(value: string | number | null): boolean {
  if (value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  return Number.isFinite(value);
}

export function calculateCompletenessScore(
  repo: QualityInput,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): number {
  const requiredPresent = REQUIRED_FIELDS.filter(field => isPresent(repo[field])).length;
  const optionalPresent = OPTIONAL_FIELDS.filter(field => isPresent(repo[field])).length;

  return (
    (requiredPresent / REQUIRED_FIELDS.length) * policy.quality.requiredFieldsWeight +
    (optionalPresent / OPTIONAL_FIELDS.length) * policy.quality.optionalFieldsWeight
  );
}

export function calculateFreshnessScore(
  updatedAt: string | null,
  now: Date,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): number {
  const days = daysSince(updatedAt, now);
  if (days === null) return policy.quality.unknownFreshness;
  return stepScore(days, policy.quality.freshnessBuckets, policy.quality.staleFreshness);
}

export function calculateValidityScore(
  repo: QualityInput,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): number {
  const { penalties, maxForkToStarRatio, recognizedLanguages } = policy.quality;
  let score = 1.0;

  const stars = repo.stars ?? 0;
  const forks = repo.forks ?? 0;

  if (stars < 0) score -= penalties.negativeStars;

  if (forks < 0) {
    score -= penalties.negativeForks;
  } else if (stars > 0 && forks > stars * maxForkToStarRatio) {
    score -= penalties.forkRatio;
  }

  const created = parseTimestamp(repo.createdAt);
  const updated = parseTimestamp(repo.updatedAt);
  if (created && updated && created.getTime() > updated.getTime()) {
    score -= penalties.createdAfterUpdated;
  }

  if (!repo.language || !recognizedLanguages.includes(repo.language)) {
    score -= penalties.unrecognizedLanguage;
  }

  return Math.max(0, score);
}

export function assessDataQuality(
  repo: QualityInput,
  now: Date,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): QualityBreakdown {
  const completeness = calculateCompletenessScore(repo, policy);
  const freshness = calculateFreshnessScore(repo.updatedAt, now, policy);
  const validity = calculateValidityScore(repo, policy);

  const { completenessWeight, freshnessWeight, validityWeight } = policy.quality;
  const total =
    completeness * completenessWeight + freshness * freshnessWeight + validity * validityWeight;

  return {
    completeness,
    freshness,
    validity,
    score: Math.min(1, Math.max(0, roundTo(total, 2))),
  };
}

export function calculateDataQualityScore(
  repo: QualityInput,
  now: Date,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): number {
  return assessDataQuality(repo, now, policy).score;
}
