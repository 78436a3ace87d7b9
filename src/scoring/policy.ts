/**
 * RepoPulse — Scoring Policy
 *
 * Every weight and bucket used by the quality and momentum scores.
 * The ranking formula is expected to keep changing; change it here.
 */

/** Upper bound in days (inclusive) → score */
export interface StepBucket {
  maxDays: number;
  score: number;
}

export interface ScoringPolicy {
  quality: {
    completenessWeight: number;
    freshnessWeight: number;
    validityWeight: number;
    requiredFieldsWeight: number;
    optionalFieldsWeight: number;
    freshnessBuckets: StepBucket[];
    staleFreshness: number;
    unknownFreshness: number;
    recognizedLanguages: string[];
    penalties: {
      negativeStars: number;
      negativeForks: number;
      forkRatio: number;
      createdAfterUpdated: number;
      unrecognizedLanguage: number;
    };
    /** forks above stars × this ratio count as suspicious */
    maxForkToStarRatio: number;
  };
  momentum: {
    recencyWeight: number;
    starsWeight: number;
    recencyBuckets: StepBucket[];
    minimumRecency: number;
  };
  activity: {
    commitsWeight: number;
    issuesClosedWeight: number;
    contributorsWeight: number;
  };
}

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  quality: {
    completenessWeight: 0.4,
    freshnessWeight: 0.3,
    validityWeight: 0.3,
    requiredFieldsWeight: 0.7,
    optionalFieldsWeight: 0.3,
    freshnessBuckets: [
      { maxDays: 1, score: 1.0 },
      { maxDays: 7, score: 0.9 },
      { maxDays: 30, score: 0.7 },
      { maxDays: 90, score: 0.5 },
    ],
    staleFreshness: 0.3,
    unknownFreshness: 0.5,
    recognizedLanguages: [
      'Python', 'TypeScript', 'JavaScript', 'Go', 'Java', 'C++',
      'C', 'Ruby', 'PHP', 'C#', 'Rust', 'Swift',
    ],
    penalties: {
      negativeStars: 0.3,
      negativeForks: 0.2,
      forkRatio: 0.1,
      createdAfterUpdated: 0.2,
      unrecognizedLanguage: 0.1,
    },
    maxForkToStarRatio: 2,
  },
  momentum: {
    recencyWeight: 0.7,
    starsWeight: 0.3,
    recencyBuckets: [
      { maxDays: 14, score: 1.0 },
      { maxDays: 30, score: 0.85 },
      { maxDays: 60, score: 0.6 },
      { maxDays: 90, score: 0.35 },
      { maxDays: 180, score: 0.15 },
      { maxDays: 365, score: 0.05 },
    ],
    minimumRecency: 0.01,
  },
  activity: {
    commitsWeight: 0.4,
    issuesClosedWeight: 0.3,
    contributorsWeight: 0.3,
  },
};

/**
 * Policy with a different recency/stars split. Weights always sum to 1.
 */
export function withMomentumWeights(policy: ScoringPolicy, recencyWeight: number): ScoringPolicy {
  if (recencyWeight < 0 || recencyWeight > 1) {
    throw new RangeError(`recencyWeight must be within [0, 1], got ${recencyWeight}`);
  }
  return {
    ...policy,
    momentum: {
      ...policy.momentum,
      recencyWeight,
      starsWeight: Math.round((1 - recencyWeight) * 1000) / 1000,
    },
  };
}

/**
 * First bucket whose bound covers `days`, else the fallback.
 */
export function stepScore(days: number, buckets: StepBucket[], fallback: number): number {
  for (const bucket of buckets) {
    if (days <= bucket.maxDays) return bucket.score;
  }
  return fallback;
}
