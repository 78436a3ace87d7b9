/**
 * RepoPulse — Data Quality Tests
 */

import { describe, it, expect } from 'vitest';
import {
  assessDataQuality,
  calculateCompletenessScore,
  calculateDataQualityScore,
  calculateFreshnessScore,
  calculateValidityScore,
  type QualityInput,
} from '../../src/scoring/data-quality';
import { DEFAULT_SCORING_POLICY } from '../../src/scoring/policy';
import { NOW, daysAgo } from '../helpers/fixtures';

function makeInput(overrides: Partial<QualityInput> = {}): QualityInput {
  return {
    fullName: 'a/b',
    url: 'https://github.com/a/b',
    language: 'Go',
    stars: 120,
    createdAt: daysAgo(2),
    updatedAt: daysAgo(1),
    description: null,
    forks: null,
    openIssues: null,
    commitsLast7Days: null,
    activeContributors: null,
    ...overrides,
  };
}

describe('calculateCompletenessScore', () => {
  it('should weight required fields at 0.7 when no optional field is present', () => {
    expect(calculateCompletenessScore(makeInput())).toBeCloseTo(0.7, 10);
  });

  it('should reach 1.0 when every field is present', () => {
    const score = calculateCompletenessScore(makeInput({
      description: 'desc',
      forks: 3,
      openIssues: 1,
      commitsLast7Days: 4,
      activeContributors: 2,
    }));
    expect(score).toBeCloseTo(1.0, 10);
  });

  it('should count zero as present', () => {
    const score = calculateCompletenessScore(makeInput({ forks: 0 }));
    expect(score).toBeCloseTo(0.7 + 0.3 / 5, 10);
  });

  it('should treat blank strings as missing', () => {
    const score = calculateCompletenessScore(makeInput({ url: '  ' }));
    expect(score).toBeCloseTo((5 / 6) * 0.7, 10);
  });
});

describe('calculateFreshnessScore', () => {
  it('should score 1.0 for a repository updated exactly one day ago', () => {
    expect(calculateFreshnessScore(daysAgo(1), NOW)).toBe(1.0);
  });

  it('should score 0.9 at seven days', () => {
    expect(calculateFreshnessScore(daysAgo(7), NOW)).toBe(0.9);
  });

  it('should score 0.7 at eight days', () => {
    expect(calculateFreshnessScore(daysAgo(8), NOW)).toBe(0.7);
  });

  it('should score 0.5 at ninety days and 0.3 beyond', () => {
    expect(calculateFreshnessScore(daysAgo(90), NOW)).toBe(0.5);
    expect(calculateFreshnessScore(daysAgo(91), NOW)).toBe(0.3);
  });

  it('should score 0.5 when the update time is unknown', () => {
    expect(calculateFreshnessScore(null, NOW)).toBe(0.5);
    expect(calculateFreshnessScore('not-a-date', NOW)).toBe(0.5);
  });
});

describe('calculateValidityScore', () => {
  it('should return 1.0 without penalties', () => {
    expect(calculateValidityScore(makeInput())).toBe(1.0);
  });

  it('should combine the fork ratio and language penalties', () => {
    const score = calculateValidityScore(makeInput({ forks: 300, stars: 100, language: 'Unknown' }));
    expect(score).toBeCloseTo(0.8, 10);
  });

  it('should penalize negative counts', () => {
    const score = calculateValidityScore(makeInput({ stars: -1, forks: -1 }));
    expect(score).toBeCloseTo(0.5, 10);
  });

  it('should penalize a creation date after the update date', () => {
    const score = calculateValidityScore(makeInput({ createdAt: daysAgo(1), updatedAt: daysAgo(5) }));
    expect(score).toBeCloseTo(0.8, 10);
  });

  it('should penalize a missing language', () => {
    expect(calculateValidityScore(makeInput({ language: null }))).toBeCloseTo(0.9, 10);
  });

  it('should never drop below zero', () => {
    const strict = {
      ...DEFAULT_SCORING_POLICY,
      quality: {
        ...DEFAULT_SCORING_POLICY.quality,
        penalties: { ...DEFAULT_SCORING_POLICY.quality.penalties, negativeStars: 2 },
      },
    };
    expect(calculateValidityScore(makeInput({ stars: -5 }), strict)).toBe(0);
  });
});

describe('calculateDataQualityScore', () => {
  it('should score the minimal Go candidate at 0.88', () => {
    expect(calculateDataQualityScore(makeInput(), NOW)).toBe(0.88);
  });

  it('should expose the component scores', () => {
    const breakdown = assessDataQuality(makeInput(), NOW);
    expect(breakdown.freshness).toBe(1.0);
    expect(breakdown.validity).toBe(1.0);
    expect(breakdown.completeness).toBeCloseTo(0.7, 10);
  });

  it('should stay within [0, 1] for an empty record', () => {
    const score = calculateDataQualityScore(
      {
        fullName: null,
        url: null,
        language: null,
        stars: null,
        createdAt: null,
        updatedAt: null,
        description: null,
        forks: null,
        openIssues: null,
        commitsLast7Days: null,
        activeContributors: null,
      },
      NOW
    );
    // 0.4 * 0 + 0.3 * 0.5 + 0.3 * 0.9
    expect(score).toBe(0.42);
  });
});
