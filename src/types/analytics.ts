/**
 * RepoPulse — Analytics Layer Types
 *
 * Dimension and fact records written by the load step.
 */

import type { RenderCategory, StagingRecord } from './repository';

export interface RankedRepository extends StagingRecord {
  recencyScore: number;
  normalizedStars: number;
  momentumScore: number;
  starVelocity: number;
  activityScore: number | null;
  /** Ordinal by descending stars across the extracted set */
  rankOverall: number;
  /** Ordinal by descending stars within the repository's language */
  rankInLanguage: number;
}

export interface RepositoryDimension {
  fullName: string;
  url: string | null;
  description: string | null;
  readmeContent: string | null;
  language: string;
  createdAt: string;
  usesRender: boolean;
  renderCategory: RenderCategory | null;
  isCurrent: true;
}

export interface SnapshotFact {
  repoKey: number;
  languageKey: number;
  /** YYYY-MM-DD */
  snapshotDate: string;
  stars: number;
  forks: number | null;
  starVelocity: number;
  activityScore: number | null;
  momentumScore: number;
  commitsLast7Days: number | null;
  issuesClosedLast7Days: number | null;
  activeContributors: number | null;
  rankOverall: number;
  rankInLanguage: number;
}

export interface ServiceUsageFact {
  repoKey: number;
  serviceKey: number;
  snapshotDate: string;
  serviceCount: number;
  complexityScore: number | null;
  hasBlueprint: boolean;
}

export interface LoadReport {
  loaded: number;
  skipped: number;
  failed: number;
  usageRows: number;
}
