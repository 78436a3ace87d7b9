/**
 * RepoPulse — Repository Types
 *
 * Candidate → enriched repository → staging record.
 * Optional attributes are explicit nulls, never sentinel defaults.
 */

import { z } from 'zod';

// ============================================================
// CANDIDATE
// ============================================================

export const RepositoryCandidateSchema = z.object({
  fullName: z.string().min(1),
  owner: z.string(),
  name: z.string(),
  url: z.string().nullable(),
  language: z.string().nullable(),
  description: z.string().nullable(),
  stars: z.number().int().nullable(),
  forks: z.number().int().nullable(),
  openIssues: z.number().int().nullable(),
  createdAt: z.string().nullable(),
  updatedAt: z.string().nullable(),
  topics: z.array(z.string()),
});
export type RepositoryCandidate = z.infer<typeof RepositoryCandidateSchema>;

export type CandidateSource = 'trending' | 'render_ecosystem';

// ============================================================
// RENDER USAGE
// ============================================================

export const RenderCategorySchema = z.enum(['official', 'employee', 'blueprint', 'community']);
export type RenderCategory = z.infer<typeof RenderCategorySchema>;

export const RenderUsageSchema = z.discriminatedUnion('usesRender', [
  z.object({ usesRender: z.literal(false) }),
  z.object({
    usesRender: z.literal(true),
    category: RenderCategorySchema,
    services: z.array(z.string()),
    databases: z.array(z.string()),
    serviceCount: z.number().int().min(0),
    complexityScore: z.number().int().min(0).max(10),
    hasBlueprintButton: z.boolean(),
  }),
]);
export type RenderUsage = z.infer<typeof RenderUsageSchema>;
export type DetectedRenderUsage = Extract<RenderUsage, { usesRender: true }>;

export const NO_RENDER_USAGE: RenderUsage = { usesRender: false };

// ============================================================
// ACTIVITY
// ============================================================

export const ActivitySignalsSchema = z.object({
  commitsLast7Days: z.number().int().min(0).nullable(),
  issuesClosedLast7Days: z.number().int().min(0).nullable(),
  activeContributors: z.number().int().min(0).nullable(),
});
export type ActivitySignals = z.infer<typeof ActivitySignalsSchema>;

export const NO_ACTIVITY: ActivitySignals = {
  commitsLast7Days: null,
  issuesClosedLast7Days: null,
  activeContributors: null,
};

// ============================================================
// ENRICHED REPOSITORY
// ============================================================

export const EnrichedRepositorySchema = RepositoryCandidateSchema.extend({
  /** Staging language tag; the marker cohort tag for confirmed ecosystem repos */
  cohortLanguage: z.string().nullable(),
  readmeContent: z.string().nullable(),
  usage: RenderUsageSchema,
  activity: ActivitySignalsSchema,
  dataQualityScore: z.number().min(0).max(1),
});
export type EnrichedRepository = z.infer<typeof EnrichedRepositorySchema>;

/**
 * What the orchestrator hands back per successful analysis.
 */
export interface RepoSummary {
  fullName: string;
  language: string;
  stars: number;
}

// ============================================================
// STORED RECORDS
// ============================================================

export interface RawRepoRecord {
  fullName: string;
  payload: RepositoryCandidate;
  sourceType: CandidateSource;
  sourceLanguage: string | null;
}

export type RawMetricType = 'commits' | 'issues' | 'contributors';

export interface RawMetricRecord {
  fullName: string;
  metricType: RawMetricType;
  count: number;
  /** Start of the counting window; null for all-time counts */
  since: string | null;
}

export interface StagingRecord {
  fullName: string;
  url: string | null;
  language: string;
  primaryLanguage: string | null;
  description: string | null;
  readmeContent: string | null;
  stars: number;
  forks: number | null;
  openIssues: number | null;
  createdAt: string;
  updatedAt: string;
  commitsLast7Days: number | null;
  issuesClosedLast7Days: number | null;
  activeContributors: number | null;
  usesRender: boolean;
  renderCategory: RenderCategory | null;
  renderServices: string[];
  renderComplexityScore: number | null;
  hasBlueprintButton: boolean;
  serviceCount: number;
  dataQualityScore: number;
  loadedAt: string;
}
