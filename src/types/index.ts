/**
 * RepoPulse — Type Exports
 */

export type {
  RepositoryCandidate,
  CandidateSource,
  RenderCategory,
  RenderUsage,
  DetectedRenderUsage,
  ActivitySignals,
  EnrichedRepository,
  RepoSummary,
  RawRepoRecord,
  RawMetricType,
  RawMetricRecord,
  StagingRecord,
} from './repository';
export {
  RepositoryCandidateSchema,
  RenderCategorySchema,
  RenderUsageSchema,
  ActivitySignalsSchema,
  EnrichedRepositorySchema,
  NO_RENDER_USAGE,
  NO_ACTIVITY,
} from './repository';

export type {
  RankedRepository,
  RepositoryDimension,
  SnapshotFact,
  ServiceUsageFact,
  LoadReport,
} from './analytics';
