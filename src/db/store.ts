/**
 * RepoPulse — Pipeline Store Contract
 *
 * Everything the pipeline reads from or writes to the relational store.
 * Each call is a single round trip; nothing holds a connection across
 * a GitHub request.
 */

import type {
  RawMetricRecord,
  RawRepoRecord,
  RepositoryDimension,
  ServiceUsageFact,
  SnapshotFact,
  StagingRecord,
} from '../types';

export interface PipelineStore {
  /** Cheap read used by the connection probe */
  ping(): Promise<void>;
  close(): Promise<void>;

  upsertRawRepos(records: RawRepoRecord[]): Promise<number>;
  /** One row per repository and metric type, latest count wins */
  upsertRawMetrics(records: RawMetricRecord[]): Promise<number>;

  /** Insert or overwrite by full name; refreshes loadedAt */
  upsertStagingRepo(record: StagingRecord): Promise<void>;
  listQualifiedStaging(minQuality: number): Promise<StagingRecord[]>;

  upsertRepositoryDimension(row: RepositoryDimension): Promise<void>;
  findRepositoryKey(fullName: string): Promise<number | null>;
  findLanguageKey(language: string): Promise<number | null>;
  findServiceKey(serviceType: string): Promise<number | null>;

  upsertSnapshot(fact: SnapshotFact): Promise<void>;
  upsertServiceUsage(fact: ServiceUsageFact): Promise<void>;
}
