/**
 * RepoPulse — Supabase Pipeline Store
 *
 * PipelineStore over PostgREST. Rows are validated with zod on the way out
 * of the database; writes map camelCase records onto snake_case columns.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type {
  RawMetricRecord,
  RawRepoRecord,
  RepositoryDimension,
  ServiceUsageFact,
  SnapshotFact,
  StagingRecord,
} from '../types';
import { RenderCategorySchema } from '../types';
import { handleSupabaseError } from './client';
import type { PipelineStore } from './store';

export const PAGE_SIZE = 1000;

// ============================================================
// ROW SCHEMAS
// ============================================================

const nullableCount = z.coerce.number().int().nullable();

const StagingRowSchema = z.object({
  repo_full_name: z.string(),
  repo_url: z.string().nullable(),
  language: z.string(),
  primary_language: z.string().nullable(),
  description: z.string().nullable(),
  readme_content: z.string().nullable(),
  stars: z.coerce.number().int(),
  forks: nullableCount,
  open_issues: nullableCount,
  created_at: z.string(),
  updated_at: z.string(),
  commits_last_7_days: nullableCount,
  issues_closed_last_7_days: nullableCount,
  active_contributors: nullableCount,
  uses_render: z.boolean(),
  render_category: RenderCategorySchema.nullable(),
  render_services: z.array(z.string()).nullable(),
  render_complexity_score: nullableCount,
  has_blueprint_button: z.boolean(),
  service_count: z.coerce.number().int(),
  data_quality_score: z.coerce.number(),
  loaded_at: z.string(),
});
type StagingRow = z.infer<typeof StagingRowSchema>;

const RepoKeyRowSchema = z.object({ repo_key: z.number().int() });
const LanguageKeyRowSchema = z.object({ language_key: z.number().int() });
const ServiceKeyRowSchema = z.object({ service_key: z.number().int() });

// ============================================================
// MAPPING
// ============================================================

export function toStagingRow(record: StagingRecord): StagingRow {
  return {
    repo_full_name: record.fullName,
    repo_url: record.url,
    language: record.language,
    primary_language: record.primaryLanguage,
    description: record.description,
    readme_content: record.readmeContent,
    stars: record.stars,
    forks: record.forks,
    open_issues: record.openIssues,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
    commits_last_7_days: record.commitsLast7Days,
    issues_closed_last_7_days: record.issuesClosedLast7Days,
    active_contributors: record.activeContributors,
    uses_render: record.usesRender,
    render_category: record.renderCategory,
    render_services: record.renderServices,
    render_complexity_score: record.renderComplexityScore,
    has_blueprint_button: record.hasBlueprintButton,
    service_count: record.serviceCount,
    data_quality_score: record.dataQualityScore,
    loaded_at: record.loadedAt,
  };
}

export function fromStagingRow(row: StagingRow): StagingRecord {
  return {
    fullName: row.repo_full_name,
    url: row.repo_url,
    language: row.language,
    primaryLanguage: row.primary_language,
    description: row.description,
    readmeContent: row.readme_content,
    stars: row.stars,
    forks: row.forks,
    openIssues: row.open_issues,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    commitsLast7Days: row.commits_last_7_days,
    issuesClosedLast7Days: row.issues_closed_last_7_days,
    activeContributors: row.active_contributors,
    usesRender: row.uses_render,
    renderCategory: row.render_category,
    renderServices: row.render_services ?? [],
    renderComplexityScore: row.render_complexity_score,
    hasBlueprintButton: row.has_blueprint_button,
    serviceCount: row.service_count,
    dataQualityScore: row.data_quality_score,
    loadedAt: row.loaded_at,
  };
}

// ============================================================
// STORE
// ============================================================

export class SupabasePipelineStore implements PipelineStore {
  constructor(private readonly client: SupabaseClient) {}

  async ping(): Promise<void> {
    const { error, status } = await this.client
      .from('dim_languages')
      .select('language_key', { count: 'exact', head: true })
      .limit(1);

    if (error) throw handleSupabaseError(error, status);
  }

  async close(): Promise<void> {
    await this.client.removeAllChannels();
  }

  async upsertRawRepos(records: RawRepoRecord[]): Promise<number> {
    if (records.length === 0) return 0;

    const fetchedAt = new Date().toISOString();
    const { error, status } = await this.client
      .from('raw_github_repos')
      .upsert(
        records.map(record => ({
          repo_full_name: record.fullName,
          source_type: record.sourceType,
          source_language: record.sourceLanguage,
          api_response: record.payload,
          fetched_at: fetchedAt,
        })),
        { onConflict: 'repo_full_name' }
      );

    if (error) throw handleSupabaseError(error, status);
    return records.length;
  }

  async upsertRawMetrics(records: RawMetricRecord[]): Promise<number> {
    if (records.length === 0) return 0;

    const fetchedAt = new Date().toISOString();
    const { error, status } = await this.client
      .from('raw_repo_metrics')
      .upsert(
        records.map(record => ({
          repo_full_name: record.fullName,
          metric_type: record.metricType,
          metric_data: { count: record.count, since: record.since },
          fetch_timestamp: fetchedAt,
        })),
        { onConflict: 'repo_full_name,metric_type' }
      );

    if (error) throw handleSupabaseError(error, status);
    return records.length;
  }

  async upsertStagingRepo(record: StagingRecord): Promise<void> {
    const { error, status } = await this.client
      .from('stg_repos_validated')
      .upsert(toStagingRow(record), { onConflict: 'repo_full_name' });

    if (error) throw handleSupabaseError(error, status);
  }

  async listQualifiedStaging(minQuality: number): Promise<StagingRecord[]> {
    const records: StagingRecord[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error, status } = await this.client
        .from('stg_repos_validated')
        .select('*')
        .gte('data_quality_score', minQuality)
        .order('repo_full_name', { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      if (error) throw handleSupabaseError(error, status);

      const rows = z.array(StagingRowSchema).parse(data ?? []);
      records.push(...rows.map(fromStagingRow));
      if (rows.length < PAGE_SIZE) break;
    }

    return records;
  }

  async upsertRepositoryDimension(row: RepositoryDimension): Promise<void> {
    const { error, status } = await this.client
      .from('dim_repositories')
      .upsert(
        {
          repo_full_name: row.fullName,
          repo_url: row.url,
          description: row.description,
          readme_content: row.readmeContent,
          language: row.language,
          created_at: row.createdAt,
          uses_render: row.usesRender,
          render_category: row.renderCategory,
          is_current: row.isCurrent,
          updated_at: new Date().toISOString(),
        },
        { onConflict: 'repo_full_name' }
      );

    if (error) throw handleSupabaseError(error, status);
  }

  async findRepositoryKey(fullName: string): Promise<number | null> {
    const { data, error, status } = await this.client
      .from('dim_repositories')
      .select('repo_key')
      .eq('repo_full_name', fullName)
      .eq('is_current', true)
      .maybeSingle();

    if (error) throw handleSupabaseError(error, status);
    const parsed = RepoKeyRowSchema.safeParse(data);
    return parsed.success ? parsed.data.repo_key : null;
  }

  async findLanguageKey(language: string): Promise<number | null> {
    const { data, error, status } = await this.client
      .from('dim_languages')
      .select('language_key')
      .eq('language_name', language)
      .maybeSingle();

    if (error) throw handleSupabaseError(error, status);
    const parsed = LanguageKeyRowSchema.safeParse(data);
    return parsed.success ? parsed.data.language_key : null;
  }

  async findServiceKey(serviceType: string): Promise<number | null> {
    const { data, error, status } = await this.client
      .from('dim_render_services')
      .select('service_key')
      .eq('service_type', serviceType)
      .maybeSingle();

    if (error) throw handleSupabaseError(error, status);
    const parsed = ServiceKeyRowSchema.safeParse(data);
    return parsed.success ? parsed.data.service_key : null;
  }

  async upsertSnapshot(fact: SnapshotFact): Promise<void> {
    const { error, status } = await this.client
      .from('fact_repo_snapshots')
      .upsert(
        {
          repo_key: fact.repoKey,
          language_key: fact.languageKey,
          snapshot_date: fact.snapshotDate,
          stars: fact.stars,
          forks: fact.forks,
          star_velocity: fact.starVelocity,
          activity_score: fact.activityScore,
          momentum_score: fact.momentumScore,
          commits_last_7_days: fact.commitsLast7Days,
          issues_closed_last_7_days: fact.issuesClosedLast7Days,
          active_contributors: fact.activeContributors,
          rank_overall: fact.rankOverall,
          rank_in_language: fact.rankInLanguage,
        },
        { onConflict: 'repo_key,language_key,snapshot_date' }
      );

    if (error) throw handleSupabaseError(error, status);
  }

  async upsertServiceUsage(fact: ServiceUsageFact): Promise<void> {
    const { error, status } = await this.client
      .from('fact_render_usage')
      .upsert(
        {
          repo_key: fact.repoKey,
          service_key: fact.serviceKey,
          snapshot_date: fact.snapshotDate,
          service_count: fact.serviceCount,
          complexity_score: fact.complexityScore,
          has_blueprint: fact.hasBlueprint,
        },
        { onConflict: 'repo_key,service_key,snapshot_date' }
      );

    if (error) throw handleSupabaseError(error, status);
  }
}
