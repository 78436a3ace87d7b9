/**
 * RepoPulse — Batch Analysis
 *
 * Per repository: pending → fetching → scoring → persisting → done,
 * with `skipped` (invalid input) and `failed` (any thrown error) as the
 * terminal exits. Batches run through the chunked task group so one
 * failure never touches its siblings.
 */

import { MARKER_COHORT_LANGUAGE } from '../config';
import { detectRenderUsage, withBlueprintButton, type FileSource } from '../detection/render-usage';
import type { PipelineStore } from '../db/store';
import { AnalysisError, type AnalysisStage } from '../lib/errors';
import { describeError, logger } from '../lib/logger';
import { isWellFormedFullName } from '../providers/normalizer';
import { assessDataQuality } from '../scoring/data-quality';
import type { ScoringPolicy } from '../scoring/policy';
import { DAY_MS } from '../scoring/time';
import type {
  ActivitySignals,
  EnrichedRepository,
  RawMetricRecord,
  RepoSummary,
  RepositoryCandidate,
  StagingRecord,
} from '../types';
import { NO_ACTIVITY } from '../types';
import { SkipTask, runInChunks, successes } from './task-group';

// ============================================================
// TYPES
// ============================================================

export interface RepositorySource extends FileSource {
  fetchReadme(owner: string, repo: string): Promise<string | null>;
  countRecentCommits(owner: string, repo: string, since: Date): Promise<number | null>;
  countClosedIssues(owner: string, repo: string, since: Date): Promise<number | null>;
  countContributors(owner: string, repo: string): Promise<number | null>;
}

export interface AnalysisTarget {
  candidate: RepositoryCandidate;
  /** Marker-search hits; staged under the marker cohort once confirmed */
  markerCohort: boolean;
  /** README from an earlier bulk fetch, skips the download */
  readme?: string | null;
}

export interface AnalyzerDeps {
  source: RepositorySource;
  store: Pick<PipelineStore, 'upsertStagingRepo' | 'upsertRawMetrics'>;
}

export interface AnalyzerOptions {
  chunkSize: number;
  employeeOrgs: readonly string[];
  collectActivity: boolean;
  scoring: ScoringPolicy;
  now: Date;
}

export interface BatchReport {
  summaries: RepoSummary[];
  succeeded: number;
  skipped: number;
  failed: number;
}

type WithRequiredFields<T> = T & {
  language: string;
  stars: number;
  createdAt: string;
  updatedAt: string;
};

export type ValidatedCandidate = WithRequiredFields<RepositoryCandidate>;
type ValidatedRepository = WithRequiredFields<EnrichedRepository>;

const ACTIVITY_WINDOW_DAYS = 7;

const log = logger.child({ component: 'analyzer' });

// ============================================================
// VALIDATION
// ============================================================

export type ValidationResult =
  | { ok: true; candidate: ValidatedCandidate }
  | { ok: false; reason: string };

export function validateCandidate(candidate: RepositoryCandidate): ValidationResult {
  if (!isWellFormedFullName(candidate.fullName) || candidate.fullName !== `${candidate.owner}/${candidate.name}`) {
    return { ok: false, reason: `malformed full name "${candidate.fullName}"` };
  }

  const { language, stars, createdAt, updatedAt } = candidate;
  if (!language) return { ok: false, reason: 'missing language' };
  if (stars === null) return { ok: false, reason: 'missing star count' };
  if (!createdAt) return { ok: false, reason: 'missing creation timestamp' };
  if (!updatedAt) return { ok: false, reason: 'missing update timestamp' };

  return { ok: true, candidate: { ...candidate, language, stars, createdAt, updatedAt } };
}

// ============================================================
// RECORD BUILDING
// ============================================================

export function toStagingRecord(repo: ValidatedRepository, loadedAt: string): StagingRecord {
  const usage = repo.usage;
  return {
    fullName: repo.fullName,
    url: repo.url,
    language: repo.cohortLanguage ?? repo.language,
    primaryLanguage: repo.language,
    description: repo.description,
    readmeContent: repo.readmeContent,
    stars: repo.stars,
    forks: repo.forks,
    openIssues: repo.openIssues,
    createdAt: repo.createdAt,
    updatedAt: repo.updatedAt,
    commitsLast7Days: repo.activity.commitsLast7Days,
    issuesClosedLast7Days: repo.activity.issuesClosedLast7Days,
    activeContributors: repo.activity.activeContributors,
    usesRender: usage.usesRender,
    renderCategory: usage.usesRender ? usage.category : null,
    renderServices: usage.usesRender ? usage.services : [],
    renderComplexityScore: usage.usesRender ? usage.complexityScore : null,
    hasBlueprintButton: usage.usesRender && usage.hasBlueprintButton,
    serviceCount: usage.usesRender ? usage.serviceCount : 0,
    dataQualityScore: repo.dataQualityScore,
    loadedAt,
  };
}

function activityWindowStart(now: Date): Date {
  return new Date(now.getTime() - ACTIVITY_WINDOW_DAYS * DAY_MS);
}

async function fetchActivity(
  source: RepositorySource,
  candidate: RepositoryCandidate,
  now: Date
): Promise<ActivitySignals> {
  const since = activityWindowStart(now);
  const [commitsLast7Days, issuesClosedLast7Days, activeContributors] = await Promise.all([
    source.countRecentCommits(candidate.owner, candidate.name, since),
    source.countClosedIssues(candidate.owner, candidate.name, since),
    source.countContributors(candidate.owner, candidate.name),
  ]);
  return { commitsLast7Days, issuesClosedLast7Days, activeContributors };
}

export function toRawMetrics(fullName: string, activity: ActivitySignals, now: Date): RawMetricRecord[] {
  const since = activityWindowStart(now).toISOString();
  const counts: Array<[RawMetricRecord['metricType'], number | null, string | null]> = [
    ['commits', activity.commitsLast7Days, since],
    ['issues', activity.issuesClosedLast7Days, since],
    ['contributors', activity.activeContributors, null],
  ];
  const records: RawMetricRecord[] = [];
  for (const [metricType, count, window] of counts) {
    if (count !== null) records.push({ fullName, metricType, count, since: window });
  }
  return records;
}

/** Raw-layer write; a failure is logged and does not fail the analysis. */
async function recordRawMetrics(
  store: Pick<PipelineStore, 'upsertRawMetrics'>,
  fullName: string,
  records: RawMetricRecord[]
): Promise<void> {
  try {
    await store.upsertRawMetrics(records);
  } catch (error) {
    log.warn('Raw metrics write failed', { repo: fullName, error: describeError(error) });
  }
}

// ============================================================
// SINGLE REPOSITORY
// ============================================================

/**
 * Resolves with a summary once the staging row is written.
 * Rejects with SkipTask for invalid input and AnalysisError for anything else.
 */
export async function analyzeRepository(
  target: AnalysisTarget,
  deps: AnalyzerDeps,
  options: AnalyzerOptions
): Promise<RepoSummary> {
  const validation = validateCandidate(target.candidate);
  if (!validation.ok) throw new SkipTask(validation.reason);

  const candidate = validation.candidate;
  let stage: AnalysisStage = 'pending';

  try {
    stage = 'fetching';
    const [readme, detected, activity] = await Promise.all([
      target.readme !== undefined
        ? Promise.resolve(target.readme)
        : deps.source.fetchReadme(candidate.owner, candidate.name),
      detectRenderUsage(candidate, deps.source, { employeeOrgs: options.employeeOrgs }),
      options.collectActivity
        ? fetchActivity(deps.source, candidate, options.now)
        : Promise.resolve(NO_ACTIVITY),
    ]);

    const usage = withBlueprintButton(detected, readme);
    if (target.markerCohort && !usage.usesRender) {
      throw new SkipTask('render.yaml not found');
    }

    if (options.collectActivity) {
      await recordRawMetrics(deps.store, candidate.fullName, toRawMetrics(candidate.fullName, activity, options.now));
    }

    stage = 'scoring';
    const quality = assessDataQuality(
      {
        fullName: candidate.fullName,
        url: candidate.url,
        language: candidate.language,
        stars: candidate.stars,
        createdAt: candidate.createdAt,
        updatedAt: candidate.updatedAt,
        description: candidate.description,
        forks: candidate.forks,
        openIssues: candidate.openIssues,
        commitsLast7Days: activity.commitsLast7Days,
        activeContributors: activity.activeContributors,
      },
      options.now,
      options.scoring
    );

    const enriched: ValidatedRepository = {
      ...candidate,
      cohortLanguage: target.markerCohort ? MARKER_COHORT_LANGUAGE : null,
      readmeContent: readme,
      usage,
      activity,
      dataQualityScore: quality.score,
    };

    stage = 'persisting';
    const record = toStagingRecord(enriched, options.now.toISOString());
    await deps.store.upsertStagingRepo(record);

    return { fullName: record.fullName, language: record.language, stars: record.stars };
  } catch (error) {
    if (error instanceof SkipTask) throw error;
    throw new AnalysisError(candidate.fullName, stage, error);
  }
}

// ============================================================
// BATCH
// ============================================================

export async function analyzeRepoBatch(
  targets: readonly AnalysisTarget[],
  deps: AnalyzerDeps,
  options: AnalyzerOptions
): Promise<BatchReport> {
  const results = await runInChunks(
    targets,
    target => analyzeRepository(target, deps, options),
    {
      chunkSize: options.chunkSize,
      onChunkSettled: report => log.info('Chunk settled', { ...report }),
    }
  );

  let skipped = 0;
  let failed = 0;
  for (const { item, outcome } of results) {
    if (outcome.status === 'skipped') {
      skipped++;
      log.debug('Repository skipped', { repo: item.candidate.fullName, reason: outcome.reason });
    } else if (outcome.status === 'failed') {
      failed++;
      log.warn('Repository analysis failed', {
        repo: item.candidate.fullName,
        stage: outcome.error instanceof AnalysisError ? outcome.error.stage : undefined,
        error: describeError(outcome.error),
      });
    }
  }

  const summaries = successes(results);
  return { summaries, succeeded: summaries.length, skipped, failed };
}
