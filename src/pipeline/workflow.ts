/**
 * RepoPulse — Pipeline Run
 *
 * One invocation: open connections, collect and analyze candidates per
 * language, then the render.yaml ecosystem, then extract → transform → load.
 * Only configuration and connection errors escape; everything else ends
 * in a summary with success: false.
 */

import { nanoid } from 'nanoid';
import { MARKER_COHORT_LANGUAGE, type AppConfig } from '../config';
import { withConnections, type ConnectionFactories, type Connections } from '../db/connections';
import { extractFromStaging } from '../etl/extract';
import { loadToAnalytics } from '../etl/load';
import { transformForRanking } from '../etl/transform';
import { isFatalError } from '../lib/errors';
import { describeError, logger, timeOperation, type Logger } from '../lib/logger';
import { analyzeRepoBatch, type AnalyzerOptions } from './analyzer';
import { collectLanguageCandidates, collectMarkerCandidates } from './sources';

export interface PipelineSummary {
  runId: string;
  reposProcessed: number;
  executionSeconds: number;
  success: boolean;
  languages: string[];
  rowsLoaded: number;
}

export interface PipelineDeps {
  factories?: ConnectionFactories;
  now?: () => Date;
}

async function runStages(
  config: AppConfig,
  { github, store }: Connections,
  now: Date,
  log: Logger
): Promise<{ processed: Set<string>; rowsLoaded: number }> {
  const { pipeline } = config;
  const analyzerOptions: AnalyzerOptions = {
    chunkSize: pipeline.chunkSize,
    employeeOrgs: pipeline.employeeOrgs,
    collectActivity: pipeline.collectActivity,
    scoring: pipeline.scoring,
    now,
  };
  const deps = { source: github, store };
  const processed = new Set<string>();

  for (const language of pipeline.languages) {
    const candidates = await collectLanguageCandidates(github, store, language, pipeline.reposPerLanguage, now);
    const report = await timeOperation(
      `analyze ${language}`,
      () => analyzeRepoBatch(candidates.map(candidate => ({ candidate, markerCohort: false })), deps, analyzerOptions),
      log
    );
    report.summaries.forEach(summary => processed.add(summary.fullName));
    log.info('Language analyzed', {
      language,
      candidates: candidates.length,
      succeeded: report.succeeded,
      skipped: report.skipped,
      failed: report.failed,
    });
  }

  const markerCandidates = await collectMarkerCandidates(github, store, pipeline.markerRepoLimit, now);
  const markerReport = await analyzeRepoBatch(
    markerCandidates.map(candidate => ({ candidate, markerCohort: true })),
    deps,
    analyzerOptions
  );
  markerReport.summaries.forEach(summary => processed.add(summary.fullName));
  log.info('Marker ecosystem analyzed', {
    candidates: markerCandidates.length,
    succeeded: markerReport.succeeded,
    skipped: markerReport.skipped,
    failed: markerReport.failed,
  });

  const extracted = await extractFromStaging(store, {
    qualityThreshold: pipeline.qualityThreshold,
    perLanguageLimit: pipeline.perLanguageLimit,
    markerCohort: MARKER_COHORT_LANGUAGE,
  });
  const ranked = transformForRanking(extracted, now, pipeline.scoring, MARKER_COHORT_LANGUAGE);
  const loadReport = await loadToAnalytics(store, ranked, now);

  return { processed, rowsLoaded: loadReport.loaded };
}

export async function runPipeline(config: AppConfig, deps: PipelineDeps = {}): Promise<PipelineSummary> {
  const runId = nanoid(12);
  const log = logger.child({ runId });
  const clock = deps.now ?? (() => new Date());
  const startedAt = Date.now();

  log.info('Pipeline started', { mode: config.pipeline.mode, languages: config.pipeline.languages });

  let reposProcessed = 0;
  let rowsLoaded = 0;
  let success = false;

  try {
    const result = await withConnections(
      config,
      connections => runStages(config, connections, clock(), log),
      deps.factories
    );
    reposProcessed = result.processed.size;
    rowsLoaded = result.rowsLoaded;
    success = true;
  } catch (error) {
    if (isFatalError(error)) {
      log.error('Pipeline aborted', { error: describeError(error) });
      throw error;
    }
    log.error('Pipeline failed', { error: describeError(error) });
  }

  const summary: PipelineSummary = {
    runId,
    reposProcessed,
    executionSeconds: Math.round((Date.now() - startedAt) / 10) / 100,
    success,
    languages: config.pipeline.languages,
    rowsLoaded,
  };

  log.info('Pipeline finished', { ...summary });
  return summary;
}
