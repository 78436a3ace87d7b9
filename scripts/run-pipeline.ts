/**
 * RepoPulse — Run Pipeline Script
 *
 * Executes one full collection → analysis → ranking run.
 *
 * Usage:
 *   npm run pipeline             # Mode from PIPELINE_MODE (default full)
 *   npm run pipeline -- --dev    # One language, 10 repos, 10 marker repos
 */

import 'dotenv/config';
import { applyMode, loadConfig, type AppConfig } from '../src/config';
import { isFatalError } from '../src/lib/errors';
import { describeError, logger } from '../src/lib/logger';
import { runPipeline } from '../src/pipeline/workflow';

interface ScriptOptions {
  dev: boolean;
}

function parseArgs(args: string[]): ScriptOptions {
  return { dev: args.includes('--dev') };
}

function withOverrides(config: AppConfig, options: ScriptOptions): AppConfig {
  if (!options.dev) return config;
  return { ...config, pipeline: applyMode(config.pipeline, 'dev') };
}

async function main(): Promise<number> {
  const options = parseArgs(process.argv.slice(2));

  try {
    const config = withOverrides(loadConfig(), options);
    const summary = await runPipeline(config);

    console.log('\n' + '='.repeat(60));
    console.log(summary.success ? 'PIPELINE COMPLETE' : 'PIPELINE FAILED');
    console.log('='.repeat(60));
    console.log(`Run: ${summary.runId}`);
    console.log(`Duration: ${summary.executionSeconds.toFixed(2)}s`);
    console.log(`Languages: ${summary.languages.join(', ')}`);
    console.log(`Repositories processed: ${summary.reposProcessed}`);
    console.log(`Analytics rows loaded: ${summary.rowsLoaded}`);
    console.log('='.repeat(60) + '\n');

    return summary.success ? 0 : 1;
  } catch (error) {
    const label = isFatalError(error) ? error.name : 'Error';
    logger.error('Pipeline failed', { error: describeError(error) });
    console.error(`\n${label}: ${describeError(error)}`);
    return 1;
  }
}

main().then(code => process.exit(code));
