/**
 * RepoPulse — Configuration
 *
 * Environment is validated once, at the entry point, into an AppConfig.
 * Importing this module never throws; loadConfig does.
 */

import { z } from 'zod';
import { ConfigurationError } from './lib/errors';
import { DEFAULT_SCORING_POLICY, withMomentumWeights, type ScoringPolicy } from './scoring/policy';

const TOKEN_PREFIXES = ['ghp_', 'gho_', 'github_pat_'] as const;

const commaList = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(Boolean));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  GITHUB_ACCESS_TOKEN: z
    .string({ required_error: 'GITHUB_ACCESS_TOKEN is required' })
    .min(1, 'GITHUB_ACCESS_TOKEN is required')
    .refine(
      token => TOKEN_PREFIXES.some(prefix => token.startsWith(prefix)),
      'GITHUB_ACCESS_TOKEN appears invalid (wrong format)'
    ),
  SUPABASE_URL: z.string({ required_error: 'SUPABASE_URL is required' }).url(),
  SUPABASE_SERVICE_ROLE_KEY: z
    .string({ required_error: 'SUPABASE_SERVICE_ROLE_KEY is required' })
    .min(1, 'SUPABASE_SERVICE_ROLE_KEY is required'),
  PIPELINE_MODE: z.enum(['full', 'dev']).default('full'),
  TARGET_LANGUAGES: commaList.default('Python,TypeScript,Go'),
  QUALITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  PER_LANGUAGE_LIMIT: z.coerce.number().int().positive().default(50),
  REPOS_PER_LANGUAGE: z.coerce.number().int().positive().max(100).default(100),
  MARKER_REPO_LIMIT: z.coerce.number().int().positive().default(100),
  ANALYSIS_CHUNK_SIZE: z.coerce.number().int().positive().default(10),
  COLLECT_ACTIVITY: booleanFlag.default('false'),
  RENDER_EMPLOYEE_GITHUB_ORGS: commaList.default(''),
  MOMENTUM_RECENCY_WEIGHT: z.coerce.number().min(0).max(1).default(0.7),
});

export type PipelineMode = 'full' | 'dev';

export interface AppConfig {
  github: {
    token: string;
  };
  supabase: {
    url: string;
    serviceRoleKey: string;
  };
  pipeline: PipelineOptions;
}

export interface PipelineOptions {
  mode: PipelineMode;
  languages: string[];
  reposPerLanguage: number;
  markerRepoLimit: number;
  qualityThreshold: number;
  perLanguageLimit: number;
  chunkSize: number;
  collectActivity: boolean;
  employeeOrgs: string[];
  scoring: ScoringPolicy;
}

/** Staging language tag for confirmed marker-file repositories */
export const MARKER_COHORT_LANGUAGE = 'render';

const DEV_LIMITS = {
  languages: 1,
  reposPerLanguage: 10,
  markerRepoLimit: 10,
} as const;

/**
 * Narrow options for a reduced-scope run.
 */
export function applyMode(options: PipelineOptions, mode: PipelineMode): PipelineOptions {
  if (mode === 'full') return { ...options, mode };
  return {
    ...options,
    mode,
    languages: options.languages.slice(0, DEV_LIMITS.languages),
    reposPerLanguage: Math.min(options.reposPerLanguage, DEV_LIMITS.reposPerLanguage),
    markerRepoLimit: Math.min(options.markerRepoLimit, DEV_LIMITS.markerRepoLimit),
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;

  if (values.TARGET_LANGUAGES.length === 0) {
    throw new ConfigurationError('TARGET_LANGUAGES must name at least one language');
  }

  const pipeline: PipelineOptions = {
    mode: 'full',
    languages: values.TARGET_LANGUAGES,
    reposPerLanguage: values.REPOS_PER_LANGUAGE,
    markerRepoLimit: values.MARKER_REPO_LIMIT,
    qualityThreshold: values.QUALITY_THRESHOLD,
    perLanguageLimit: values.PER_LANGUAGE_LIMIT,
    chunkSize: values.ANALYSIS_CHUNK_SIZE,
    collectActivity: values.COLLECT_ACTIVITY,
    employeeOrgs: values.RENDER_EMPLOYEE_GITHUB_ORGS.map(org => org.toLowerCase()),
    scoring: withMomentumWeights(DEFAULT_SCORING_POLICY, values.MOMENTUM_RECENCY_WEIGHT),
  };

  return {
    github: { token: values.GITHUB_ACCESS_TOKEN },
    supabase: {
      url: values.SUPABASE_URL,
      serviceRoleKey: values.SUPABASE_SERVICE_ROLE_KEY,
    },
    pipeline: applyMode(pipeline, values.PIPELINE_MODE),
  };
}

// ============================================================
// TRIGGER SERVER
// ============================================================

const TriggerEnvSchema = z.object({
  TRIGGER_SECRET: z
    .string({ required_error: 'TRIGGER_SECRET is required' })
    .min(1, 'TRIGGER_SECRET is required'),
  TRIGGER_PORT: z.coerce.number().int().positive().default(3001),
});

export interface TriggerSettings {
  secret: string;
  port: number;
}

export function loadTriggerSettings(env: NodeJS.ProcessEnv = process.env): TriggerSettings {
  const parsed = TriggerEnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid trigger configuration: ${issues.join('; ')}`, issues);
  }

  return { secret: parsed.data.TRIGGER_SECRET, port: parsed.data.TRIGGER_PORT };
}
