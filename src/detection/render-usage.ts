/**
 * RepoPulse — Render Usage Detector
 *
 * Decides whether a repository deploys on Render by looking for a
 * render.yaml blueprint, then derives services, complexity and category.
 * Any failure degrades to "not in use"; this module never throws.
 */

import { parse } from 'yaml';
import { z } from 'zod';
import type { DetectedRenderUsage, RenderCategory, RenderUsage, RepositoryCandidate } from '../types';
import { NO_RENDER_USAGE } from '../types';
import { describeError, logger } from '../lib/logger';

// ============================================================
// CONSTANTS
// ============================================================

export const MARKER_FILE = 'render.yaml';
export const CONTAINER_FILE = 'Dockerfile';

const OFFICIAL_ORGS = ['render-examples', 'render'];
const BLUEPRINT_TOPICS = ['render-blueprints', 'render-blueprint'];
const DEPLOY_BUTTON_MARKER = 'render.com/deploy';

// Case-sensitive: only variable names count
const ENV_MARKER = /\bRENDER(?:_[A-Z0-9_]+)?\b/;
const PLATFORM_MARKER = /render\.com|RENDER_\w+/i;

const log = logger.child({ component: 'render-detection' });

// ============================================================
// BLUEPRINT PARSING
// ============================================================

const BlueprintEntrySchema = z.object({ type: z.string().optional() }).passthrough();

const BlueprintSchema = z.object({
  services: z.array(BlueprintEntrySchema).nullish(),
  databases: z.array(BlueprintEntrySchema).nullish(),
}).passthrough();

export interface ParsedBlueprint {
  services: string[];
  databases: string[];
  serviceCount: number;
}

const EMPTY_BLUEPRINT: ParsedBlueprint = { services: [], databases: [], serviceCount: 0 };

/**
 * Malformed YAML or an unexpected document shape yields an empty blueprint.
 */
export function parseRenderConfig(content: string): ParsedBlueprint {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    log.debug('Unparseable render.yaml', { error: describeError(error) });
    return EMPTY_BLUEPRINT;
  }

  const parsed = BlueprintSchema.safeParse(document);
  if (!parsed.success) return EMPTY_BLUEPRINT;

  const services = (parsed.data.services ?? []).map(entry => entry.type ?? 'unknown');
  const databases = (parsed.data.databases ?? []).map(entry => entry.type ?? 'postgres');

  return { services, databases, serviceCount: services.length + databases.length };
}

// ============================================================
// SCORING
// ============================================================

export interface ContainerMarkers {
  usesRenderEnv: boolean;
  /** render.com / onrender.com domain or a RENDER_* variable */
  mentionsRenderPlatform: boolean;
}

export function scanContainerFile(content: string | null): ContainerMarkers {
  if (!content) return { usesRenderEnv: false, mentionsRenderPlatform: false };
  return {
    usesRenderEnv: ENV_MARKER.test(content),
    mentionsRenderPlatform: PLATFORM_MARKER.test(content),
  };
}

export function calculateComplexity(blueprint: ParsedBlueprint, markers: ContainerMarkers): number {
  let score = Math.min(blueprint.serviceCount, 5);
  score += Math.min(new Set(blueprint.services).size, 3);
  if (markers.usesRenderEnv) score += 1;
  if (markers.mentionsRenderPlatform) score += 1;
  return Math.min(score, 10);
}

export function categorizeProject(
  candidate: Pick<RepositoryCandidate, 'owner' | 'topics'>,
  employeeOrgs: readonly string[]
): RenderCategory {
  const owner = candidate.owner.toLowerCase();
  if (OFFICIAL_ORGS.includes(owner)) return 'official';
  if (candidate.topics.some(topic => BLUEPRINT_TOPICS.includes(topic.toLowerCase()))) return 'blueprint';
  if (employeeOrgs.some(org => org.toLowerCase() === owner)) return 'employee';
  return 'community';
}

export function hasDeployButton(readme: string | null): boolean {
  return readme !== null && readme.toLowerCase().includes(DEPLOY_BUTTON_MARKER);
}

/** Fold the README's deploy button into a detection made without it. */
export function withBlueprintButton(usage: RenderUsage, readme: string | null): RenderUsage {
  if (!usage.usesRender) return usage;
  return { ...usage, hasBlueprintButton: usage.hasBlueprintButton || hasDeployButton(readme) };
}

// ============================================================
// DETECTION
// ============================================================

export interface FileSource {
  fetchFileContents(owner: string, repo: string, path: string): Promise<string | null>;
}

export interface DetectionOptions {
  employeeOrgs: readonly string[];
  /** README if already known; the button can be folded in later otherwise */
  readme?: string | null;
}

export async function detectRenderUsage(
  candidate: RepositoryCandidate,
  files: FileSource,
  options: DetectionOptions
): Promise<RenderUsage> {
  try {
    const blueprintText = await files.fetchFileContents(candidate.owner, candidate.name, MARKER_FILE);
    if (!blueprintText) return NO_RENDER_USAGE;

    const blueprint = parseRenderConfig(blueprintText);
    const containerText = await files.fetchFileContents(candidate.owner, candidate.name, CONTAINER_FILE);

    const usage: DetectedRenderUsage = {
      usesRender: true,
      category: categorizeProject(candidate, options.employeeOrgs),
      services: blueprint.services,
      databases: blueprint.databases,
      serviceCount: blueprint.serviceCount,
      complexityScore: calculateComplexity(blueprint, scanContainerFile(containerText)),
      hasBlueprintButton: hasDeployButton(options.readme ?? null),
    };

    log.debug('Render blueprint detected', {
      repo: candidate.fullName,
      services: usage.serviceCount,
      complexity: usage.complexityScore,
    });
    return usage;
  } catch (error) {
    log.warn('Render detection failed, treating as not in use', {
      repo: candidate.fullName,
      error: describeError(error),
    });
    return NO_RENDER_USAGE;
  }
}
