/**
 * Requirement coverage checks.
 *
 * A project's tags (from `analyze`) say which kinds of requirements a port
 * should have captured: a CLI project should have `<binary>/cli` entries, a
 * web project `<binary>/api`, and so on.
 */

import {
  isWildcardPattern,
  matchPattern,
  PATH_DELIMITER,
  WILDCARD_SEGMENT,
} from '../requirements/path-pattern.js';
import type { Requirement } from '../types/requirement.js';

/**
 * Tag → requirement path patterns expected for projects carrying the tag.
 */
export type CoverageMap = Readonly<Record<string, readonly string[]>>;

export const DEFAULT_COVERAGE_MAP: CoverageMap = {
  cli: ['*/cli'],
  web: ['*/api'],
  templating: ['*/templates'],
  sql: ['db'],
  orm: ['db'],
  'codegen:protobuf': ['codegen/protobuf'],
  'codegen:ent': ['codegen/ent'],
  'codegen:templ': ['codegen/templ'],
  'codegen:wire': ['codegen/wire'],
  'codegen:sqlc': ['codegen/sqlc'],
  'codegen:gqlgen': ['codegen/gqlgen'],
};

/**
 * Where requirements are read from. RequirementsStore satisfies this.
 */
export interface RequirementSource {
  listEntries(filter?: string): Promise<Requirement[]>;
}

export interface CategoryStatus {
  /** Tag that made the pattern expected */
  category: string;
  pattern: string;
  hasRequirements: boolean;
  count: number;
  doneCount: number;
  paths: string[];
}

export interface ImplementationStatus {
  done: string[];
  pending: string[];
}

export interface PatternStatus {
  /** Every matching requirement is done (vacuously true with no matches) */
  allDone: boolean;
  pending: string[];
}

/**
 * Compare the patterns a project's tags call for against captured
 * requirements.
 *
 * Results follow tag order, then pattern order; a pattern expected by more
 * than one tag is reported once, under the first.
 */
export async function checkCoverage(
  source: RequirementSource,
  tags: readonly string[],
  coverageMap: CoverageMap = DEFAULT_COVERAGE_MAP
): Promise<CategoryStatus[]> {
  const entries = await source.listEntries();
  const seen = new Set<string>();
  const results: CategoryStatus[] = [];

  for (const tag of tags) {
    const patterns = Object.hasOwn(coverageMap, tag) ? coverageMap[tag] : [];
    for (const pattern of patterns) {
      if (seen.has(pattern)) {
        continue;
      }
      seen.add(pattern);

      const matching = entries.filter((entry) =>
        matchPattern(pattern, entry.path)
      );
      results.push({
        category: tag,
        pattern,
        hasRequirements: matching.length > 0,
        count: matching.length,
        doneCount: matching.filter((entry) => entry.done).length,
        paths: matching.map((entry) => entry.path),
      });
    }
  }

  return results;
}

/**
 * Split every requirement into done and pending paths.
 */
export async function checkImplementation(
  source: RequirementSource
): Promise<ImplementationStatus> {
  const status: ImplementationStatus = { done: [], pending: [] };
  for (const entry of await source.listEntries()) {
    (entry.done ? status.done : status.pending).push(entry.path);
  }
  return status;
}

export async function requirementStatus(
  source: RequirementSource,
  pattern: string
): Promise<PatternStatus> {
  const pending = (await source.listEntries())
    .filter((entry) => matchPattern(pattern, entry.path) && !entry.done)
    .map((entry) => entry.path);
  return { allDone: pending.length === 0, pending };
}

/**
 * Replace the `*` segments of a pattern with the concrete segments present
 * in the store.
 *
 * `api/*` with `api/cli/flags` and `api/web` stored expands to
 * `["api/cli", "api/web"]`. A pattern without wildcards is returned as is.
 *
 * @returns Unique expansions, sorted
 */
export async function expandWildcardPattern(
  source: RequirementSource,
  pattern: string
): Promise<string[]> {
  if (!isWildcardPattern(pattern)) {
    return [pattern];
  }

  const patternParts = pattern.split(PATH_DELIMITER);
  const expansions = new Set<string>();

  for (const entry of await source.listEntries()) {
    if (!matchPattern(pattern, entry.path)) {
      continue;
    }
    const pathParts = entry.path.split(PATH_DELIMITER);
    const expanded = patternParts.map((part, i) =>
      part === WILDCARD_SEGMENT ? pathParts[i] : part
    );
    expansions.add(expanded.join(PATH_DELIMITER));
  }

  return [...expansions].sort();
}
