/**
 * Requirements store.
 *
 * Keeps one JSON document per requirement path under
 * `.waymark/requirements/`, written atomically. Every operation derives its
 * file location through SafeRequirementPath from the caller's raw input.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ZodError } from 'zod';
import {
  EmptyContentError,
  hasErrorCode,
  RequirementNotFoundError,
  StateIOError,
} from '../errors.js';
import { RequirementSchema, type Requirement } from '../types/requirement.js';
import { serializeDocument, writeFileAtomic } from '../utils/atomic-write.js';
import { systemClock, type Clock } from '../utils/clock.js';
import {
  formatZodIssues,
  ProgressStateManager,
} from '../utils/progress-state-manager.js';
import { StatePaths } from '../utils/state-paths.js';
import { matchesFilter } from './path-pattern.js';
import { SafeRequirementPath } from './safe-requirement-path.js';

export interface RequirementsStoreOptions {
  /** Time source for created/updated/done timestamps */
  clock?: Clock;

  /**
   * Reads the step the migration is currently at. Defaults to the project's
   * progress.json; returns an empty string when there is no progress.
   */
  currentStep?: () => Promise<string>;
}

/**
 * Hierarchical requirement documents for one project.
 */
export class RequirementsStore {
  private readonly projectRoot: string;
  private readonly clock: Clock;
  private readonly currentStep: () => Promise<string>;

  constructor(projectRoot: string, options: RequirementsStoreOptions = {}) {
    this.projectRoot = projectRoot;
    this.clock = options.clock ?? systemClock;
    this.currentStep =
      options.currentStep ??
      (() => ProgressStateManager.currentStep(projectRoot));
  }

  /**
   * Create or update a requirement.
   *
   * An update keeps the original `created_at` and marks the requirement
   * pending again. The document is stamped with the migration's current step.
   *
   * @throws {PathSafetyError} If the path is not a safe requirement path
   * @throws {EmptyContentError} If content is empty after trimming
   */
  async set(requirementPath: string, content: string): Promise<Requirement> {
    const safePath = SafeRequirementPath.create(
      this.projectRoot,
      requirementPath
    );
    if (content.trim() === '') {
      throw new EmptyContentError();
    }

    const existing = await this.read(safePath);
    const updatedAt = this.nextTimestamp(existing?.updated_at);

    const requirement: Requirement = {
      path: requirementPath,
      content,
      step: await this.currentStep(),
      created_at: existing?.created_at ?? updatedAt,
      updated_at: updatedAt,
      done: false,
    };

    await this.write(safePath, requirement);
    return requirement;
  }

  /**
   * Get a requirement.
   *
   * @returns The requirement, or null if none exists at this path
   */
  async get(requirementPath: string): Promise<Requirement | null> {
    return this.read(
      SafeRequirementPath.create(this.projectRoot, requirementPath)
    );
  }

  /**
   * List requirement paths, sorted.
   *
   * @param filter - Plain prefix (`api/`), a pattern with `*` segments
   *   (`api/*`), or empty for everything
   */
  async list(filter: string = ''): Promise<string[]> {
    const baseDirectory = StatePaths.getRequirementsDir(this.projectRoot);

    let files: string[];
    try {
      files = await walkFiles(baseDirectory);
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw new StateIOError('listing requirements', baseDirectory, error);
    }

    const paths: string[] = [];
    for (const file of files) {
      const requirementPath = SafeRequirementPath.toRequirementPath(
        baseDirectory,
        file
      );
      if (requirementPath !== null && matchesFilter(filter, requirementPath)) {
        paths.push(requirementPath);
      }
    }
    return paths.sort();
  }

  /**
   * Load every requirement matching a filter, in path order.
   */
  async listEntries(filter: string = ''): Promise<Requirement[]> {
    const entries: Requirement[] = [];
    for (const requirementPath of await this.list(filter)) {
      const requirement = await this.get(requirementPath);
      if (requirement !== null) {
        entries.push(requirement);
      }
    }
    return entries;
  }

  /**
   * Mark a requirement as done.
   *
   * @throws {RequirementNotFoundError} If no requirement exists at this path
   */
  async done(requirementPath: string): Promise<Requirement> {
    const safePath = SafeRequirementPath.create(
      this.projectRoot,
      requirementPath
    );
    const existing = await this.read(safePath);
    if (existing === null) {
      throw new RequirementNotFoundError(requirementPath);
    }

    const now = this.nextTimestamp(existing.updated_at);
    const requirement: Requirement = {
      ...existing,
      done: true,
      done_at: now,
      updated_at: now,
    };

    await this.write(safePath, requirement);
    return requirement;
  }

  /**
   * Delete a requirement. Deleting a missing requirement is not an error.
   */
  async delete(requirementPath: string): Promise<void> {
    const safePath = SafeRequirementPath.create(
      this.projectRoot,
      requirementPath
    );
    try {
      await fs.unlink(safePath.filePath);
    } catch (error: unknown) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw new StateIOError(
          'deleting requirement',
          safePath.filePath,
          error
        );
      }
    }
  }

  private async read(
    safePath: SafeRequirementPath
  ): Promise<Requirement | null> {
    let content: string;
    try {
      content = await fs.readFile(safePath.filePath, 'utf8');
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw new StateIOError('reading requirement', safePath.filePath, error);
    }

    try {
      return RequirementSchema.parse(JSON.parse(content));
    } catch (error: unknown) {
      const reason =
        error instanceof ZodError ? formatZodIssues(error) : error;
      throw new StateIOError('parsing requirement', safePath.filePath, reason);
    }
  }

  private async write(
    safePath: SafeRequirementPath,
    requirement: Requirement
  ): Promise<void> {
    const validated = RequirementSchema.parse(requirement);
    try {
      await fs.mkdir(path.dirname(safePath.filePath), { recursive: true });
      await writeFileAtomic(safePath.filePath, serializeDocument(validated));
    } catch (error) {
      throw new StateIOError('writing requirement', safePath.filePath, error);
    }
  }

  /**
   * Current time, moved past `previous` if the clock has not advanced, so
   * `updated_at` strictly increases across writes.
   */
  private nextTimestamp(previous?: string): string {
    const now = this.clock().getTime();
    const floor =
      previous === undefined
        ? Number.NEGATIVE_INFINITY
        : Date.parse(previous) + 1;
    return new Date(Math.max(now, floor)).toISOString();
  }
}

/**
 * Recursively collect every file below a directory.
 */
async function walkFiles(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const entryPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walkFiles(entryPath)));
    } else if (entry.isFile()) {
      files.push(entryPath);
    }
  }
  return files;
}
