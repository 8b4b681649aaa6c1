import { promises as fs } from 'node:fs';
import { ZodError } from 'zod';
import { hasErrorCode, StateIOError } from '../errors.js';
import {
  CURRENT_PROGRESS_VERSION,
  ProgressStateSchema,
  type ProgressState,
} from '../types/progress-state.js';
import { serializeDocument, writeFileAtomic } from './atomic-write.js';
import { StatePaths } from './state-paths.js';

/**
 * Manages progress.json persistence for a project.
 *
 * Provides atomic read/write operations for the migration progress document.
 */
export class ProgressStateManager {
  /**
   * Save progress to disk atomically (temp file + rename pattern).
   *
   * @throws {ZodError} If the state does not satisfy the schema (nothing is written)
   * @throws {StateIOError} If the write fails
   */
  static async save(projectRoot: string, state: ProgressState): Promise<void> {
    const filePath = StatePaths.getProgressFile(projectRoot);

    // Validate before touching the disk
    const validated = ProgressStateSchema.parse(state);

    try {
      await StatePaths.ensureStateDir(projectRoot);
      await writeFileAtomic(filePath, serializeDocument(validated));
    } catch (error) {
      throw new StateIOError('writing progress', filePath, error);
    }
  }

  /**
   * Load progress from disk.
   *
   * @returns Loaded progress, or null if the migration was never started
   * @throws {StateIOError} If the file exists but cannot be read or decoded
   */
  static async load(projectRoot: string): Promise<ProgressState | null> {
    const filePath = StatePaths.getProgressFile(projectRoot);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw new StateIOError('reading progress', filePath, error);
    }

    try {
      const data: unknown = JSON.parse(content);
      checkVersion(data);
      return ProgressStateSchema.parse(data);
    } catch (error: unknown) {
      const reason =
        error instanceof ZodError ? formatZodIssues(error) : error;
      throw new StateIOError('parsing progress', filePath, reason);
    }
  }

  /**
   * Delete progress.json. Missing files are ignored.
   */
  static async delete(projectRoot: string): Promise<void> {
    const filePath = StatePaths.getProgressFile(projectRoot);
    try {
      await fs.unlink(filePath);
    } catch (error: unknown) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw new StateIOError('deleting progress', filePath, error);
      }
    }
  }

  static async exists(projectRoot: string): Promise<boolean> {
    try {
      await fs.access(StatePaths.getProgressFile(projectRoot));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * The step a project is currently positioned at.
   *
   * @returns The current step, or an empty string if no progress exists
   */
  static async currentStep(projectRoot: string): Promise<string> {
    const state = await this.load(projectRoot);
    return state?.current_step ?? '';
  }
}

/**
 * Reject documents written by a newer schema before validating the shape.
 */
function checkVersion(data: unknown): void {
  if (typeof data !== 'object' || data === null || !('version' in data)) {
    return; // Schema validation reports the missing field
  }
  const { version } = data;
  if (typeof version === 'number' && version > CURRENT_PROGRESS_VERSION) {
    throw new Error(
      `unsupported version ${version} (this waymark reads up to version ${CURRENT_PROGRESS_VERSION}); upgrade waymark to continue`
    );
  }
}

/**
 * Flatten Zod issues into a single readable line.
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}
