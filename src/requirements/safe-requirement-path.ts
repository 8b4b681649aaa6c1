import path from 'node:path';
import { PathSafetyError } from '../errors.js';
import { StatePaths } from '../utils/state-paths.js';
import { PATH_DELIMITER } from './path-pattern.js';

const REQUIREMENT_EXTENSION = '.json';

/**
 * A requirement file location that is known to sit inside the project's
 * requirements directory.
 *
 * The constructor is private: {@link SafeRequirementPath.create} is the only
 * way to get one, and it validates the raw requirement path every time.
 * Never keep an instance around across operations; derive a new one from the
 * caller's input instead.
 */
export class SafeRequirementPath {
  /** Logical requirement path, e.g. `api/cli` */
  readonly requirementPath: string;

  /** Absolute path of the JSON document */
  readonly filePath: string;

  private constructor(requirementPath: string, filePath: string) {
    this.requirementPath = requirementPath;
    this.filePath = filePath;
  }

  /**
   * Validate a requirement path and map it to its JSON document.
   *
   * `api/web/routes` maps to `<root>/.waymark/requirements/api/web/routes.json`.
   * Runs before any filesystem access.
   *
   * @param projectRoot - Project root holding `.waymark/`
   * @param requirementPath - Raw requirement path from the caller
   * @throws {PathSafetyError} If the path is empty, absolute, has empty,
   *   `.` or `..` segments, or would resolve outside the requirements directory
   */
  static create(
    projectRoot: string,
    requirementPath: string
  ): SafeRequirementPath {
    if (requirementPath.trim() === '') {
      throw new PathSafetyError(requirementPath, 'path is empty');
    }
    if (requirementPath.includes('\0')) {
      throw new PathSafetyError(requirementPath, 'path contains a NUL byte');
    }
    if (requirementPath.includes('\\')) {
      throw new PathSafetyError(
        requirementPath,
        'use "/" to separate segments'
      );
    }
    if (
      path.posix.isAbsolute(requirementPath) ||
      path.win32.isAbsolute(requirementPath)
    ) {
      throw new PathSafetyError(
        requirementPath,
        'absolute paths are not allowed'
      );
    }

    const segments = requirementPath.split(PATH_DELIMITER);
    for (const segment of segments) {
      if (segment === '' || segment === '.' || segment === '..') {
        throw new PathSafetyError(
          requirementPath,
          `segment '${segment}' is not allowed`
        );
      }
    }

    const baseDirectory = StatePaths.getRequirementsDir(projectRoot);
    const filePath =
      path.resolve(baseDirectory, ...segments) + REQUIREMENT_EXTENSION;

    const relative = path.relative(baseDirectory, filePath);
    if (
      relative === '' ||
      relative.startsWith('..') ||
      path.isAbsolute(relative)
    ) {
      throw new PathSafetyError(
        requirementPath,
        'path escapes the requirements directory'
      );
    }

    return new SafeRequirementPath(requirementPath, filePath);
  }

  /**
   * Map a document file back to its logical requirement path.
   *
   * @param baseDirectory - The requirements directory
   * @param filePath - A `.json` document below it
   * @returns The requirement path, or null for files that are not documents
   */
  static toRequirementPath(
    baseDirectory: string,
    filePath: string
  ): string | null {
    if (!filePath.endsWith(REQUIREMENT_EXTENSION)) {
      return null;
    }
    const relative = path.relative(baseDirectory, filePath);
    return relative
      .slice(0, -REQUIREMENT_EXTENSION.length)
      .split(path.sep)
      .join(PATH_DELIMITER);
  }
}
