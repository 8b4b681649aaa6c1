/**
 * State directory layout for waymark working files.
 *
 * Both the progress tracker and the requirements store live under a single
 * `.waymark/` directory at the project root.
 */

import { mkdir } from 'node:fs/promises';
import path from 'node:path';

/**
 * Resolves paths inside the `.waymark/` state directory.
 *
 * The state directory structure:
 * .waymark/
 * ├── progress.json       # migration step progress
 * └── requirements/       # one JSON document per requirement path
 *     └── api/
 *         └── cli.json
 *
 * All methods return absolute paths resolved from the given project root.
 */
export class StatePaths {
  static readonly STATE_DIR_NAME = '.waymark';
  static readonly PROGRESS_FILE = 'progress.json';
  static readonly REQUIREMENTS_DIR = 'requirements';

  /**
   * Get the absolute path to the `.waymark/` state directory.
   *
   * @param projectRoot - Project root. Defaults to the current working directory.
   */
  static getStateDir(projectRoot?: string): string {
    return path.resolve(projectRoot || process.cwd(), this.STATE_DIR_NAME);
  }

  static getProgressFile(projectRoot?: string): string {
    return path.join(this.getStateDir(projectRoot), this.PROGRESS_FILE);
  }

  static getRequirementsDir(projectRoot?: string): string {
    return path.join(this.getStateDir(projectRoot), this.REQUIREMENTS_DIR);
  }

  /**
   * Ensure the state directory exists, creating it if necessary.
   */
  static async ensureStateDir(projectRoot?: string): Promise<void> {
    await mkdir(this.getStateDir(projectRoot), { recursive: true });
  }
}
