/**
 * Configuration interface for waymark.
 *
 * Loaded from `waymark.config.json` in the working directory, or from the
 * file given with `--config`. Every key is optional in the file; missing
 * keys take the defaults below.
 *
 * @example
 * ```json
 * {
 *   "promptFile": "./docs/migration.md",
 *   "includeUnsafe": false,
 *   "coverage": { "grpc": ["services/grpc"] }
 * }
 * ```
 */

import { DEFAULT_COVERAGE_MAP } from '../verify/coverage.js';
import {
  DEFAULT_CATALOG_FILE,
  DEFAULT_PROMPT_FILE,
} from '../utils/package-paths.js';

export interface IConfig {
  /**
   * Markdown document holding the migration steps.
   * Relative paths resolve against the config file's directory.
   */
  promptFile: string;

  /** Library catalog JSON. Resolved like promptFile. */
  catalogFile: string;

  /** Language `lookup` searches when none is given. */
  targetLanguage: string;

  /** Include libraries flagged as vulnerable in lookups. */
  includeUnsafe: boolean;

  /**
   * Tag → requirement path patterns used by `verify coverage`.
   * Entries here replace the built-in patterns for the same tag.
   */
  coverage: Record<string, string[]>;
}

export const defaultConfig: IConfig = {
  promptFile: DEFAULT_PROMPT_FILE,
  catalogFile: DEFAULT_CATALOG_FILE,
  targetLanguage: 'rust',
  includeUnsafe: false,
  coverage: Object.fromEntries(
    Object.entries(DEFAULT_COVERAGE_MAP).map(([tag, patterns]) => [
      tag,
      [...patterns],
    ])
  ),
};
