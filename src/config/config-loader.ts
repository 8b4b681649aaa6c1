/**
 * Configuration loader for waymark.
 *
 * Loads and validates user configuration from a JSON file.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { PathValidator } from '../utils/path-validator.js';
import { ConfigErrorClassifier } from './config-error-classifier.js';
import { validateAndMerge } from './config-validator.js';
import type { IConfigLoader } from './i-config-loader.js';
import type { IConfig } from './i-config.js';
import { defaultConfig } from './i-config.js';

export const CONFIG_FILE_NAME = 'waymark.config.json';

export class ConfigLoader implements IConfigLoader {
  private readonly cwd: string;

  /**
   * @param cwd - Directory searched for waymark.config.json
   */
  constructor(cwd: string = process.cwd()) {
    this.cwd = cwd;
  }

  /**
   * Load configuration from a file path.
   *
   * Searches for configuration in the following order:
   * 1. Provided configPath parameter
   * 2. waymark.config.json in the working directory
   * 3. Default configuration
   *
   * @param configPath - Optional path to configuration file
   * @returns Validated configuration object
   * @throws Error if the file is missing, malformed or fails validation
   */
  async load(configPath?: string): Promise<IConfig> {
    let resolvedPath: string | null = null;

    if (configPath === undefined) {
      // Auto-discovery: absence is not an error
      const defaultPath = path.resolve(this.cwd, CONFIG_FILE_NAME);
      if (existsSync(defaultPath)) {
        resolvedPath = defaultPath;
      }
    } else {
      resolvedPath = PathValidator.validateConfigPath(
        path.resolve(this.cwd, configPath)
      );
    }

    if (resolvedPath === null) {
      return structuredClone(defaultConfig);
    }

    try {
      const content = await readFile(resolvedPath, 'utf8');
      const userConfig: unknown = JSON.parse(content);
      return validateAndMerge(userConfig, path.dirname(resolvedPath));
    } catch (error) {
      const details = ConfigErrorClassifier.classify(error, resolvedPath);
      throw new Error(ConfigErrorClassifier.format(details, resolvedPath), {
        cause: error,
      });
    }
  }
}
