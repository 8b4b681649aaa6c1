import fs from 'node:fs';
import path from 'node:path';

/**
 * Validates filesystem paths given on the command line.
 *
 * Errors carry a second line telling the user what to do next.
 */
export const PathValidator = {
  /**
   * Validates that an input file exists and returns its absolute form.
   *
   * @param inputPath - The path to validate (relative or absolute)
   * @param label - What the file is, for error messages (e.g. "go.mod")
   * @returns The absolute, normalized path
   * @throws Error if the path is empty, missing or a directory
   *
   * @example
   * ```typescript
   * PathValidator.validateFileExists('./go.mod', 'go.mod');
   * // Returns: /home/user/project/go.mod
   * ```
   */
  validateFileExists(inputPath: string, label: string = 'File'): string {
    if (inputPath.trim() === '') {
      throw new Error(
        `${label} path cannot be empty.\nPlease provide a path to a ${label} file.`
      );
    }

    const absolutePath = path.resolve(inputPath);

    if (!fs.existsSync(absolutePath)) {
      throw new Error(
        `${label} not found: ${absolutePath}\n` +
          'Please check that the path exists and try again.'
      );
    }

    if (!fs.statSync(absolutePath).isFile()) {
      throw new Error(
        `${label} path is not a file: ${absolutePath}\n` +
          `Please provide a path to a ${label} file, not a directory.`
      );
    }

    return absolutePath;
  },

  /**
   * Validates a config file path.
   *
   * Use this for explicit `--config` paths, not for auto-discovery.
   *
   * @returns The absolute, normalized path
   * @throws Error if the config file does not exist or is not a file
   */
  validateConfigPath(configPath: string): string {
    if (configPath.trim() === '') {
      throw new Error(
        'Config file path cannot be empty.\n' +
          'Please provide a valid config file path.'
      );
    }

    const absolutePath = path.resolve(configPath);

    if (!fs.existsSync(absolutePath)) {
      throw new Error(
        `Config file not found: ${absolutePath}\n` +
          'Please check that the config file exists and try again.'
      );
    }

    const stats = fs.statSync(absolutePath);
    if (!stats.isFile()) {
      throw new Error(
        `Config path is not a file: ${absolutePath}\n` +
          'Please provide a path to a configuration file, not a directory.'
      );
    }

    return absolutePath;
  },

  /**
   * Validates a path a command is about to write to.
   *
   * Only relative paths that stay inside the working directory are accepted.
   *
   * @throws Error if the path is absolute or climbs out with `..`
   */
  validateOutputPath(outputPath: string): string {
    if (path.isAbsolute(outputPath)) {
      throw new Error(`absolute paths not allowed: ${outputPath}`);
    }
    if (path.normalize(outputPath).startsWith('..')) {
      throw new Error(`path traversal not allowed: ${outputPath}`);
    }
    return outputPath;
  },
};
