/**
 * Configuration validation functions.
 *
 * Pure functions for validating and merging user configuration with defaults.
 * Separated from ConfigLoader to enable testing without file I/O.
 */

import path from 'node:path';
import { z } from 'zod';
import { formatZodIssues } from '../utils/progress-state-manager.js';
import type { IConfig } from './i-config.js';
import { defaultConfig } from './i-config.js';

/**
 * Shape of `waymark.config.json`. Unknown keys are rejected so that a
 * misspelled setting does not silently fall back to its default.
 */
export const UserConfigSchema = z
  .object({
    promptFile: z.string().min(1).optional(),
    catalogFile: z.string().min(1).optional(),
    targetLanguage: z.string().min(1).optional(),
    includeUnsafe: z.boolean().optional(),
    coverage: z
      .record(z.string().min(1), z.array(z.string().min(1)))
      .optional(),
  })
  .strict();

export type UserConfig = z.infer<typeof UserConfigSchema>;

/**
 * User configuration failed validation.
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validate user configuration and merge with defaults.
 *
 * @param userConfig - Parsed contents of the config file
 * @param configDir - Directory relative file settings resolve against
 * @returns Validated and merged configuration
 * @throws {ConfigValidationError} If validation fails
 */
export function validateAndMerge(
  userConfig: unknown,
  configDir: string = process.cwd()
): IConfig {
  const parsed = UserConfigSchema.safeParse(userConfig);
  if (!parsed.success) {
    throw new ConfigValidationError(
      `Invalid configuration: ${formatZodIssues(parsed.error)}`
    );
  }
  const user = parsed.data;

  return {
    promptFile:
      user.promptFile === undefined
        ? defaultConfig.promptFile
        : path.resolve(configDir, user.promptFile),
    catalogFile:
      user.catalogFile === undefined
        ? defaultConfig.catalogFile
        : path.resolve(configDir, user.catalogFile),
    targetLanguage: user.targetLanguage ?? defaultConfig.targetLanguage,
    includeUnsafe: user.includeUnsafe ?? defaultConfig.includeUnsafe,
    coverage: {
      ...structuredClone(defaultConfig.coverage),
      ...user.coverage,
    },
  };
}
