/**
 * Helpers shared by the command modules.
 */

import type { IConfigLoader } from '../config/i-config-loader.js';
import type { IConfig } from '../config/i-config.js';
import type { IDisplay } from '../display/i-display.js';

/**
 * Options every command accepts.
 */
export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Load configuration, printing it in verbose mode.
 */
export async function loadCommandConfig(
  options: GlobalOptions,
  configLoader: IConfigLoader,
  display: IDisplay
): Promise<IConfig> {
  const config = await configLoader.load(options.config);
  if (options.verbose) {
    display.showConfig(config);
  }
  return config;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
