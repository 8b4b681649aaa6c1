import type { IConfig } from './i-config.js';

/**
 * Loads waymark configuration. Injected into commands so tests can supply
 * a configuration without touching the filesystem.
 */
export interface IConfigLoader {
  /**
   * @param configPath - Explicit config file; discovered in the working
   *   directory when omitted
   * @throws Error if the file cannot be read, parsed or validated
   */
  load(configPath?: string): Promise<IConfig>;
}
