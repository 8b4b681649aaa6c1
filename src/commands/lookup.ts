/**
 * Lookup command implementation.
 *
 * Prints the equivalents of a single library, one URL per line.
 */

import { loadCatalog } from '../catalog/catalog-loader.js';
import { isValidUrl } from '../catalog/url.js';
import type { IConfigLoader } from '../config/i-config-loader.js';
import { EXIT_CODE, type ExitCode } from '../constants/exit-codes.js';
import type { IDisplay } from '../display/i-display.js';
import {
  errorMessage,
  loadCommandConfig,
  type GlobalOptions,
} from './shared.js';

export interface LookupOptions extends GlobalOptions {
  unsafe?: boolean;
}

/**
 * Core lookup logic (extracted for testability).
 *
 * @param url - Library URL to look up
 * @param language - Target language; defaults to the configured one
 * @returns The equivalents printed
 * @throws Error if the URL is invalid or has no equivalent
 */
export async function lookupCore(
  url: string,
  language: string | undefined,
  options: LookupOptions,
  display: IDisplay,
  configLoader: IConfigLoader
): Promise<string[]> {
  if (url === '') {
    throw new Error('URL is required');
  }
  if (!isValidUrl(url)) {
    throw new Error('invalid URL: must start with http:// or https://');
  }

  const config = await loadCommandConfig(options, configLoader, display);
  const catalog = await loadCatalog(config.catalogFile);
  const targetLanguage = language ?? config.targetLanguage;

  const results = catalog.lookup(
    url,
    targetLanguage,
    options.unsafe ?? config.includeUnsafe
  );
  if (results.length === 0) {
    throw new Error(`no ${targetLanguage} equivalent found for ${url}`);
  }

  for (const result of results) {
    display.showMessage(result);
  }
  return results;
}

/**
 * Execute the lookup command.
 * This is the entry point called by Commander.js.
 *
 * @returns Exit code (EXIT_CODE.SUCCESS for success, EXIT_CODE.ERROR for failure)
 */
export async function lookupCommand(
  url: string,
  language: string | undefined,
  options: LookupOptions,
  display: IDisplay,
  configLoader: IConfigLoader
): Promise<ExitCode> {
  try {
    await lookupCore(url, language, options, display, configLoader);
    return EXIT_CODE.SUCCESS;
  } catch (error) {
    display.showError(errorMessage(error));
    return EXIT_CODE.ERROR;
  }
}
