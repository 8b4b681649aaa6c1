/**
 * Scan command implementation.
 *
 * Lists the Rust equivalents of every direct dependency in a go.mod.
 */

import { loadCatalog } from '../catalog/catalog-loader.js';
import type { IConfigLoader } from '../config/i-config-loader.js';
import { EXIT_CODE, type ExitCode } from '../constants/exit-codes.js';
import type { IDisplay } from '../display/i-display.js';
import {
  extractCrateName,
  modulePathToGitHubUrl,
} from '../manifest/cargo-generator.js';
import {
  directDependencies,
  parseGoModFile,
} from '../manifest/go-mod-parser.js';
import type { ScanEntry, ScanResult } from '../types/scan.js';
import { PathValidator } from '../utils/path-validator.js';
import {
  errorMessage,
  loadCommandConfig,
  type GlobalOptions,
} from './shared.js';

export interface ScanOptions extends GlobalOptions {
  unsafe?: boolean;
}

/**
 * Core scan logic (extracted for testability).
 *
 * @param goModPath - Path to go.mod
 */
export async function scanCore(
  goModPath: string,
  options: ScanOptions,
  display: IDisplay,
  configLoader: IConfigLoader
): Promise<ScanResult> {
  const absolutePath = PathValidator.validateFileExists(goModPath, 'go.mod');
  const config = await loadCommandConfig(options, configLoader, display);
  const includeUnsafe = options.unsafe ?? config.includeUnsafe;

  const stopSpinner = display.startSpinner('Scanning dependencies...');
  let result: ScanResult;
  try {
    const catalog = await loadCatalog(config.catalogFile);
    const goModule = await parseGoModFile(absolutePath);

    const entries: ScanEntry[] = directDependencies(goModule).map(
      (dependency) => {
        const sourceUrl = modulePathToGitHubUrl(dependency.path);
        const targets = catalog
          .lookup(sourceUrl, 'rust', includeUnsafe)
          .map((url) => ({
            crateName: extractCrateName(url, catalog) || url,
            url,
          }));
        return { path: dependency.path, version: dependency.version, targets };
      }
    );

    result = {
      module: goModule.module,
      goVersion: goModule.goVersion,
      entries,
      mappedCount: entries.filter((entry) => entry.targets.length > 0).length,
    };
  } finally {
    stopSpinner();
  }

  display.showScanResult(result);
  return result;
}

/**
 * Execute the scan command.
 * This is the entry point called by Commander.js.
 *
 * @returns Exit code (EXIT_CODE.SUCCESS for success, EXIT_CODE.ERROR for failure)
 */
export async function scanCommand(
  goModPath: string,
  options: ScanOptions,
  display: IDisplay,
  configLoader: IConfigLoader
): Promise<ExitCode> {
  try {
    await scanCore(goModPath, options, display, configLoader);
    return EXIT_CODE.SUCCESS;
  } catch (error) {
    display.showError(`failed to scan go.mod: ${errorMessage(error)}`);
    return EXIT_CODE.ERROR;
  }
}
