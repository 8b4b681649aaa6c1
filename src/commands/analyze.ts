/**
 * Analyze command implementation.
 *
 * Detects what kind of project a go.mod describes (cli, web, orm, ...) from
 * the catalog tags of its direct dependencies.
 */

import { loadCatalog } from '../catalog/catalog-loader.js';
import type { IConfigLoader } from '../config/i-config-loader.js';
import { EXIT_CODE, type ExitCode } from '../constants/exit-codes.js';
import type { IDisplay } from '../display/i-display.js';
import { modulePathToGitHubUrl } from '../manifest/cargo-generator.js';
import {
  directDependencies,
  parseGoModFile,
} from '../manifest/go-mod-parser.js';
import { PathValidator } from '../utils/path-validator.js';
import {
  errorMessage,
  loadCommandConfig,
  type GlobalOptions,
} from './shared.js';

/**
 * Unique tags of a go.mod's direct dependencies, sorted.
 *
 * @param goModPath - Path to go.mod
 * @param catalogFile - Catalog to read tags from
 */
export async function detectProjectTags(
  goModPath: string,
  catalogFile: string
): Promise<string[]> {
  const catalog = await loadCatalog(catalogFile);
  const goModule = await parseGoModFile(goModPath);

  const tags = new Set<string>();
  for (const dependency of directDependencies(goModule)) {
    for (const tag of catalog.tags(modulePathToGitHubUrl(dependency.path))) {
      tags.add(tag);
    }
  }
  return [...tags].sort();
}

/**
 * Core analyze logic (extracted for testability). Prints one tag per line.
 */
export async function analyzeCore(
  goModPath: string,
  options: GlobalOptions,
  display: IDisplay,
  configLoader: IConfigLoader
): Promise<string[]> {
  const absolutePath = PathValidator.validateFileExists(goModPath, 'go.mod');
  const config = await loadCommandConfig(options, configLoader, display);

  const tags = await detectProjectTags(absolutePath, config.catalogFile);
  for (const tag of tags) {
    display.showMessage(tag);
  }
  return tags;
}

/**
 * Execute the analyze command.
 * This is the entry point called by Commander.js.
 *
 * @returns Exit code (EXIT_CODE.SUCCESS for success, EXIT_CODE.ERROR for failure)
 */
export async function analyzeCommand(
  goModPath: string,
  options: GlobalOptions,
  display: IDisplay,
  configLoader: IConfigLoader
): Promise<ExitCode> {
  try {
    await analyzeCore(goModPath, options, display, configLoader);
    return EXIT_CODE.SUCCESS;
  } catch (error) {
    display.showError(`failed to analyze go.mod: ${errorMessage(error)}`);
    return EXIT_CODE.ERROR;
  }
}
