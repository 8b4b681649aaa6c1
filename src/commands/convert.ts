/**
 * Convert command implementation.
 *
 * Generates a Cargo.toml from a go.mod, to stdout or to a file.
 */

import path from 'node:path';
import { loadCatalog } from '../catalog/catalog-loader.js';
import type { IConfigLoader } from '../config/i-config-loader.js';
import { EXIT_CODE, type ExitCode } from '../constants/exit-codes.js';
import type { IDisplay } from '../display/i-display.js';
import {
  mapDependencies,
  renderCargoToml,
  type CargoMapping,
} from '../manifest/cargo-generator.js';
import {
  directDependencies,
  parseGoModFile,
} from '../manifest/go-mod-parser.js';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { PathValidator } from '../utils/path-validator.js';
import {
  errorMessage,
  loadCommandConfig,
  type GlobalOptions,
} from './shared.js';

/** Output value meaning "print to stdout". */
export const STDOUT_OUTPUT = '-';

export interface ConvertOptions extends GlobalOptions {
  output?: string;
  unsafe?: boolean;
}

/**
 * Core convert logic (extracted for testability).
 *
 * @param goModPath - Path to go.mod
 * @param workingDirectory - Directory a relative `--output` resolves against
 * @returns The dependency mapping the Cargo.toml was rendered from
 */
export async function convertCore(
  goModPath: string,
  options: ConvertOptions,
  display: IDisplay,
  configLoader: IConfigLoader,
  workingDirectory: string = process.cwd()
): Promise<CargoMapping> {
  const absolutePath = PathValidator.validateFileExists(goModPath, 'go.mod');
  const output = options.output ?? STDOUT_OUTPUT;
  if (output !== STDOUT_OUTPUT) {
    PathValidator.validateOutputPath(output);
  }
  const config = await loadCommandConfig(options, configLoader, display);

  const stopSpinner = display.startSpinner('Mapping dependencies...');
  let goModuleName: string;
  let mapping: CargoMapping;
  try {
    const catalog = await loadCatalog(config.catalogFile);
    const goModule = await parseGoModFile(absolutePath);
    goModuleName = goModule.module;
    mapping = mapDependencies(
      directDependencies(goModule),
      catalog,
      options.unsafe ?? config.includeUnsafe
    );
  } finally {
    stopSpinner();
  }

  const cargoToml = renderCargoToml(goModuleName, mapping);

  if (output === STDOUT_OUTPUT) {
    display.showMessage(cargoToml.trimEnd());
    return mapping;
  }

  await writeFileAtomic(path.resolve(workingDirectory, output), cargoToml);
  const total = mapping.mapped.length + mapping.unmapped.length;
  display.showSuccess(
    `Generated ${output} with ${total} dependencies ` +
      `(${mapping.mapped.length} mapped, ${mapping.unmapped.length} unmapped)`
  );
  return mapping;
}

/**
 * Execute the convert command.
 * This is the entry point called by Commander.js.
 *
 * @returns Exit code (EXIT_CODE.SUCCESS for success, EXIT_CODE.ERROR for failure)
 */
export async function convertCommand(
  goModPath: string,
  options: ConvertOptions,
  display: IDisplay,
  configLoader: IConfigLoader
): Promise<ExitCode> {
  try {
    await convertCore(goModPath, options, display, configLoader);
    return EXIT_CODE.SUCCESS;
  } catch (error) {
    display.showError(errorMessage(error));
    return EXIT_CODE.ERROR;
  }
}
