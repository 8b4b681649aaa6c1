/**
 * Verify command implementations (`waymark verify ...`).
 *
 * Checks captured requirements against what the project needs
 * (`coverage`), against what has been ported (`implementation`), and for a
 * single path pattern (`pattern`).
 */

import type { IConfigLoader } from '../config/i-config-loader.js';
import { EXIT_CODE, type ExitCode } from '../constants/exit-codes.js';
import type { IDisplay } from '../display/i-display.js';
import type { RequirementsStore } from '../requirements/requirements-store.js';
import { PathValidator } from '../utils/path-validator.js';
import {
  checkCoverage,
  checkImplementation,
  expandWildcardPattern,
  requirementStatus,
  type CategoryStatus,
  type ImplementationStatus,
} from '../verify/coverage.js';
import { detectProjectTags } from './analyze.js';
import {
  errorMessage,
  loadCommandConfig,
  type GlobalOptions,
} from './shared.js';

export interface VerifyDeps {
  store: RequirementsStore;
  display: IDisplay;
  configLoader: IConfigLoader;
}

/**
 * Report, per pattern the go.mod's tags call for, how many requirements
 * were captured.
 */
export async function verifyCoverageCore(
  goModPath: string,
  options: GlobalOptions,
  deps: VerifyDeps
): Promise<CategoryStatus[]> {
  const absolutePath = PathValidator.validateFileExists(goModPath, 'go.mod');
  const config = await loadCommandConfig(
    options,
    deps.configLoader,
    deps.display
  );

  const stopSpinner = deps.display.startSpinner('Checking coverage...');
  let statuses: CategoryStatus[];
  try {
    const tags = await detectProjectTags(absolutePath, config.catalogFile);
    statuses = await checkCoverage(deps.store, tags, config.coverage);
  } finally {
    stopSpinner();
  }

  deps.display.showCoverage(statuses);
  return statuses;
}

/**
 * Report done and pending requirements.
 */
export async function verifyImplementationCore(
  options: GlobalOptions,
  deps: VerifyDeps
): Promise<ImplementationStatus> {
  await loadCommandConfig(options, deps.configLoader, deps.display);
  const status = await checkImplementation(deps.store);
  deps.display.showImplementation(status);
  return status;
}

/**
 * Report, for each concrete expansion of a pattern, whether all matching
 * requirements are done.
 *
 * @returns Whether every expansion is done
 */
export async function verifyPatternCore(
  pattern: string,
  options: GlobalOptions,
  deps: VerifyDeps
): Promise<boolean> {
  await loadCommandConfig(options, deps.configLoader, deps.display);

  const expansions = await expandWildcardPattern(deps.store, pattern);
  if (expansions.length === 0) {
    deps.display.showMessage(`No requirements match ${pattern}`);
    return true;
  }

  let allDone = true;
  for (const expanded of expansions) {
    const status = await requirementStatus(deps.store, expanded);
    if (status.allDone) {
      deps.display.showSuccess(`${expanded}: all requirements done`);
      continue;
    }
    allDone = false;
    deps.display.showWarning(
      `${expanded}: ${status.pending.length} pending (${status.pending.join(', ')})`
    );
  }
  return allDone;
}

/**
 * Execute `verify coverage`.
 * This is the entry point called by Commander.js.
 */
export async function verifyCoverageCommand(
  goModPath: string,
  options: GlobalOptions,
  deps: VerifyDeps
): Promise<ExitCode> {
  try {
    await verifyCoverageCore(goModPath, options, deps);
    return EXIT_CODE.SUCCESS;
  } catch (error) {
    deps.display.showError(errorMessage(error));
    return EXIT_CODE.ERROR;
  }
}

/**
 * Execute `verify implementation`. Fails while requirements are pending.
 */
export async function verifyImplementationCommand(
  options: GlobalOptions,
  deps: VerifyDeps
): Promise<ExitCode> {
  try {
    const status = await verifyImplementationCore(options, deps);
    return status.pending.length === 0 ? EXIT_CODE.SUCCESS : EXIT_CODE.ERROR;
  } catch (error) {
    deps.display.showError(errorMessage(error));
    return EXIT_CODE.ERROR;
  }
}

/**
 * Execute `verify pattern`. Fails while matching requirements are pending.
 */
export async function verifyPatternCommand(
  pattern: string,
  options: GlobalOptions,
  deps: VerifyDeps
): Promise<ExitCode> {
  try {
    const allDone = await verifyPatternCore(pattern, options, deps);
    return allDone ? EXIT_CODE.SUCCESS : EXIT_CODE.ERROR;
  } catch (error) {
    deps.display.showError(errorMessage(error));
    return EXIT_CODE.ERROR;
  }
}
