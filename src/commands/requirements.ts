/**
 * Requirement command implementations (`waymark req ...`).
 *
 * Requirements are notes addressed by slash-separated paths (`api/cli`,
 * `db/schema`) that record what the port must preserve. They live in
 * .waymark/requirements/ of the working directory.
 */

import type { IConfigLoader } from '../config/i-config-loader.js';
import { EXIT_CODE, type ExitCode } from '../constants/exit-codes.js';
import type { IDisplay } from '../display/i-display.js';
import { RequirementNotFoundError } from '../errors.js';
import type { RequirementsStore } from '../requirements/requirements-store.js';
import { readStdin } from '../utils/read-stdin.js';
import {
  errorMessage,
  loadCommandConfig,
  type GlobalOptions,
} from './shared.js';

/**
 * Dependencies of the requirement commands.
 */
export interface RequirementCommandDeps {
  store: RequirementsStore;
  display: IDisplay;
  configLoader: IConfigLoader;
  /** Source of content when none is given on the command line */
  readInput?: () => Promise<string>;
}

/**
 * Create or update a requirement. Content is read from stdin when omitted.
 */
export async function reqSetCore(
  requirementPath: string,
  content: string | undefined,
  options: GlobalOptions,
  deps: RequirementCommandDeps
): Promise<void> {
  await loadCommandConfig(options, deps.configLoader, deps.display);

  let text = content ?? '';
  if (text === '') {
    const readInput = deps.readInput ?? (() => readStdin());
    text = (await readInput()).trim();
  }

  await deps.store.set(requirementPath, text);
  deps.display.showMessage(`Set ${requirementPath}`);
}

export async function reqGetCore(
  requirementPath: string,
  options: GlobalOptions,
  deps: RequirementCommandDeps
): Promise<void> {
  await loadCommandConfig(options, deps.configLoader, deps.display);

  const requirement = await deps.store.get(requirementPath);
  if (requirement === null) {
    throw new RequirementNotFoundError(requirementPath);
  }
  deps.display.showRequirement(requirement);
}

/**
 * List requirements with their done markers.
 *
 * @param prefix - Plain prefix or `*` segment pattern; everything when omitted
 */
export async function reqListCore(
  prefix: string | undefined,
  options: GlobalOptions,
  deps: RequirementCommandDeps
): Promise<void> {
  await loadCommandConfig(options, deps.configLoader, deps.display);
  deps.display.showRequirementList(await deps.store.listEntries(prefix ?? ''));
}

export async function reqDoneCore(
  requirementPath: string,
  options: GlobalOptions,
  deps: RequirementCommandDeps
): Promise<void> {
  await loadCommandConfig(options, deps.configLoader, deps.display);
  await deps.store.done(requirementPath);
  deps.display.showMessage(`Marked ${requirementPath} as done`);
}

export async function reqDeleteCore(
  requirementPath: string,
  options: GlobalOptions,
  deps: RequirementCommandDeps
): Promise<void> {
  await loadCommandConfig(options, deps.configLoader, deps.display);
  await deps.store.delete(requirementPath);
  deps.display.showMessage(`Deleted ${requirementPath}`);
}

async function run(
  display: IDisplay,
  action: () => Promise<void>
): Promise<ExitCode> {
  try {
    await action();
    return EXIT_CODE.SUCCESS;
  } catch (error) {
    display.showError(errorMessage(error));
    return EXIT_CODE.ERROR;
  }
}

/**
 * Execute `req set`.
 * This is the entry point called by Commander.js.
 */
export async function reqSetCommand(
  requirementPath: string,
  content: string | undefined,
  options: GlobalOptions,
  deps: RequirementCommandDeps
): Promise<ExitCode> {
  return run(deps.display, () =>
    reqSetCore(requirementPath, content, options, deps)
  );
}

export async function reqGetCommand(
  requirementPath: string,
  options: GlobalOptions,
  deps: RequirementCommandDeps
): Promise<ExitCode> {
  return run(deps.display, () => reqGetCore(requirementPath, options, deps));
}

export async function reqListCommand(
  prefix: string | undefined,
  options: GlobalOptions,
  deps: RequirementCommandDeps
): Promise<ExitCode> {
  return run(deps.display, () => reqListCore(prefix, options, deps));
}

export async function reqDoneCommand(
  requirementPath: string,
  options: GlobalOptions,
  deps: RequirementCommandDeps
): Promise<ExitCode> {
  return run(deps.display, () => reqDoneCore(requirementPath, options, deps));
}

export async function reqDeleteCommand(
  requirementPath: string,
  options: GlobalOptions,
  deps: RequirementCommandDeps
): Promise<ExitCode> {
  return run(deps.display, () =>
    reqDeleteCore(requirementPath, options, deps)
  );
}
