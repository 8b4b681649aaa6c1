/**
 * Migrate command implementation.
 *
 * Walks the operator through the steps of the migration prompt and records
 * progress in .waymark/progress.json.
 */

import type { IConfigLoader } from '../config/i-config-loader.js';
import { EXIT_CODE, type ExitCode } from '../constants/exit-codes.js';
import type { IDisplay } from '../display/i-display.js';
import { loadPrompt } from '../prompt/prompt-loader.js';
import type { Clock } from '../utils/clock.js';
import { MigrationWorkflow } from '../workflow/migration-workflow.js';
import {
  errorMessage,
  loadCommandConfig,
  type GlobalOptions,
} from './shared.js';

/** Command an agent is told to run for each step. */
export const MIGRATE_COMMAND = 'waymark migrate';

export interface MigrateOptions extends GlobalOptions {
  start?: string;
  finish?: string;
  note?: string;
  status?: boolean;
  reset?: boolean;
  bootstrap?: boolean;
}

/**
 * Core migrate logic (extracted for testability).
 *
 * Exactly one action runs, in this order of precedence: reset, bootstrap,
 * status, start, finish, show. An empty `--start` or `--finish` value counts
 * as not given.
 *
 * @param step - Step to show; the introduction when omitted
 * @param projectRoot - Directory holding .waymark/
 * @param clock - Time source for progress timestamps
 */
export async function migrateCore(
  step: string | undefined,
  options: MigrateOptions,
  display: IDisplay,
  configLoader: IConfigLoader,
  projectRoot: string = process.cwd(),
  clock?: Clock
): Promise<void> {
  const config = await loadCommandConfig(options, configLoader, display);

  if (options.reset) {
    display.showMessage(await MigrationWorkflow.reset(projectRoot));
    return;
  }

  const prompt = await loadPrompt(config.promptFile);
  const workflow = new MigrationWorkflow(projectRoot, prompt, { clock });

  if (options.bootstrap) {
    display.showMessage(prompt.bootstrap(MIGRATE_COMMAND));
    return;
  }

  if (options.status) {
    display.showMigrationStatus(await workflow.status());
    return;
  }

  if (options.start) {
    display.showMessage(await workflow.start(options.start));
    return;
  }

  if (options.finish) {
    display.showMessage(await workflow.finish(options.finish, options.note));
    return;
  }

  if (options.note) {
    display.showWarning('--note is only used together with --finish');
  }
  display.showMessage(await workflow.show(step));
}

/**
 * Execute the migrate command.
 * This is the entry point called by Commander.js.
 *
 * @returns Exit code (EXIT_CODE.SUCCESS for success, EXIT_CODE.ERROR for failure)
 */
export async function migrateCommand(
  step: string | undefined,
  options: MigrateOptions,
  display: IDisplay,
  configLoader: IConfigLoader
): Promise<ExitCode> {
  try {
    await migrateCore(step, options, display, configLoader);
    return EXIT_CODE.SUCCESS;
  } catch (error) {
    display.showError(errorMessage(error));
    return EXIT_CODE.ERROR;
  }
}
