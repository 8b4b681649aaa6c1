#!/usr/bin/env node
/**
 * Main entry point for the waymark CLI.
 *
 * This module sets up Commander.js with subcommands for looking up library
 * equivalents, converting go.mod manifests, capturing requirements and
 * walking through a step-by-step migration.
 */

/* eslint-disable unicorn/no-process-exit, n/no-process-exit */
// This is a CLI entry point - process.exit() is appropriate here

import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { convertCommand, type ConvertOptions } from './commands/convert.js';
import { lookupCommand, type LookupOptions } from './commands/lookup.js';
import { migrateCommand, type MigrateOptions } from './commands/migrate.js';
import {
  reqDeleteCommand,
  reqDoneCommand,
  reqGetCommand,
  reqListCommand,
  reqSetCommand,
  type RequirementCommandDeps,
} from './commands/requirements.js';
import { scanCommand, type ScanOptions } from './commands/scan.js';
import type { GlobalOptions } from './commands/shared.js';
import {
  verifyCoverageCommand,
  verifyImplementationCommand,
  verifyPatternCommand,
} from './commands/verify.js';
import { ConfigLoader } from './config/config-loader.js';
import { EXIT_CODE, type ExitCode } from './constants/exit-codes.js';
import { TerminalDisplay } from './display/terminal-display.js';
import { RequirementsStore } from './requirements/requirements-store.js';

/**
 * Run a command action, exiting with its code on failure.
 */
async function execute(action: () => Promise<ExitCode>): Promise<void> {
  try {
    const exitCode = await action();
    if (exitCode !== EXIT_CODE.SUCCESS) {
      process.exit(exitCode);
    }
  } catch (error) {
    // Unexpected error (commands should return exit codes, not throw)
    const errorDisplay = new TerminalDisplay();
    errorDisplay.showError(
      `Unexpected error: ${error instanceof Error ? error.message : String(error)}`
    );
    process.exit(EXIT_CODE.ERROR);
  }
}

// Instantiate dependencies (ONLY place with 'new' for them)
function requirementDeps(): RequirementCommandDeps {
  return {
    store: new RequirementsStore(process.cwd()),
    display: new TerminalDisplay(),
    configLoader: new ConfigLoader(),
  };
}

function withGlobalOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose output');
}

const program = new Command();

program
  .name('waymark')
  .description('Guide the migration of a Go project to Rust')
  .version('0.1.0');

// Lookup command
withGlobalOptions(
  program
    .command('lookup')
    .description('Find equivalents of a library in another language')
    .argument('<url>', 'Library URL, e.g. https://github.com/spf13/cobra')
    .argument('[language]', 'Target language (default: from configuration)')
    .option('--unsafe', 'Include mappings flagged as unsafe')
).action(
  async (url: string, language: string | undefined, options: LookupOptions) =>
    execute(() =>
      lookupCommand(
        url,
        language,
        options,
        new TerminalDisplay(),
        new ConfigLoader()
      )
    )
);

// Scan command
withGlobalOptions(
  program
    .command('scan')
    .description('Show Rust equivalents of the direct dependencies of a go.mod')
    .argument('<go.mod>', 'Path to go.mod')
    .option('--unsafe', 'Include mappings flagged as unsafe')
).action(async (goModPath: string, options: ScanOptions) =>
  execute(() =>
    scanCommand(goModPath, options, new TerminalDisplay(), new ConfigLoader())
  )
);

// Analyze command
withGlobalOptions(
  program
    .command('analyze')
    .description('Detect project categories from the dependencies of a go.mod')
    .argument('<go.mod>', 'Path to go.mod')
).action(async (goModPath: string, options: GlobalOptions) =>
  execute(() =>
    analyzeCommand(
      goModPath,
      options,
      new TerminalDisplay(),
      new ConfigLoader()
    )
  )
);

// Convert command
withGlobalOptions(
  program
    .command('convert')
    .description('Generate a Cargo.toml from a go.mod')
    .argument('<go.mod>', 'Path to go.mod')
    .option('-o, --output <file>', 'Output file ("-" for stdout)', '-')
    .option('--unsafe', 'Include mappings flagged as unsafe')
).action(async (goModPath: string, options: ConvertOptions) =>
  execute(() =>
    convertCommand(
      goModPath,
      options,
      new TerminalDisplay(),
      new ConfigLoader()
    )
  )
);

// Migrate command
withGlobalOptions(
  program
    .command('migrate')
    .description('Walk through the steps of the migration prompt')
    .argument('[step]', 'Step to show (default: the introduction)')
    .option('--start <step>', 'Mark a step in progress and print it')
    .option('--finish <step>', 'Mark a step completed')
    .option('--note <text>', 'Note recorded with --finish')
    .option('--status', 'Show migration progress')
    .option('--reset', 'Delete migration progress')
    .option('--bootstrap', 'Print the instruction that starts an agent')
).action(async (step: string | undefined, options: MigrateOptions) =>
  execute(() =>
    migrateCommand(step, options, new TerminalDisplay(), new ConfigLoader())
  )
);

// Requirement commands
const req = program
  .command('req')
  .description('Capture requirements the port must preserve');

withGlobalOptions(
  req
    .command('set')
    .description('Create or update a requirement (content from stdin if omitted)')
    .argument('<path>', 'Requirement path, e.g. api/cli')
    .argument('[content]', 'Requirement text')
).action(
  async (
    requirementPath: string,
    content: string | undefined,
    options: GlobalOptions
  ) =>
    execute(() =>
      reqSetCommand(requirementPath, content, options, requirementDeps())
    )
);

withGlobalOptions(
  req
    .command('get')
    .description('Print a requirement')
    .argument('<path>', 'Requirement path')
).action(async (requirementPath: string, options: GlobalOptions) =>
  execute(() => reqGetCommand(requirementPath, options, requirementDeps()))
);

withGlobalOptions(
  req
    .command('list')
    .description('List requirements')
    .argument('[prefix]', 'Path prefix; "*" matches one segment')
).action(async (prefix: string | undefined, options: GlobalOptions) =>
  execute(() => reqListCommand(prefix, options, requirementDeps()))
);

withGlobalOptions(
  req
    .command('done')
    .description('Mark a requirement as implemented')
    .argument('<path>', 'Requirement path')
).action(async (requirementPath: string, options: GlobalOptions) =>
  execute(() => reqDoneCommand(requirementPath, options, requirementDeps()))
);

withGlobalOptions(
  req
    .command('delete')
    .description('Delete a requirement')
    .argument('<path>', 'Requirement path')
).action(async (requirementPath: string, options: GlobalOptions) =>
  execute(() => reqDeleteCommand(requirementPath, options, requirementDeps()))
);

// Verify commands
const verify = program
  .command('verify')
  .description('Check requirements against the project');

withGlobalOptions(
  verify
    .command('coverage')
    .description('Check that expected requirement categories are captured')
    .argument('<go.mod>', 'Path to go.mod')
).action(async (goModPath: string, options: GlobalOptions) =>
  execute(() => verifyCoverageCommand(goModPath, options, requirementDeps()))
);

withGlobalOptions(
  verify
    .command('implementation')
    .description('Check that every requirement is done')
).action(async (options: GlobalOptions) =>
  execute(() => verifyImplementationCommand(options, requirementDeps()))
);

withGlobalOptions(
  verify
    .command('pattern')
    .description('Check that requirements matching a pattern are done')
    .argument('<pattern>', 'Path prefix; "*" matches one segment')
).action(async (pattern: string, options: GlobalOptions) =>
  execute(() => verifyPatternCommand(pattern, options, requirementDeps()))
);

program.parseAsync(process.argv).catch((error: unknown) => {
  new TerminalDisplay().showError(
    `Unexpected error: ${error instanceof Error ? error.message : String(error)}`
  );
  process.exit(EXIT_CODE.ERROR);
});
