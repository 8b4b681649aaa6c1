/**
 * Terminal display implementation with formatted output.
 *
 * Uses chalk for colors, cli-table3 for tables, and ora for progress
 * spinners.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import ora from 'ora';
import type { IConfig } from '../config/i-config.js';
import type { StepStatus } from '../types/progress-state.js';
import type { Requirement } from '../types/requirement.js';
import type { ScanResult } from '../types/scan.js';
import { responsiveTableOptions } from '../utils/terminal-width.js';
import type {
  CategoryStatus,
  ImplementationStatus,
} from '../verify/coverage.js';
import type { MigrationStatus } from '../workflow/migration-workflow.js';
import type { IDisplay } from './i-display.js';

/**
 * Marker shown for each step status in listings.
 */
export const STATUS_SYMBOLS: Record<StepStatus, string> = {
  completed: '[x]',
  in_progress: '[>]',
  skipped: '[-]',
  pending: '[ ]',
};

/**
 * Format an ISO 8601 timestamp as `YYYY-MM-DD HH:MM:SS UTC`.
 */
export function formatTimestamp(timestamp: string): string {
  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) {
    return timestamp;
  }
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

type Spinner = ReturnType<typeof ora>;

export class TerminalDisplay implements IDisplay {
  private spinner: Spinner | null = null;

  public showMessage(message: string): void {
    console.log(message);
  }

  public showSuccess(message: string): void {
    console.log(chalk.green('✓ ') + message);
  }

  public showWarning(message: string): void {
    console.log(chalk.yellow('Warning: ') + message);
  }

  public showError(message: string): void {
    console.error(chalk.red('Error: ') + message);
  }

  public showConfig(config: IConfig): void {
    console.log(chalk.bold('Configuration:'));
    console.log(`  Prompt file: ${chalk.cyan(config.promptFile)}`);
    console.log(`  Catalog file: ${chalk.cyan(config.catalogFile)}`);
    console.log(`  Target language: ${chalk.cyan(config.targetLanguage)}`);
    console.log(
      `  Include unsafe: ${chalk.cyan(String(config.includeUnsafe))}`
    );
    const tagCount = Object.keys(config.coverage).length;
    console.log(`  Coverage tags: ${chalk.cyan(String(tagCount))}`);
    console.log('');
  }

  public showMigrationStatus(status: MigrationStatus): void {
    const percent =
      status.total === 0 ? 100 : (status.completed / status.total) * 100;

    console.log(
      chalk.bold(
        `Migration Progress: ${status.completed}/${status.total} steps`
      )
    );
    console.log(`  ${this.createProgressBar(percent)}`);
    console.log(`Current step: ${status.currentStep}`);
    console.log(`Started: ${formatTimestamp(status.startedAt)}`);
    console.log('');

    const table = new Table(
      responsiveTableOptions(
        [
          chalk.cyan('Status'),
          chalk.cyan('Step'),
          chalk.cyan('Completed'),
          chalk.cyan('Note'),
        ],
        [8, 20, 26, 40],
        [5, 14, 24, 30]
      )
    );

    for (const step of status.steps) {
      table.push([
        this.colorStatus(step.status),
        `Step ${step.id}`,
        step.completedAt === undefined
          ? ''
          : chalk.gray(formatTimestamp(step.completedAt)),
        step.notes ?? '',
      ]);
    }

    console.log(table.toString());
  }

  public showRequirementList(requirements: Requirement[]): void {
    if (requirements.length === 0) {
      console.log('No requirements found.');
      return;
    }
    for (const requirement of requirements) {
      const marker = requirement.done ? chalk.green('[x]') : '[ ]';
      console.log(`${marker} ${requirement.path}`);
    }
  }

  public showRequirement(requirement: Requirement): void {
    console.log(requirement.content);
  }

  public showScanResult(result: ScanResult): void {
    console.log(`Module: ${result.module}`);
    console.log(`Go version: ${result.goVersion}`);
    console.log(`Direct dependencies: ${result.entries.length}`);
    console.log('');

    for (const entry of result.entries) {
      console.log(entry.path);
      if (entry.targets.length === 0) {
        console.log(chalk.gray('  -> (no mapping found)'));
        continue;
      }
      for (const target of entry.targets) {
        console.log(`  -> ${chalk.green(target.crateName)} (${target.url})`);
      }
    }

    console.log('');
    console.log(
      `Mapped ${result.mappedCount}/${result.entries.length} direct dependencies`
    );
  }

  public showCoverage(statuses: CategoryStatus[]): void {
    if (statuses.length === 0) {
      console.log('No coverage expectations for this project.');
      return;
    }

    const table = new Table(
      responsiveTableOptions(
        [
          chalk.cyan('Category'),
          chalk.cyan('Pattern'),
          chalk.cyan('Requirements'),
          chalk.cyan('Done'),
        ],
        [20, 24, 14, 10],
        [14, 18, 8, 8]
      )
    );

    for (const status of statuses) {
      const count = status.hasRequirements
        ? String(status.count)
        : chalk.red('0');
      table.push([
        status.category,
        status.pattern,
        count,
        `${status.doneCount}/${status.count}`,
      ]);
    }
    console.log(table.toString());

    const covered = statuses.filter((status) => status.hasRequirements);
    for (const status of statuses) {
      if (!status.hasRequirements) {
        console.log(
          chalk.yellow('Missing: ') +
            `no requirements match ${status.pattern} (${status.category})`
        );
      }
    }
    console.log('');
    console.log(
      `${covered.length}/${statuses.length} expected categories have requirements`
    );
  }

  public showImplementation(status: ImplementationStatus): void {
    const total = status.done.length + status.pending.length;
    if (total === 0) {
      console.log('No requirements found.');
      return;
    }

    console.log(chalk.bold(`Done (${status.done.length}):`));
    for (const requirementPath of status.done) {
      console.log(`  ${chalk.green('[x]')} ${requirementPath}`);
    }
    console.log(chalk.bold(`Pending (${status.pending.length}):`));
    for (const requirementPath of status.pending) {
      console.log(`  [ ] ${requirementPath}`);
    }
    console.log('');
    console.log(`Implemented ${status.done.length}/${total} requirements`);
  }

  public startSpinner(message: string): () => void {
    this.spinner = ora(message).start();
    return this.stopSpinner.bind(this);
  }

  private stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  private colorStatus(status: StepStatus): string {
    const symbol = STATUS_SYMBOLS[status];
    switch (status) {
      case 'completed': {
        return chalk.green(symbol);
      }
      case 'in_progress': {
        return chalk.cyan(symbol);
      }
      case 'skipped': {
        return chalk.gray(symbol);
      }
      case 'pending': {
        return symbol;
      }
    }
  }

  private createProgressBar(percent: number, width: number = 30): string {
    const filled = Math.round((percent / 100) * width);
    const empty = width - filled;
    const color =
      percent >= 80 ? chalk.green : percent >= 50 ? chalk.yellow : chalk.red;

    return (
      '[' + color('█'.repeat(filled)) + chalk.gray('░'.repeat(empty)) + ']'
    );
  }
}
