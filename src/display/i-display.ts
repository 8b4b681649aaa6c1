/**
 * Display interface for terminal output.
 *
 * Commands receive an IDisplay (typically TerminalDisplay) rather than
 * calling console.log directly, so tests can capture what they print.
 */

import type { IConfig } from '../config/i-config.js';
import type { Requirement } from '../types/requirement.js';
import type { ScanResult } from '../types/scan.js';
import type {
  CategoryStatus,
  ImplementationStatus,
} from '../verify/coverage.js';
import type { MigrationStatus } from '../workflow/migration-workflow.js';

export interface IDisplay {
  /**
   * Print text as is. Step instructions and raw documents go through here.
   */
  showMessage(message: string): void;

  showSuccess(message: string): void;

  showWarning(message: string): void;

  /**
   * Print an error to stderr, prefixed with `Error: `.
   */
  showError(message: string): void;

  /**
   * Display configuration information (verbose mode).
   */
  showConfig(config: IConfig): void;

  /**
   * Progress summary followed by one row per step in step order.
   */
  showMigrationStatus(status: MigrationStatus): void;

  /**
   * One `[x]`/`[ ]` line per requirement, or a notice when there are none.
   */
  showRequirementList(requirements: Requirement[]): void;

  /**
   * Print a requirement's content.
   */
  showRequirement(requirement: Requirement): void;

  showScanResult(result: ScanResult): void;

  showCoverage(statuses: CategoryStatus[]): void;

  showImplementation(status: ImplementationStatus): void;

  /**
   * Start a progress spinner with a message.
   *
   * @returns Function to stop the spinner
   */
  startSpinner(message: string): () => void;
}
