/**
 * Step progress state machine for one migration run.
 */

import { StepNotFoundError } from '../errors.js';
import {
  createProgressState,
  type ProgressState,
  type StepRecord,
} from '../types/progress-state.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { completeStep, isDone, startStep } from './step-record.js';

export interface ProgressSummary {
  /** Steps completed or skipped */
  completed: number;

  /** All steps */
  total: number;
}

/**
 * Tracks the lifecycle of every step in a migration.
 *
 * Wraps a {@link ProgressState} document; `start` and `complete` are the only
 * mutations. Persistence lives in ProgressStateManager.
 */
export class MigrationProgress {
  private state: ProgressState;
  private readonly clock: Clock;

  constructor(state: ProgressState, clock: Clock = systemClock) {
    this.state = structuredClone(state);
    this.clock = clock;
  }

  /**
   * Create progress for a new run with every step pending.
   *
   * @param projectPath - Project the migration applies to
   * @param stepOrder - Step IDs in prompt order
   * @param clock - Time source
   */
  static initialize(
    projectPath: string,
    stepOrder: readonly string[],
    clock: Clock = systemClock
  ): MigrationProgress {
    const state = createProgressState(
      projectPath,
      stepOrder,
      clock().toISOString()
    );
    return new MigrationProgress(state, clock);
  }

  get currentStep(): string {
    return this.state.current_step;
  }

  get stepOrder(): string[] {
    return [...this.state.step_order];
  }

  getStep(id: string): StepRecord | undefined {
    return Object.hasOwn(this.state.steps, id)
      ? this.state.steps[id]
      : undefined;
  }

  /**
   * Mark a step in_progress and make it the current step.
   *
   * @throws {StepNotFoundError} If the step is unknown (nothing is changed)
   */
  start(id: string): void {
    const record = this.requireStep(id);
    this.state.steps[id] = startStep(record, this.clock().toISOString());
    this.state.current_step = id;
  }

  /**
   * Mark a step completed. The current step is left as it is.
   *
   * @param notes - Completion note; an empty note keeps any earlier one
   * @throws {StepNotFoundError} If the step is unknown (nothing is changed)
   */
  complete(id: string, notes: string = ''): void {
    const record = this.requireStep(id);
    this.state.steps[id] = completeStep(
      record,
      this.clock().toISOString(),
      notes
    );
  }

  progress(): ProgressSummary {
    const records = Object.values(this.state.steps);
    return {
      completed: records.filter((record) => isDone(record.status)).length,
      total: records.length,
    };
  }

  isComplete(): boolean {
    const { completed, total } = this.progress();
    return completed === total;
  }

  /**
   * Snapshot of the underlying document, safe to serialize or mutate.
   */
  toState(): ProgressState {
    return structuredClone(this.state);
  }

  private requireStep(id: string): StepRecord {
    const record = this.getStep(id);
    if (record === undefined) {
      throw new StepNotFoundError(id);
    }
    return record;
  }
}
