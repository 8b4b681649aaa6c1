/**
 * Migration workflow orchestration.
 *
 * Ties the parsed prompt document to the persisted progress of one project:
 * every action loads progress (creating it from the prompt's step order on
 * first use), applies one change, saves and returns what to print.
 */

import { StepNotFoundError } from '../errors.js';
import { MigrationProgress } from '../progress/migration-progress.js';
import type { MigrationPrompt } from '../prompt/prompt-parser.js';
import type { StepStatus } from '../types/progress-state.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { ProgressStateManager } from '../utils/progress-state-manager.js';

/**
 * One row of the status listing.
 */
export interface StepStatusEntry {
  id: string;
  status: StepStatus;
  completedAt?: string;
  notes?: string;
}

/**
 * Snapshot of a migration for display.
 */
export interface MigrationStatus {
  completed: number;
  total: number;
  currentStep: string;
  startedAt: string;
  steps: StepStatusEntry[];
}

export interface MigrationWorkflowOptions {
  clock?: Clock;
}

export class MigrationWorkflow {
  private readonly projectRoot: string;
  private readonly prompt: MigrationPrompt;
  private readonly clock: Clock;

  constructor(
    projectRoot: string,
    prompt: MigrationPrompt,
    options: MigrationWorkflowOptions = {}
  ) {
    this.projectRoot = projectRoot;
    this.prompt = prompt;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Text for a step, or the entry point when no step is given.
   *
   * The entry point is the introduction, falling back to the first step when
   * the document has none.
   *
   * @throws {StepNotFoundError} If the prompt has no such step
   */
  async show(stepId?: string): Promise<string> {
    await this.loadOrCreate();

    if (stepId === undefined || stepId === '') {
      const introduction = this.prompt.introduction();
      if (introduction !== '') {
        return introduction;
      }
      return this.stepContent(this.prompt.firstStep());
    }
    return this.stepContent(stepId);
  }

  /**
   * Mark a step in progress and return its instructions wrapped in the
   * before/after sections.
   *
   * Unknown steps are rejected before anything is saved.
   */
  async start(stepId: string): Promise<string> {
    const content = this.stepContent(stepId);

    const progress = await this.loadOrCreate();
    progress.start(stepId);
    await ProgressStateManager.save(this.projectRoot, progress.toState());

    return [this.prompt.before(), content, this.prompt.after()]
      .filter((part) => part !== '')
      .join('\n\n');
  }

  /**
   * Mark a step completed.
   *
   * @param note - Optional completion note; empty keeps any earlier note
   * @returns Confirmation line
   */
  async finish(stepId: string, note: string = ''): Promise<string> {
    const progress = await this.loadOrCreate();
    progress.complete(stepId, note);
    await ProgressStateManager.save(this.projectRoot, progress.toState());
    return `Completed step ${stepId}`;
  }

  async status(): Promise<MigrationStatus> {
    const progress = await this.loadOrCreate();
    const state = progress.toState();
    const { completed, total } = progress.progress();

    const steps: StepStatusEntry[] = [];
    for (const id of state.step_order) {
      const record = progress.getStep(id);
      if (record === undefined) {
        continue;
      }
      const entry: StepStatusEntry = { id, status: record.status };
      if (record.status === 'completed') {
        entry.completedAt = record.completed_at;
      }
      if (record.notes !== undefined && record.notes !== '') {
        entry.notes = record.notes;
      }
      steps.push(entry);
    }

    return {
      completed,
      total,
      currentStep: state.current_step,
      startedAt: state.started_at,
      steps,
    };
  }

  /**
   * Forget all progress. The next action starts a fresh run.
   *
   * Needs no prompt, so it works when the prompt document is broken.
   */
  static async reset(projectRoot: string): Promise<string> {
    await ProgressStateManager.delete(projectRoot);
    return 'Migration progress reset.';
  }

  private stepContent(stepId: string): string {
    const content = this.prompt.getStep(stepId);
    if (content === undefined) {
      throw new StepNotFoundError(stepId);
    }
    return content;
  }

  private async loadOrCreate(): Promise<MigrationProgress> {
    const state = await ProgressStateManager.load(this.projectRoot);
    if (state !== null) {
      return new MigrationProgress(state, this.clock);
    }

    const progress = MigrationProgress.initialize(
      this.projectRoot,
      this.prompt.steps(),
      this.clock
    );
    await ProgressStateManager.save(this.projectRoot, progress.toState());
    return progress;
  }
}
