/**
 * Step lifecycle transitions.
 *
 * pending ──start──▶ in_progress ──complete──▶ completed
 *    └──────────────complete──────────────────────┘
 *
 * Any record may be started again; completing never requires a prior start.
 * Records are replaced, never edited in place.
 */

import type {
  CompletedStep,
  InProgressStep,
  StepRecord,
  StepStatus,
} from '../types/progress-state.js';

/**
 * Move a step to `in_progress`, stamping a fresh start time.
 *
 * A restarted step drops its completion time; its notes are kept.
 */
export function startStep(record: StepRecord, at: string): InProgressStep {
  const started: InProgressStep = {
    id: record.id,
    status: 'in_progress',
    started_at: at,
  };
  if (record.notes !== undefined) {
    started.notes = record.notes;
  }
  return started;
}

/**
 * Move a step to `completed`.
 *
 * An empty note leaves any earlier note in place.
 */
export function completeStep(
  record: StepRecord,
  at: string,
  notes: string
): CompletedStep {
  const completed: CompletedStep = {
    id: record.id,
    status: 'completed',
    completed_at: at,
  };
  if (record.started_at !== undefined) {
    completed.started_at = record.started_at;
  }
  const keptNotes = notes === '' ? record.notes : notes;
  if (keptNotes !== undefined) {
    completed.notes = keptNotes;
  }
  return completed;
}

/**
 * Whether a status counts towards overall progress.
 */
export function isDone(status: StepStatus): boolean {
  return status === 'completed' || status === 'skipped';
}
