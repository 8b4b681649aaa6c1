import { z } from 'zod';

/**
 * Schema version written to new progress.json files.
 * Files carrying a higher version were written by a newer waymark.
 */
export const CURRENT_PROGRESS_VERSION = 1;

const TimestampSchema = z.string().datetime({ offset: true }); // ISO 8601

export const StepStatusSchema = z.enum([
  'pending',
  'in_progress',
  'completed',
  'skipped',
]);

export type StepStatus = z.infer<typeof StepStatusSchema>;

/**
 * A step nobody has started. Carries no timestamps.
 */
export const PendingStepSchema = z.object({
  id: z.string(),
  status: z.literal('pending'),
  started_at: z.undefined(),
  completed_at: z.undefined(),
  notes: z.string().optional(),
});

export const InProgressStepSchema = z.object({
  id: z.string(),
  status: z.literal('in_progress'),
  started_at: TimestampSchema,
  notes: z.string().optional(),
});

export const CompletedStepSchema = z.object({
  id: z.string(),
  status: z.literal('completed'),
  started_at: TimestampSchema.optional(),
  completed_at: TimestampSchema,
  notes: z.string().optional(),
});

/**
 * Terminal alternative to `completed`. Nothing in waymark moves a step here;
 * the state is only reachable by editing progress.json.
 */
export const SkippedStepSchema = z.object({
  id: z.string(),
  status: z.literal('skipped'),
  started_at: TimestampSchema.optional(),
  completed_at: TimestampSchema.optional(),
  notes: z.string().optional(),
});

export const StepRecordSchema = z.discriminatedUnion('status', [
  PendingStepSchema,
  InProgressStepSchema,
  CompletedStepSchema,
  SkippedStepSchema,
]);

export type PendingStep = z.infer<typeof PendingStepSchema>;
export type InProgressStep = z.infer<typeof InProgressStepSchema>;
export type CompletedStep = z.infer<typeof CompletedStepSchema>;
export type SkippedStep = z.infer<typeof SkippedStepSchema>;
export type StepRecord = z.infer<typeof StepRecordSchema>;

/**
 * Migration progress for one project.
 * Stored in .waymark/progress.json
 */
export const ProgressStateSchema = z
  .object({
    version: z.number().int().positive(),
    started_at: TimestampSchema,
    project_path: z.string(),
    current_step: z.string(),
    steps: z.record(z.string(), StepRecordSchema),
    step_order: z.array(z.string()),
  })
  .superRefine((state, context) => {
    for (const [key, record] of Object.entries(state.steps)) {
      if (record.id !== key) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['steps', key, 'id'],
          message: `Step record id '${record.id}' does not match its key '${key}'`,
        });
      }
    }
    for (const id of state.step_order) {
      if (!Object.hasOwn(state.steps, id)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['step_order'],
          message: `Step '${id}' is listed in step_order but has no record`,
        });
      }
    }
    if (
      state.current_step !== '' &&
      !Object.hasOwn(state.steps, state.current_step)
    ) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['current_step'],
        message: `Current step '${state.current_step}' has no record`,
      });
    }
  });

export type ProgressState = z.infer<typeof ProgressStateSchema>;

/**
 * Create a fresh progress state with every step pending.
 *
 * @param projectPath - Project the migration applies to
 * @param stepOrder - Step IDs in prompt order
 * @param startedAt - ISO 8601 creation timestamp
 */
export function createProgressState(
  projectPath: string,
  stepOrder: readonly string[],
  startedAt: string
): ProgressState {
  const steps: Record<string, StepRecord> = Object.fromEntries(
    stepOrder.map((id): [string, StepRecord] => [id, { id, status: 'pending' }])
  );

  return {
    version: CURRENT_PROGRESS_VERSION,
    started_at: startedAt,
    project_path: projectPath,
    current_step: stepOrder[0] ?? '',
    steps,
    step_order: [...stepOrder],
  };
}
