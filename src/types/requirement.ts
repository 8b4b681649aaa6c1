import { z } from 'zod';

const TimestampSchema = z.string().datetime({ offset: true }); // ISO 8601

/**
 * A requirement captured during migration: behavior of the original
 * project that the port must reproduce.
 * Stored in .waymark/requirements/<path>.json
 */
export const RequirementSchema = z
  .object({
    path: z.string().min(1),
    content: z.string(),
    step: z.string(), // current step when last written, may be empty
    created_at: TimestampSchema,
    updated_at: TimestampSchema,
    done: z.boolean(),
    done_at: TimestampSchema.optional(),
  })
  .refine(
    (requirement) => !requirement.done || requirement.done_at !== undefined,
    {
      message: 'done_at is required when done is true',
      path: ['done_at'],
    }
  );

export type Requirement = z.infer<typeof RequirementSchema>;
