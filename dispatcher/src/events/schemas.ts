import { z } from 'zod';

/**
 * Outcome body accepted from the REST API and the completion subject
 */
export const outcomeSchema = z.object({
  runnerKey: z.string().min(1),
  success: z.boolean(),
  durationSeconds: z.number().nonnegative(),
  costPerMinute: z.number().nonnegative().optional(),
  decisionId: z.string().optional(),
  timestamp: z.string().datetime().optional(),
});

/**
 * The fields of a GitLab "Job Hook" (object_kind: build) that matter here
 */
export const gitlabBuildEventSchema = z.object({
  object_kind: z.string(),
  build_id: z.number().optional(),
  build_name: z.string().optional(),
  build_status: z.string(),
  build_duration: z.number().nullable().optional(),
  runner: z
    .object({
      id: z.number().optional(),
      description: z.string().optional(),
    })
    .nullable()
    .optional(),
});

export type GitLabBuildEvent = z.infer<typeof gitlabBuildEventSchema>;
