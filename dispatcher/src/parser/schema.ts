import { z } from 'zod';
import type { JobDeclaration } from '@gantry/shared';

const imageReferenceSchema = z.union([
  z.string(),
  z.object({ name: z.string() }),
]);

/**
 * Job declaration as accepted from callers and CI files
 *
 * Keys other than the ones listed (script, stage, ...) are dropped.
 */
export const jobDeclarationSchema: z.ZodType<JobDeclaration> = z.object({
  name: z.string().optional(),
  tags: z.union([z.array(z.string()), z.string()]).optional(),
  image: imageReferenceSchema.optional(),
  services: z.array(imageReferenceSchema).optional(),
  timeout: z.union([z.number().nonnegative(), z.string()]).optional(),
  variables: z.record(z.unknown()).optional(),
});

/**
 * The `default:` section of a CI file
 */
export const pipelineDefaultsSchema = z.object({
  tags: z.union([z.array(z.string()), z.string()]).optional(),
});
