import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import type { ClassificationConfigOverrides } from './classification-config.js';

const thresholdSchema = z.number().finite().nonnegative();

export const classificationConfigOverridesSchema = z
  .object({
    speed: z
      .object({
        instant: thresholdSchema.optional(),
        fast: thresholdSchema.optional(),
        slow: thresholdSchema.optional(),
      })
      .strict()
      .optional(),
    loss: z
      .object({
        normal: thresholdSchema.optional(),
        warn: thresholdSchema.optional(),
      })
      .strict()
      .optional(),
    severeLossThreshold: thresholdSchema.optional(),
  })
  .strict();

/**
 * Validate overrides coming from outside the process (config files, configuration repository).
 */
export function parseClassificationOverrides(input: unknown): Result<ClassificationConfigOverrides, Error> {
  const result = classificationConfigOverridesSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return err(new Error(`Invalid classification config: ${issues.join('; ')}`));
  }
  return ok(result.data);
}
