import { z } from 'zod';

const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

/**
 * Options of `evaluate`; the <file> argument is checked by buildEvaluateParams.
 */
export const EvaluateCommandOptionsSchema = JsonFlagSchema.extend({
  profile: z.string().min(1, 'Profile name cannot be empty').optional(),
  config: z.string().min(1, 'Config path cannot be empty').optional(),
});
