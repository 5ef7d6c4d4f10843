import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

/**
 * Options of the root command as commander hands them over: numbers arrive as
 * strings and are coerced here. Ranges are checked by the request and config models.
 */
export const RequestCommandOptionsSchema = z
  .object({
    method: z.string().default('GET'),
    header: z.array(z.string()).default([]),
    data: z.string().optional(),
    timeout: z.coerce.number().default(30),
    retry: z.coerce.number().default(3),
    retryDelay: z.coerce.number().default(0.5),
    rateLimit: z.coerce.number().optional(),
    benchmark: z.coerce.number().int().nonnegative().optional(),
    verifySsl: z.boolean().default(true),
    followRedirects: z.boolean().default(true),
  })
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape);
