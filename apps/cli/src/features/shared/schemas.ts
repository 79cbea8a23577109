import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

/**
 * Process command options
 */
export const ProcessCommandOptionsSchema = z
  .object({
    logTransactions: z.boolean().optional(),
    logFile: z.string().trim().min(1, '--log-file must not be empty').optional(),
  })
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape)
  .refine((data) => data.logFile === undefined || data.logTransactions === true, {
    message: '--log-file requires --log-transactions',
    path: ['logFile'],
  });
