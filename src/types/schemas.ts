/**
 * Zod schemas for runtime validation
 *
 * These schemas validate config JSON and user-supplied dates at the
 * system boundary.
 */

import { z } from 'zod';

/**
 * Schema for RetentionOptions
 */
export const RetentionOptionsSchema = z.object({
  smallFileThresholdBytes: z.number().int().nonnegative(),
  smallFileRatio: z.number().positive(),
  largeFileRatio: z.number().positive(),
});

/**
 * Schema for DeltaVaultConfig (config.json)
 *
 * Every field is optional in the file; missing ones take the defaults.
 */
export const DeltaVaultConfigSchema = z.object({
  archiveDir: z.string().min(1).default('.deltavault/archive'),
  layout: z.enum(['plain', 'zip']).default('plain'),
  pruneSupersededBases: z.boolean().default(false),
  retention: RetentionOptionsSchema.default({
    smallFileThresholdBytes: 2048,
    smallFileRatio: 0.95,
    largeFileRatio: 0.3,
  }),
});

/**
 * Schema for a date given as YYYY-MM-DD or YYYYMMDD
 */
export const DateInputSchema = z
  .string()
  .regex(/^(\d{4}-\d{2}-\d{2}|\d{8})$/, 'Dates must be YYYY-MM-DD or YYYYMMDD');

/**
 * Export types inferred from schemas for type checking
 */
export type ValidatedDeltaVaultConfig = z.infer<typeof DeltaVaultConfigSchema>;
export type ValidatedRetentionOptions = z.infer<typeof RetentionOptionsSchema>;
