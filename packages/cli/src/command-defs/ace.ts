import { z } from 'zod';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Dates must be YYYY-MM-DD');

/**
 * ACE run schema
 */
export const aceRunSchema = z.object({
  runners: z.string().min(1, 'Runner table path is required'),
  strategies: z.string().min(1).optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
  maxRaces: z.number().int().positive().optional(),
  label: z.string().min(1).optional(),
  experienceDir: z.string().min(1).optional(),
  experienceFormat: z.enum(['parquet', 'csv.gz']).optional(),
  playbookPath: z.string().min(1).optional(),
  minBets: z.number().int().nonnegative().optional(),
  maxHistory: z.number().int().positive().optional(),
  alpha: z.number().gt(0).lt(1).optional(),
  partitionByDate: z.boolean().optional(),
});

export type AceRunArgs = z.infer<typeof aceRunSchema>;

/**
 * Playbook show schema
 */
export const playbookShowSchema = z.object({
  playbookPath: z.string().min(1).optional(),
  section: z
    .enum(['strategies', 'tracks', 'contexts', 'global', 'metadata'])
    .optional()
    .default('strategies'),
});

export type PlaybookShowArgs = z.infer<typeof playbookShowSchema>;
