/**
 * Experience records
 *
 * One record per accepted bet, across every strategy of a run. Field names
 * are the on-disk column names.
 */

import { z } from 'zod';

export const EXPERIENCE_ACTION = 'bet';

export const ExperienceRecordSchema = z.object({
  event_date: z.string().nullable(),
  race_id: z.string(),
  runner_id: z.string(),
  selection_id: z.string().nullable(),
  strategy_id: z.string(),
  params: z.string(),
  action: z.literal(EXPERIENCE_ACTION),
  stake: z.number(),
  profit: z.number(),
  model_prob: z.number(),
  implied_prob: z.number().nullable(),
  edge: z.number(),
  win_odds: z.number(),
  won_flag: z.union([z.literal(0), z.literal(1)]),
  track: z.string().nullable(),
  state_code: z.string().nullable(),
  distance: z.number().nullable(),
  racing_type: z.string().nullable(),
  race_type: z.string().nullable(),
  context_hash: z.string(),
  experience_id: z.string(),
});

export type ExperienceRecord = z.infer<typeof ExperienceRecordSchema>;

export type ExperienceColumnType = 'VARCHAR' | 'DOUBLE' | 'INTEGER';

export interface ExperienceColumn {
  name: keyof ExperienceRecord;
  type: ExperienceColumnType;
}

/**
 * Column order and storage types of an experience table
 */
export const EXPERIENCE_COLUMNS: readonly ExperienceColumn[] = [
  { name: 'event_date', type: 'VARCHAR' },
  { name: 'race_id', type: 'VARCHAR' },
  { name: 'runner_id', type: 'VARCHAR' },
  { name: 'selection_id', type: 'VARCHAR' },
  { name: 'strategy_id', type: 'VARCHAR' },
  { name: 'params', type: 'VARCHAR' },
  { name: 'action', type: 'VARCHAR' },
  { name: 'stake', type: 'DOUBLE' },
  { name: 'profit', type: 'DOUBLE' },
  { name: 'model_prob', type: 'DOUBLE' },
  { name: 'implied_prob', type: 'DOUBLE' },
  { name: 'edge', type: 'DOUBLE' },
  { name: 'win_odds', type: 'DOUBLE' },
  { name: 'won_flag', type: 'INTEGER' },
  { name: 'track', type: 'VARCHAR' },
  { name: 'state_code', type: 'VARCHAR' },
  { name: 'distance', type: 'DOUBLE' },
  { name: 'racing_type', type: 'VARCHAR' },
  { name: 'race_type', type: 'VARCHAR' },
  { name: 'context_hash', type: 'VARCHAR' },
  { name: 'experience_id', type: 'VARCHAR' },
];
