/**
 * Playbook snapshot and rolling history, as persisted and as read by the
 * serving component.
 */

import { z } from 'zod';

const FilterValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const StrategyParamsSchema = z.object({
  strategy_id: z.string(),
  margin: z.number(),
  top_n: z.number(),
  stake: z.number(),
  min_model_prob: z.number().nullable(),
  max_win_odds: z.number().nullable(),
  filters: z.record(z.union([FilterValueSchema, z.array(FilterValueSchema)])),
  version: z.string(),
});

export const PlaybookMetadataSchema = z.object({
  generated_at: z.string(),
  experience_rows: z.number(),
  strategies_evaluated: z.number(),
  logic_version: z.string(),
  significance_alpha: z.number(),
  significance_threshold: z.number(),
});

export const GlobalStatsSchema = z.object({
  total_bets: z.number(),
  total_profit: z.number(),
  total_staked: z.number(),
  pot_pct: z.number(),
  hit_rate: z.number().nullable(),
});

export const StrategyStatSchema = z.object({
  strategy_id: z.string(),
  bets: z.number(),
  wins: z.number(),
  hit_rate: z.number(),
  mean_edge: z.number(),
  total_staked: z.number(),
  total_profit: z.number(),
  pot_pct: z.number(),
  roi_pct: z.number().nullable(),
  p_value: z.number().nullable(),
  hit_rate_ci_low: z.number().nullable(),
  hit_rate_ci_high: z.number().nullable(),
  significant: z.boolean(),
  params: StrategyParamsSchema,
});

export const TrackInsightSchema = z.object({
  track: z.string(),
  bets: z.number(),
  profit: z.number(),
  pot_pct: z.number(),
  hit_rate: z.number(),
});

export const ContextInsightSchema = z.object({
  track: z.string().optional(),
  distance_band: z.string().optional(),
  racing_type: z.string().optional(),
  race_type: z.string().optional(),
  bets: z.number(),
  profit: z.number(),
  pot_pct: z.number(),
});

export const PlaybookSnapshotSchema = z.object({
  metadata: PlaybookMetadataSchema,
  global: GlobalStatsSchema,
  strategies: z.array(StrategyStatSchema),
  tracks: z.array(TrackInsightSchema),
  contexts: z.array(ContextInsightSchema),
});

export const PlaybookHistorySchema = z.object({
  history: z.array(PlaybookSnapshotSchema),
  latest: PlaybookSnapshotSchema,
});

export type PlaybookMetadata = z.infer<typeof PlaybookMetadataSchema>;
export type GlobalStats = z.infer<typeof GlobalStatsSchema>;
export type StrategyStat = z.infer<typeof StrategyStatSchema>;
export type TrackInsight = z.infer<typeof TrackInsightSchema>;
export type ContextInsight = z.infer<typeof ContextInsightSchema>;
export type PlaybookSnapshot = z.infer<typeof PlaybookSnapshotSchema>;
export type PlaybookHistory = z.infer<typeof PlaybookHistorySchema>;
