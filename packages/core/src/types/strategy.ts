/**
 * Strategy value types shared between the simulator, the experience log and the playbook
 */

export type FilterValue = string | number | boolean;

/**
 * Predicate over one context column
 */
export type FilterPredicate =
  | { readonly kind: 'equals'; readonly value: FilterValue }
  | { readonly kind: 'oneOf'; readonly values: readonly FilterValue[] };

export interface StrategyFilter {
  readonly column: string;
  readonly predicate: FilterPredicate;
}

/**
 * Serialized strategy parameters. Absent optionals are null, never zero.
 */
export type StrategyParams = {
  strategy_id: string;
  margin: number;
  top_n: number;
  stake: number;
  min_model_prob: number | null;
  max_win_odds: number | null;
  filters: Record<string, FilterValue | FilterValue[]>;
  version: string;
};

/**
 * Scalar summary of one strategy evaluation. Zero bets means zeros, not nulls.
 */
export interface StrategyMetrics {
  strategy_id: string;
  bets: number;
  wins: number;
  hit_rate: number;
  mean_edge: number;
  total_staked: number;
  total_profit: number;
  pot_pct: number;
  params: StrategyParams;
}

export interface TrackBreakdown {
  track: string;
  bets: number;
  profit: number;
  pot_pct: number;
}
