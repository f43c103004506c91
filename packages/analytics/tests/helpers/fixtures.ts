import type { ExperienceRecord, StrategyMetrics } from '@racelab/core';

let sequence = 0;

export function experience(overrides: Partial<ExperienceRecord> = {}): ExperienceRecord {
  sequence += 1;
  return {
    event_date: '2024-03-02',
    race_id: `R${sequence}`,
    runner_id: `R${sequence}_1`,
    selection_id: '1',
    strategy_id: 'margin_1.05_top1_stake1.00',
    params: '{}',
    action: 'bet',
    stake: 1,
    profit: -1,
    model_prob: 0.3,
    implied_prob: 0.2,
    edge: 1.5,
    win_odds: 5,
    won_flag: 0,
    track: 'Flemington',
    state_code: 'VIC',
    distance: null,
    racing_type: null,
    race_type: null,
    context_hash: '0000000000000000',
    experience_id: `exp-${sequence}`,
    ...overrides,
  };
}

export function metrics(overrides: Partial<StrategyMetrics> = {}): StrategyMetrics {
  const strategyId = overrides.strategy_id ?? 'margin_1.05_top1_stake1.00';
  return {
    strategy_id: strategyId,
    bets: 10,
    wins: 5,
    hit_rate: 0.5,
    mean_edge: 1,
    total_staked: 10,
    total_profit: 0,
    pot_pct: 0,
    params: {
      strategy_id: strategyId,
      margin: 1.05,
      top_n: 1,
      stake: 1,
      min_model_prob: null,
      max_win_odds: null,
      filters: {},
      version: '2.0.0',
    },
    ...overrides,
  };
}
