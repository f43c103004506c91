/**
 * Strategy configuration
 *
 * Immutable description of one betting strategy. Instances are frozen on
 * creation; absent optional constraints are null, never zero.
 */

import { EVALUATION_LOGIC_VERSION, type StrategyFilter, type StrategyParams } from '@racelab/core';
import { ConfigurationError } from '@racelab/utils';
import { filtersToRecord } from './filters.js';

export interface StrategyConfig {
  readonly strategyId: string;
  /** Safety margin applied to fair odds (>= 1.0) */
  readonly margin: number;
  /** Maximum bets per race */
  readonly topN: number;
  /** Flat stake per bet */
  readonly stake: number;
  readonly minModelProb: number | null;
  readonly maxWinOdds: number | null;
  readonly filters: readonly StrategyFilter[];
  readonly version: string;
}

export interface StrategyConfigInput {
  strategyId: string;
  margin?: number;
  topN?: number;
  stake?: number;
  minModelProb?: number | null;
  maxWinOdds?: number | null;
  filters?: readonly StrategyFilter[];
  version?: string;
}

function invalidParameter(strategyId: string, key: string, detail: string): ConfigurationError {
  return new ConfigurationError(`Strategy ${strategyId}: ${detail}`, key, { strategyId });
}

export function createStrategyConfig(input: StrategyConfigInput): StrategyConfig {
  const {
    strategyId,
    margin = 1.05,
    topN = 1,
    stake = 1.0,
    minModelProb = null,
    maxWinOdds = null,
    filters = [],
    version = EVALUATION_LOGIC_VERSION,
  } = input;

  if (strategyId.trim() === '') {
    throw new ConfigurationError('Strategy id must not be empty', 'strategyId');
  }
  if (!Number.isFinite(margin) || margin < 1) {
    throw invalidParameter(strategyId, 'margin', `margin must be >= 1.0, got ${margin}`);
  }
  if (!Number.isInteger(topN) || topN < 1) {
    throw invalidParameter(strategyId, 'topN', `topN must be a positive integer, got ${topN}`);
  }
  if (!Number.isFinite(stake) || stake <= 0) {
    throw invalidParameter(strategyId, 'stake', `stake must be > 0, got ${stake}`);
  }

  return Object.freeze({
    strategyId,
    margin,
    topN,
    stake,
    minModelProb,
    maxWinOdds,
    filters: Object.freeze([...filters]),
    version,
  });
}

/**
 * Serializable parameter record, as stored with every experience
 */
export function toParams(config: StrategyConfig): StrategyParams {
  return {
    strategy_id: config.strategyId,
    margin: config.margin,
    top_n: config.topN,
    stake: config.stake,
    min_model_prob: config.minModelProb,
    max_win_odds: config.maxWinOdds,
    filters: filtersToRecord(config.filters),
    version: config.version,
  };
}
