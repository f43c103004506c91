/**
 * Simulator
 *
 * Evaluates one strategy against a scored runner table: computes each
 * runner's edge, applies the strategy's filters, keeps the best positive-edge
 * runners per race and settles them at flat stakes.
 *
 * Edge is `win_odds - (1 / model_prob) / margin`: positive when the market
 * price beats the margin-adjusted fair price.
 */

import {
  DEFAULT_WIN_RESULT_COLUMN,
  IMPLIED_PROB_COLUMN,
  MODEL_PROB_COLUMN,
  RACE_ID_COLUMNS,
  WIN_ODDS_COLUMN,
  hasColumn,
  numberCell,
  stringCell,
  type CellValue,
  type RunnerRow,
  type RunnerTable,
  type StrategyMetrics,
  type TrackBreakdown,
} from '@racelab/core';
import { ConfigurationError, createLogger, type Logger } from '@racelab/utils';
import { matchesFilter } from '../strategy/filters.js';
import { toParams, type StrategyConfig } from '../strategy/strategy-config.js';

const IMPLIED_PROB_EPSILON = 1e-9;
const WINNER = 'WINNER';

export interface SimulatorOptions {
  /** Finish-result column; a runner won when its value upper-cased is WINNER */
  winResultColumn?: string;
  /** Preferred race identifier column; `win_market_id` is the fallback */
  raceIdColumn?: string;
  logger?: Logger;
}

/**
 * A settled bet: the source runner row plus the values the simulator derived for it
 */
export interface SimulatedBet {
  readonly row: RunnerRow;
  readonly raceId: string;
  readonly modelProb: number;
  readonly winOdds: number;
  readonly impliedProb: number | null;
  readonly edge: number;
  readonly stake: number;
  readonly profit: number;
  readonly wonFlag: 0 | 1;
}

export interface SimulationResult {
  readonly strategy: StrategyConfig;
  readonly bets: readonly SimulatedBet[];
  readonly metrics: StrategyMetrics;
  readonly byTrack: readonly TrackBreakdown[] | null;
}

interface Candidate {
  row: RunnerRow;
  raceKey: CellValue;
  modelProb: number;
  winOdds: number;
  impliedProb: number | null;
  edge: number;
}

function compareRaceKeys(a: CellValue, b: CellValue): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

export class Simulator {
  readonly winResultColumn: string;
  readonly raceIdColumn: string;
  private readonly logger: Logger;

  constructor(options: SimulatorOptions = {}) {
    this.winResultColumn = options.winResultColumn ?? DEFAULT_WIN_RESULT_COLUMN;
    this.raceIdColumn = options.raceIdColumn ?? RACE_ID_COLUMNS[0];
    this.logger = options.logger ?? createLogger('@racelab/backtest');
  }

  evaluate(table: RunnerTable, strategy: StrategyConfig): SimulationResult {
    if (table.rows.length === 0) {
      return this.emptyResult(strategy);
    }

    const required = [MODEL_PROB_COLUMN, WIN_ODDS_COLUMN, this.winResultColumn];
    const missing = required.filter((column) => !hasColumn(table, column)).sort();
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Missing required columns in runner table: ${missing.join(', ')}`,
        'runnerTable',
        { missing }
      );
    }

    const raceColumn = this.resolveRaceColumn(table);
    const candidates = this.scoreRunners(table, raceColumn, strategy);

    this.logSkippedFilters(table, strategy);
    const filtered = candidates.filter((candidate) =>
      this.passesFilters(table, candidate, strategy)
    );
    const selected = this.selectPerRace(filtered, strategy.topN);

    if (selected.length === 0) {
      this.logger.debug('No qualifying bets', { strategyId: strategy.strategyId });
      return this.emptyResult(strategy);
    }

    const bets = selected.map((candidate) => this.settle(candidate, strategy));
    const profits = bets.map((bet) => bet.profit);
    const wins = sum(bets.map((bet) => bet.wonFlag));

    const metrics: StrategyMetrics = {
      strategy_id: strategy.strategyId,
      bets: bets.length,
      wins,
      hit_rate: wins / bets.length,
      mean_edge: mean(bets.map((bet) => bet.edge)),
      total_staked: strategy.stake * bets.length,
      total_profit: sum(profits),
      pot_pct: mean(profits) * 100,
      params: toParams(strategy),
    };

    this.logger.debug('Strategy evaluated', {
      strategyId: strategy.strategyId,
      raceColumn,
      bets: metrics.bets,
      wins: metrics.wins,
    });

    return {
      strategy,
      bets,
      metrics,
      byTrack: hasColumn(table, 'track') ? this.breakdownByTrack(bets) : null,
    };
  }

  /**
   * Parse probability and odds, derive implied probability and edge, and drop
   * rows that cannot be priced.
   */
  private scoreRunners(
    table: RunnerTable,
    raceColumn: string,
    strategy: StrategyConfig
  ): Candidate[] {
    const hasImplied = hasColumn(table, IMPLIED_PROB_COLUMN);

    let sawOdds = false;
    let sawProb = false;
    const candidates: Candidate[] = [];
    let dropped = 0;

    for (const row of table.rows) {
      const modelProb = numberCell(row, MODEL_PROB_COLUMN);
      const winOdds = numberCell(row, WIN_ODDS_COLUMN);
      if (modelProb !== null) sawProb = true;
      if (winOdds !== null) sawOdds = true;
      if (modelProb === null || winOdds === null) {
        dropped += 1;
        continue;
      }

      const impliedProb = hasImplied
        ? numberCell(row, IMPLIED_PROB_COLUMN)
        : winOdds > 0
          ? 1 / (winOdds + IMPLIED_PROB_EPSILON)
          : null;
      const fairOdds = 1 / modelProb;

      candidates.push({
        row,
        raceKey: row[raceColumn] ?? null,
        modelProb,
        winOdds,
        impliedProb,
        edge: winOdds - fairOdds / strategy.margin,
      });
    }

    if (!sawOdds) {
      throw new ConfigurationError(
        'All win_odds values are null; cannot compute edge',
        WIN_ODDS_COLUMN
      );
    }
    if (!sawProb) {
      throw new ConfigurationError(
        'All model_prob values are null; cannot evaluate strategy',
        MODEL_PROB_COLUMN
      );
    }
    if (dropped > 0) {
      this.logger.debug('Dropped runners with null model_prob or win_odds', {
        strategyId: strategy.strategyId,
        dropped,
        remaining: candidates.length,
      });
    }
    return candidates;
  }

  private passesFilters(
    table: RunnerTable,
    candidate: Candidate,
    strategy: StrategyConfig
  ): boolean {
    if (strategy.minModelProb !== null && candidate.modelProb < strategy.minModelProb) {
      return false;
    }
    if (strategy.maxWinOdds !== null && candidate.winOdds > strategy.maxWinOdds) {
      return false;
    }
    return strategy.filters.every(
      (filter) =>
        !hasColumn(table, filter.column) ||
        matchesFilter(filter, candidate.row[filter.column] ?? null)
    );
  }

  private logSkippedFilters(table: RunnerTable, strategy: StrategyConfig): void {
    const skipped = strategy.filters
      .map((filter) => filter.column)
      .filter((column) => !hasColumn(table, column));
    if (skipped.length > 0) {
      this.logger.warn('Skipping filters on columns absent from runner table', {
        strategyId: strategy.strategyId,
        columns: skipped,
      });
    }
  }

  /**
   * Keep positive edges, rank each race by descending edge and cap at topN.
   * Rows without a race identifier are never bet.
   */
  private selectPerRace(candidates: readonly Candidate[], topN: number): Candidate[] {
    const ordered = candidates
      .filter((candidate) => candidate.edge > 0 && candidate.raceKey !== null)
      .sort((a, b) => compareRaceKeys(a.raceKey, b.raceKey) || b.edge - a.edge);

    const perRace = new Map<string, number>();
    const selected: Candidate[] = [];
    for (const candidate of ordered) {
      const key = String(candidate.raceKey);
      const count = perRace.get(key) ?? 0;
      if (count < topN) {
        perRace.set(key, count + 1);
        selected.push(candidate);
      }
    }
    return selected;
  }

  private settle(candidate: Candidate, strategy: StrategyConfig): SimulatedBet {
    const result = stringCell(candidate.row, this.winResultColumn);
    const wonFlag = result !== null && result.toUpperCase() === WINNER ? 1 : 0;
    const profit = wonFlag === 1 ? strategy.stake * (candidate.winOdds - 1) : -strategy.stake;
    return {
      row: candidate.row,
      raceId: String(candidate.raceKey),
      modelProb: candidate.modelProb,
      winOdds: candidate.winOdds,
      impliedProb: candidate.impliedProb,
      edge: candidate.edge,
      stake: strategy.stake,
      profit,
      wonFlag,
    };
  }

  private breakdownByTrack(bets: readonly SimulatedBet[]): TrackBreakdown[] {
    const groups = new Map<string, number[]>();
    for (const bet of bets) {
      const track = stringCell(bet.row, 'track');
      if (track === null) continue;
      const profits = groups.get(track) ?? [];
      profits.push(bet.profit);
      groups.set(track, profits);
    }
    return [...groups.entries()]
      .map(([track, profits]) => ({
        track,
        bets: profits.length,
        profit: sum(profits),
        pot_pct: mean(profits) * 100,
      }))
      .sort((a, b) => b.pot_pct - a.pot_pct);
  }

  private resolveRaceColumn(table: RunnerTable): string {
    if (hasColumn(table, this.raceIdColumn)) return this.raceIdColumn;
    const fallback = RACE_ID_COLUMNS.find((column) => hasColumn(table, column));
    if (fallback !== undefined) return fallback;
    throw new ConfigurationError(
      `No race identifier column found (expected '${this.raceIdColumn}' or 'win_market_id')`,
      'raceIdColumn'
    );
  }

  private emptyResult(strategy: StrategyConfig): SimulationResult {
    return {
      strategy,
      bets: [],
      metrics: {
        strategy_id: strategy.strategyId,
        bets: 0,
        wins: 0,
        hit_rate: 0,
        mean_edge: 0,
        total_staked: 0,
        total_profit: 0,
        pot_pct: 0,
        params: toParams(strategy),
      },
      byTrack: null,
    };
  }
}
