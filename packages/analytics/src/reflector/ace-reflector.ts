/**
 * ACE Reflector
 *
 * Turns one run's experiences and per-strategy metrics into a playbook:
 * global totals, ranked strategy statistics with significance testing, and
 * the tracks and racing contexts that cleared the minimum sample size.
 */

import { DateTime } from 'luxon';
import {
  EVALUATION_LOGIC_VERSION,
  type ClockPort,
  type ContextInsight,
  type ExperienceRecord,
  type GlobalStats,
  type StrategyMetrics,
  type StrategyStat,
  type TrackInsight,
} from '@racelab/core';
import { ConfigurationError, createLogger, type Logger } from '@racelab/utils';
import { binomialUpperTail } from '../stats/binomial.js';
import { bonferroniThreshold } from '../stats/bonferroni.js';
import { wilsonInterval } from '../stats/wilson.js';
import { UNKNOWN_DISTANCE_BAND, distanceBand } from '../distance-bands.js';
import { Playbook } from './playbook.js';

export interface ACEReflectorOptions {
  clock: ClockPort;
  /** Minimum bets for a track or context to be reported. Default: 30 */
  minBets?: number;
  /** Family-wise significance level. Default: 0.05 */
  alpha?: number;
  /** Divide alpha by the number of strategies evaluated. Default: true */
  bonferroni?: boolean;
  /** Hit rate under the null hypothesis. Default: 0.5 */
  nullHitRate?: number;
  /** Confidence level of the hit-rate interval. Default: 0.95 */
  confidence?: number;
  /** Number of context insights kept. Default: 20 */
  contextTopK?: number;
  logger?: Logger;
}

type ContextKey = 'track' | 'distance_band' | 'racing_type' | 'race_type';

const CONTEXT_KEYS: readonly ContextKey[] = ['track', 'distance_band', 'racing_type', 'race_type'];

interface ContextGroup {
  values: Partial<Record<ContextKey, string>>;
  profits: number[];
}

interface ProfitGroup {
  profits: number[];
  wins: number;
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

function inOpenUnitInterval(value: number): boolean {
  return value > 0 && value < 1;
}

/**
 * Descending by ROI; strategies without a defined ROI go last
 */
function compareRoi(a: StrategyStat, b: StrategyStat): number {
  if (a.roi_pct === null) return b.roi_pct === null ? 0 : 1;
  if (b.roi_pct === null) return -1;
  return b.roi_pct - a.roi_pct;
}

export class ACEReflector {
  readonly minBets: number;
  readonly alpha: number;
  readonly bonferroni: boolean;
  readonly nullHitRate: number;
  readonly confidence: number;
  readonly contextTopK: number;
  private readonly clock: ClockPort;
  private readonly logger: Logger;

  constructor(options: ACEReflectorOptions) {
    this.clock = options.clock;
    this.minBets = options.minBets ?? 30;
    this.alpha = options.alpha ?? 0.05;
    this.bonferroni = options.bonferroni ?? true;
    this.nullHitRate = options.nullHitRate ?? 0.5;
    this.confidence = options.confidence ?? 0.95;
    this.contextTopK = options.contextTopK ?? 20;
    this.logger = options.logger ?? createLogger('@racelab/analytics');

    if (!Number.isInteger(this.minBets) || this.minBets < 0) {
      throw new ConfigurationError(
        `minBets must be a non-negative integer, got ${this.minBets}`,
        'minBets'
      );
    }
    for (const [key, value] of [
      ['alpha', this.alpha],
      ['nullHitRate', this.nullHitRate],
      ['confidence', this.confidence],
    ] as const) {
      if (!inOpenUnitInterval(value)) {
        throw new ConfigurationError(`${key} must be in (0, 1), got ${value}`, key);
      }
    }
    if (!Number.isInteger(this.contextTopK) || this.contextTopK < 1) {
      throw new ConfigurationError(
        `contextTopK must be a positive integer, got ${this.contextTopK}`,
        'contextTopK'
      );
    }
  }

  buildPlaybook(
    experiences: readonly ExperienceRecord[] | null,
    strategyMetrics: readonly StrategyMetrics[] | null
  ): Playbook {
    const records = experiences ?? [];
    const metrics = strategyMetrics ?? [];
    const threshold = this.bonferroni
      ? bonferroniThreshold(this.alpha, metrics.length)
      : this.alpha;

    const playbook = new Playbook(
      {
        generated_at: DateTime.fromMillis(this.clock.nowMs(), { zone: 'utc' }).toFormat(
          "yyyy-MM-dd'T'HH:mm:ss'Z'"
        ),
        experience_rows: records.length,
        strategies_evaluated: metrics.length,
        logic_version: EVALUATION_LOGIC_VERSION,
        significance_alpha: this.alpha,
        significance_threshold: threshold,
      },
      this.globalStats(records, metrics),
      this.strategyStats(metrics, threshold),
      this.trackInsights(records),
      this.contextInsights(records)
    );

    this.logger.info('Playbook built', {
      experienceRows: records.length,
      strategies: metrics.length,
      significant: playbook.strategyStats.filter((stat) => stat.significant).length,
      tracks: playbook.trackInsights.length,
      contexts: playbook.contextInsights.length,
    });
    return playbook;
  }

  globalStats(
    records: readonly ExperienceRecord[],
    metrics: readonly StrategyMetrics[]
  ): GlobalStats {
    if (records.length > 0) {
      const profits = records.map((record) => record.profit);
      return {
        total_bets: records.length,
        total_profit: sum(profits),
        total_staked: sum(records.map((record) => record.stake)),
        pot_pct: mean(profits) * 100,
        hit_rate: mean(records.map((record) => record.won_flag)),
      };
    }
    if (metrics.length > 0) {
      return {
        total_bets: sum(metrics.map((m) => m.bets)),
        total_profit: sum(metrics.map((m) => m.total_profit)),
        total_staked: sum(metrics.map((m) => m.total_staked)),
        pot_pct: mean(metrics.map((m) => m.pot_pct)),
        hit_rate: mean(metrics.map((m) => m.hit_rate)),
      };
    }
    return { total_bets: 0, total_profit: 0, total_staked: 0, pot_pct: 0, hit_rate: null };
  }

  strategyStats(metrics: readonly StrategyMetrics[], threshold: number): StrategyStat[] {
    return metrics
      .map((m): StrategyStat => {
        const pValue = m.bets > 0 ? binomialUpperTail(m.wins, m.bets, this.nullHitRate) : null;
        const interval = wilsonInterval(m.wins, m.bets, this.confidence);
        return {
          strategy_id: m.strategy_id,
          bets: m.bets,
          wins: m.wins,
          hit_rate: m.hit_rate,
          mean_edge: m.mean_edge,
          total_staked: m.total_staked,
          total_profit: m.total_profit,
          pot_pct: m.pot_pct,
          roi_pct: m.total_staked > 0 ? (m.total_profit / m.total_staked) * 100 : null,
          p_value: pValue,
          hit_rate_ci_low: interval ? interval[0] : null,
          hit_rate_ci_high: interval ? interval[1] : null,
          significant: pValue !== null && pValue < threshold,
          params: m.params,
        };
      })
      .sort(compareRoi);
  }

  trackInsights(records: readonly ExperienceRecord[]): TrackInsight[] {
    const groups = new Map<string, ProfitGroup>();
    for (const record of records) {
      if (record.track === null) continue;
      const group = groups.get(record.track) ?? { profits: [], wins: 0 };
      group.profits.push(record.profit);
      group.wins += record.won_flag;
      groups.set(record.track, group);
    }

    return [...groups.entries()]
      .filter(([, group]) => group.profits.length >= this.minBets)
      .map(([track, group]) => ({
        track,
        bets: group.profits.length,
        profit: sum(group.profits),
        pot_pct: mean(group.profits) * 100,
        hit_rate: group.wins / group.profits.length,
      }))
      .sort((a, b) => b.pot_pct - a.pot_pct);
  }

  contextInsights(records: readonly ExperienceRecord[]): ContextInsight[] {
    if (records.length === 0) return [];

    const hasDistance = records.some((record) => record.distance !== null);
    const keyed = records.map((record) => {
      const values: Record<ContextKey, string | null> = {
        track: record.track,
        distance_band: hasDistance ? distanceBand(record.distance) : UNKNOWN_DISTANCE_BAND,
        racing_type: record.racing_type,
        race_type: record.race_type,
      };
      return { record, values };
    });

    // Group only by keys that carry a value somewhere; rows missing one of them are left out
    const groupKeys = CONTEXT_KEYS.filter((key) =>
      keyed.some(({ values }) => values[key] !== null)
    );

    const groups = new Map<string, ContextGroup>();
    for (const { record, values } of keyed) {
      const picked: Partial<Record<ContextKey, string>> = {};
      let complete = true;
      for (const key of groupKeys) {
        const value = values[key];
        if (value === null) {
          complete = false;
          break;
        }
        picked[key] = value;
      }
      if (!complete) continue;

      const id = JSON.stringify(groupKeys.map((key) => picked[key]));
      const group = groups.get(id) ?? { values: picked, profits: [] };
      group.profits.push(record.profit);
      groups.set(id, group);
    }

    return [...groups.values()]
      .filter((group) => group.profits.length >= this.minBets)
      .map((group) => ({
        ...group.values,
        bets: group.profits.length,
        profit: sum(group.profits),
        pot_pct: mean(group.profits) * 100,
      }))
      .sort((a, b) => b.pot_pct - a.pot_pct)
      .slice(0, this.contextTopK);
  }
}
