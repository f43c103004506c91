/**
 * Tests for ACEReflector
 */

import { describe, it, expect } from 'vitest';
import { createFixedClock } from '@racelab/core';
import { ConfigurationError } from '@racelab/utils';
import { ACEReflector } from '../../src/reflector/ace-reflector.js';
import { experience, metrics } from '../helpers/fixtures.js';

const clock = createFixedClock(Date.UTC(2024, 2, 2, 10, 15, 0));

function reflector(options: Partial<ConstructorParameters<typeof ACEReflector>[0]> = {}): ACEReflector {
  return new ACEReflector({ clock, minBets: 1, ...options });
}

describe('ACEReflector', () => {
  describe('options', () => {
    it('rejects alpha outside (0, 1)', () => {
      expect(() => reflector({ alpha: 1 })).toThrow(ConfigurationError);
    });

    it('rejects a negative minimum sample', () => {
      expect(() => reflector({ minBets: -1 })).toThrow(ConfigurationError);
    });

    it('rejects a non-positive context limit', () => {
      expect(() => reflector({ contextTopK: 0 })).toThrow(ConfigurationError);
    });
  });

  describe('metadata', () => {
    it('stamps the clock time and the corrected threshold', () => {
      const playbook = reflector().buildPlaybook(
        [experience()],
        [metrics({ strategy_id: 'a' }), metrics({ strategy_id: 'b' })]
      );

      expect(playbook.metadata.generated_at).toBe('2024-03-02T10:15:00Z');
      expect(playbook.metadata.experience_rows).toBe(1);
      expect(playbook.metadata.strategies_evaluated).toBe(2);
      expect(playbook.metadata.logic_version).toBe('2.0.0');
      expect(playbook.metadata.significance_alpha).toBe(0.05);
      expect(playbook.metadata.significance_threshold).toBeCloseTo(0.025, 12);
    });

    it('serializes under the playbook keys', () => {
      const snapshot = reflector().buildPlaybook(null, null).toSnapshot();

      expect(Object.keys(snapshot)).toEqual(['metadata', 'global', 'strategies', 'tracks', 'contexts']);
    });
  });

  describe('global stats', () => {
    it('totals the experiences when there are any', () => {
      const records = [
        experience({ profit: 4, won_flag: 1 }),
        experience({ profit: -1 }),
        experience({ profit: -1 }),
      ];

      const global = reflector().buildPlaybook(records, [metrics()]).globalStats;

      expect(global.total_bets).toBe(3);
      expect(global.total_profit).toBe(2);
      expect(global.total_staked).toBe(3);
      expect(global.pot_pct).toBeCloseTo(66.6667, 3);
      expect(global.hit_rate).toBeCloseTo(1 / 3, 12);
    });

    it('falls back to the strategy metrics without experiences', () => {
      const global = reflector().buildPlaybook(null, [
        metrics({ strategy_id: 'a', bets: 10, wins: 5, hit_rate: 0.5, total_staked: 10, total_profit: 2, pot_pct: 20 }),
        metrics({ strategy_id: 'b', bets: 0, wins: 0, hit_rate: 0, total_staked: 0, total_profit: 0, pot_pct: 0 }),
      ]).globalStats;

      expect(global).toEqual({
        total_bets: 10,
        total_profit: 2,
        total_staked: 10,
        pot_pct: 10,
        hit_rate: 0.25,
      });
    });

    it('is zero with a null hit rate when nothing was evaluated', () => {
      expect(reflector().buildPlaybook([], []).globalStats).toEqual({
        total_bets: 0,
        total_profit: 0,
        total_staked: 0,
        pot_pct: 0,
        hit_rate: null,
      });
    });
  });

  describe('strategy stats', () => {
    it('ranks by ROI with undefined ROI last', () => {
      const stats = reflector().buildPlaybook(null, [
        metrics({ strategy_id: 'idle', bets: 0, wins: 0, hit_rate: 0, total_staked: 0, total_profit: 0 }),
        metrics({ strategy_id: 'loser', total_staked: 10, total_profit: -3 }),
        metrics({ strategy_id: 'winner', total_staked: 10, total_profit: 4 }),
      ]).strategyStats;

      expect(stats.map((stat) => stat.strategy_id)).toEqual(['winner', 'loser', 'idle']);
      expect(stats[0].roi_pct).toBeCloseTo(40, 12);
      expect(stats[1].roi_pct).toBeCloseTo(-30, 12);
      expect(stats[2]).toMatchObject({
        roi_pct: null,
        p_value: null,
        hit_rate_ci_low: null,
        hit_rate_ci_high: null,
        significant: false,
      });
    });

    it('reports a strategy with no winners as negative ROI and not significant', () => {
      const [stat] = reflector().buildPlaybook(null, [
        metrics({ bets: 5, wins: 0, hit_rate: 0, total_staked: 5, total_profit: -5 }),
      ]).strategyStats;

      expect(stat.roi_pct).toBe(-100);
      expect(stat.p_value).toBe(1);
      expect(stat.hit_rate_ci_low).toBe(0);
      expect(stat.significant).toBe(false);
    });

    it('loses significance under the Bonferroni correction', () => {
      const strong = metrics({ strategy_id: 'strong', bets: 10, wins: 9, hit_rate: 0.9, total_profit: 5 });
      const others = Array.from({ length: 9 }, (_, i) => metrics({ strategy_id: `other_${i}` }));
      const all = [strong, ...others];

      const uncorrected = reflector({ bonferroni: false }).buildPlaybook(null, all);
      const corrected = reflector().buildPlaybook(null, all);

      const pick = (stats: typeof corrected.strategyStats) =>
        stats.find((stat) => stat.strategy_id === 'strong');
      expect(pick(uncorrected.strategyStats)?.p_value).toBeCloseTo(11 / 1024, 12);
      expect(pick(uncorrected.strategyStats)?.significant).toBe(true);
      expect(corrected.metadata.significance_threshold).toBeCloseTo(0.005, 12);
      expect(pick(corrected.strategyStats)?.significant).toBe(false);
    });

    it('tests against the configured null hit rate', () => {
      const [stat] = reflector({ nullHitRate: 0.2 }).buildPlaybook(null, [
        metrics({ bets: 1, wins: 1, hit_rate: 1, total_staked: 1, total_profit: 3 }),
      ]).strategyStats;

      expect(stat.p_value).toBeCloseTo(0.2, 12);
    });

    it('tests strategies with several hundred thousand bets', () => {
      const [stat] = reflector().buildPlaybook(null, [
        metrics({ bets: 300000, wins: 60000, hit_rate: 0.2, total_staked: 300000, total_profit: -30000 }),
      ]).strategyStats;

      expect(stat.p_value).toBeCloseTo(1, 6);
      expect(stat.significant).toBe(false);
    });

    it('keeps the strategy parameters', () => {
      const [stat] = reflector().buildPlaybook(null, [metrics({ strategy_id: 'x' })]).strategyStats;

      expect(stat.params.strategy_id).toBe('x');
      expect(stat.params.margin).toBe(1.05);
    });
  });

  describe('track insights', () => {
    it('reports tracks meeting the minimum sample, best first', () => {
      const records = [
        experience({ track: 'Flemington', profit: 4, won_flag: 1 }),
        experience({ track: 'Flemington', profit: -1 }),
        experience({ track: 'Flemington', profit: -1 }),
        experience({ track: 'Randwick', profit: -1 }),
        experience({ track: 'Randwick', profit: -1 }),
        experience({ track: 'Eagle Farm', profit: 9, won_flag: 1 }),
        experience({ track: null, profit: 9, won_flag: 1 }),
      ];

      const tracks = reflector({ minBets: 2 }).trackInsights(records);

      expect(tracks.map((insight) => insight.track)).toEqual(['Flemington', 'Randwick']);
      expect(tracks[0].bets).toBe(3);
      expect(tracks[0].profit).toBe(2);
      expect(tracks[0].pot_pct).toBeCloseTo(66.6667, 3);
      expect(tracks[0].hit_rate).toBeCloseTo(1 / 3, 12);
      expect(tracks[1]).toEqual({ track: 'Randwick', bets: 2, profit: -2, pot_pct: -100, hit_rate: 0 });
    });
  });

  describe('context insights', () => {
    it('groups by the keys that carry values and skips rows missing one', () => {
      const records = [
        experience({ distance: 1200, profit: 4, won_flag: 1 }),
        experience({ distance: 1600, profit: -1 }),
        experience({ distance: 0, profit: 7, won_flag: 1 }),
      ];

      const contexts = reflector().contextInsights(records);

      expect(contexts).toEqual([
        { track: 'Flemington', distance_band: '<=1200', bets: 1, profit: 4, pot_pct: 400 },
        { track: 'Flemington', distance_band: '1201-1600', bets: 1, profit: -1, pot_pct: -100 },
      ]);
    });

    it('uses the unknown band when no record has a distance', () => {
      const contexts = reflector().contextInsights([
        experience({ racing_type: 'Thoroughbred', profit: -1 }),
        experience({ racing_type: 'Thoroughbred', profit: 3, won_flag: 1 }),
      ]);

      expect(contexts).toEqual([
        {
          track: 'Flemington',
          distance_band: 'unknown',
          racing_type: 'Thoroughbred',
          bets: 2,
          profit: 2,
          pot_pct: 100,
        },
      ]);
    });

    it('keeps only the top contexts', () => {
      const contexts = reflector({ contextTopK: 1 }).contextInsights([
        experience({ track: 'Flemington', profit: -1 }),
        experience({ track: 'Randwick', profit: 2, won_flag: 1 }),
      ]);

      expect(contexts).toHaveLength(1);
      expect(contexts[0].track).toBe('Randwick');
    });

    it('drops contexts under the minimum sample', () => {
      const contexts = reflector({ minBets: 2 }).contextInsights([
        experience({ track: 'Flemington' }),
        experience({ track: 'Randwick' }),
        experience({ track: 'Randwick' }),
      ]);

      expect(contexts.map((context) => context.track)).toEqual(['Randwick']);
    });

    it('is empty without experiences', () => {
      expect(reflector().contextInsights([])).toEqual([]);
    });
  });
});
