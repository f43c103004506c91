/**
 * Strategy Grid
 *
 * Expands parameter axes into the Cartesian product of strategy configs.
 * Definitions arrive as JSON-like mappings and are validated before expansion.
 */

import { z } from 'zod';
import type { FilterValue } from '@racelab/core';
import { ConfigurationError } from '@racelab/utils';
import { createStrategyConfig, type StrategyConfig } from './strategy-config.js';
import { equalsFilter, filtersFromRecord } from './filters.js';

const FilterValueSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Declarative strategy definition, e.g.
 *
 *   { "margins": [1.02, 1.05], "top_ns": [1, 2], "filters": { "state_code": ["VIC", "NSW"] } }
 */
export const StrategyDefinitionSchema = z.object({
  margins: z.array(z.number().min(1)).nonempty().default([1.05]),
  top_ns: z.array(z.number().int().positive()).nonempty().default([1]),
  stakes: z.array(z.number().positive()).nonempty().default([1.0]),
  min_model_probs: z.array(z.number().min(0).max(1).nullable()).nonempty().default([null]),
  max_win_odds: z.array(z.number().positive().nullable()).nonempty().default([null]),
  filters: z.record(z.union([FilterValueSchema, z.array(FilterValueSchema).nonempty()])).default({}),
});

export type StrategyDefinition = z.input<typeof StrategyDefinitionSchema>;

export interface GridAxes {
  margins: readonly number[];
  topNs: readonly number[];
  stakes?: readonly number[];
  minModelProbs?: readonly (number | null)[];
  maxWinOdds?: readonly (number | null)[];
  baseFilters?: Readonly<Record<string, FilterValue | readonly FilterValue[]>>;
}

/**
 * Margins and per-race caps used when no definition file is supplied
 */
export const DEFAULT_GRID_AXES: GridAxes = {
  margins: [1.02, 1.05, 1.08],
  topNs: [1, 2],
};

type FilterChoice = readonly [column: string, value: FilterValue];

function product<T>(axes: readonly (readonly T[])[]): T[][] {
  return axes.reduce<T[][]>(
    (combos, axis) => combos.flatMap((combo) => axis.map((value) => [...combo, value])),
    [[]]
  );
}

function formatStrategyId(
  margin: number,
  topN: number,
  stake: number,
  minModelProb: number | null,
  maxWinOdds: number | null
): string {
  return (
    `margin_${margin.toFixed(2)}_top${topN}_stake${stake.toFixed(2)}` +
    (minModelProb !== null ? `_minprob${minModelProb.toFixed(2)}` : '') +
    (maxWinOdds !== null ? `_maxodds${maxWinOdds.toFixed(2)}` : '')
  );
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export class StrategyGrid {
  /**
   * Cartesian product over margin, topN, stake, minModelProb and maxWinOdds, in that order
   */
  static build(axes: GridAxes): StrategyConfig[] {
    const stakes = axes.stakes ?? [1.0];
    const minModelProbs = axes.minModelProbs ?? [null];
    const maxWinOdds = axes.maxWinOdds ?? [null];
    const filters = filtersFromRecord(axes.baseFilters ?? {});

    const configs: StrategyConfig[] = [];
    for (const margin of axes.margins) {
      for (const topN of axes.topNs) {
        for (const stake of stakes) {
          for (const minModelProb of minModelProbs) {
            for (const maxOdds of maxWinOdds) {
              configs.push(
                createStrategyConfig({
                  strategyId: formatStrategyId(margin, topN, stake, minModelProb, maxOdds),
                  margin,
                  topN,
                  stake,
                  minModelProb,
                  maxWinOdds: maxOdds,
                  filters,
                })
              );
            }
          }
        }
      }
    }
    return configs;
  }

  /**
   * Expand one definition. List-valued filters yield one config per value
   * combination, each carrying an `_{column}{value}` suffix per filter.
   */
  static fromDefinition(definition: unknown): StrategyConfig[] {
    const parsed = StrategyDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid strategy definition: ${describeIssues(parsed.error)}`,
        'strategyDefinition'
      );
    }
    const def = parsed.data;

    const configs = StrategyGrid.build({
      margins: def.margins,
      topNs: def.top_ns,
      stakes: def.stakes,
      minModelProbs: def.min_model_probs,
      maxWinOdds: def.max_win_odds,
    });

    const filterEntries = Object.entries(def.filters);
    if (filterEntries.length === 0) {
      return configs;
    }

    const combos = product(
      filterEntries.map(([column, value]) =>
        (Array.isArray(value) ? value : [value]).map((item): FilterChoice => [column, item])
      )
    );

    return configs.flatMap((config) =>
      combos.map((combo) => {
        const suffix = combo.map(([column, value]) => `_${column}${String(value)}`).join('');
        return createStrategyConfig({
          ...config,
          strategyId: `${config.strategyId}${suffix}`,
          filters: combo.map(([column, value]) => equalsFilter(column, value)),
        });
      })
    );
  }

  /**
   * Union of several definitions. Strategy ids must stay unique across the union.
   */
  static fromDefinitions(definitions: readonly unknown[]): StrategyConfig[] {
    const configs = definitions.flatMap((definition) => StrategyGrid.fromDefinition(definition));
    const seen = new Set<string>();
    for (const config of configs) {
      if (seen.has(config.strategyId)) {
        throw new ConfigurationError(
          `Duplicate strategy id '${config.strategyId}' across definitions`,
          'strategyDefinition',
          { strategyId: config.strategyId }
        );
      }
      seen.add(config.strategyId);
    }
    return configs;
  }

  static defaults(): StrategyConfig[] {
    return StrategyGrid.build(DEFAULT_GRID_AXES);
  }
}
