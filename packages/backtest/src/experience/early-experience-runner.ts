/**
 * Early Experience Runner
 *
 * Evaluates a batch of strategies against one runner table, records every
 * accepted bet as an experience and persists the table once per run.
 *
 * Results are ordered by strategy id before aggregation, so the output does
 * not depend on the order strategies were supplied or evaluated in.
 */

import type {
  ExperienceFormat,
  ExperienceRecord,
  ExperienceSink,
  RunnerTable,
  StrategyMetrics,
} from '@racelab/core';
import { ConfigurationError, ValidationError, createLogger, type Logger } from '@racelab/utils';
import type { SimulationResult, Simulator } from '../sim/simulator.js';
import type { StrategyConfig } from '../strategy/strategy-config.js';
import { ExperienceBuilder } from './experience-builder.js';

export interface EarlyExperienceRunnerOptions {
  simulator: Simulator;
  writer: ExperienceSink;
  /** Context columns fingerprinted into `context_hash` */
  contextFields?: readonly string[];
  logger?: Logger;
}

export interface EarlyExperienceRunOptions {
  /** File name prefix for the written experience table */
  label?: string;
}

export interface EarlyExperienceOutput {
  /** Null when no strategy produced a bet */
  experiencePath: string | null;
  format: ExperienceFormat | null;
  /** One entry per strategy, including strategies with zero bets */
  strategyMetrics: StrategyMetrics[];
  experiences: ExperienceRecord[];
  results: SimulationResult[];
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class EarlyExperienceRunner {
  private readonly simulator: Simulator;
  private readonly writer: ExperienceSink;
  private readonly builder: ExperienceBuilder;
  private readonly logger: Logger;

  constructor(options: EarlyExperienceRunnerOptions) {
    this.simulator = options.simulator;
    this.writer = options.writer;
    this.builder = new ExperienceBuilder({ contextFields: options.contextFields });
    this.logger = options.logger ?? createLogger('@racelab/backtest');
  }

  async run(
    table: RunnerTable,
    strategies: readonly StrategyConfig[],
    options: EarlyExperienceRunOptions = {}
  ): Promise<EarlyExperienceOutput> {
    if (strategies.length === 0) {
      throw new ConfigurationError('No strategies provided to EarlyExperienceRunner', 'strategies');
    }
    assertUniqueStrategyIds(strategies);

    const results = strategies
      .map((strategy) => this.simulator.evaluate(table, strategy))
      .sort((a, b) => compareIds(a.strategy.strategyId, b.strategy.strategyId));

    const experiences = results.flatMap((result) => this.builder.build(table, result));
    assertUniqueExperienceIds(experiences);

    this.logger.info('Strategies evaluated', {
      label: options.label,
      strategies: results.length,
      runners: table.rows.length,
      experiences: experiences.length,
    });

    let experiencePath: string | null = null;
    let format: ExperienceFormat | null = null;
    if (experiences.length > 0) {
      const written = await this.writer.write(experiences, options.label);
      experiencePath = written.path;
      format = written.format;
    }

    return {
      experiencePath,
      format,
      strategyMetrics: results.map((result) => result.metrics),
      experiences,
      results,
    };
  }
}

function assertUniqueStrategyIds(strategies: readonly StrategyConfig[]): void {
  const seen = new Set<string>();
  for (const { strategyId } of strategies) {
    if (seen.has(strategyId)) {
      throw new ConfigurationError(`Duplicate strategy id '${strategyId}'`, 'strategies', {
        strategyId,
      });
    }
    seen.add(strategyId);
  }
}

function assertUniqueExperienceIds(experiences: readonly ExperienceRecord[]): void {
  const seen = new Set<string>();
  for (const record of experiences) {
    if (seen.has(record.experience_id)) {
      throw new ValidationError(`Duplicate experience_id '${record.experience_id}'`, {
        strategyId: record.strategy_id,
        raceId: record.race_id,
        runnerId: record.runner_id,
      });
    }
    seen.add(record.experience_id);
  }
}
