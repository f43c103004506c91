/**
 * Create ACE Run Context
 *
 * Wires the simulator, experience runner, writer, reflector and curator for
 * one run. The context is created once per run and ended with dispose().
 */

import { DateTime } from 'luxon';
import { createSystemClock, type ClockPort, type ExperienceFormat } from '@racelab/core';
import { ACEReflector } from '@racelab/analytics';
import { EarlyExperienceRunner, Simulator } from '@racelab/backtest';
import {
  CsvGzipTableWriter,
  ExperienceWriter,
  PlaybookCurator,
  formatRunTimestamp,
} from '@racelab/storage';
import { createLogger, type AceConfig, type Logger } from '@racelab/utils';

export interface RunContextConfig extends AceConfig {
  /** Primary experience format. Default: parquet, with csv.gz as fallback */
  experienceFormat?: ExperienceFormat;
  /** Finish-result column of the runner table. Default: win_result */
  winResultColumn?: string;
  /** Preferred race identifier column. Default: race_id */
  raceIdColumn?: string;
  clock?: ClockPort;
  logger?: Logger;
}

export interface RunContext {
  readonly runId: string;
  readonly config: RunContextConfig;
  readonly clock: ClockPort;
  readonly logger: Logger;
  readonly simulator: Simulator;
  readonly writer: ExperienceWriter;
  readonly runner: EarlyExperienceRunner;
  readonly reflector: ACEReflector;
  readonly curator: PlaybookCurator;
  readonly disposed: boolean;
  dispose(): void;
}

/**
 * Create the context for one ACE run
 */
export function createRunContext(config: RunContextConfig): RunContext {
  const clock = config.clock ?? createSystemClock();
  const startedAtMs = clock.nowMs();
  const runId = `ace_${formatRunTimestamp(startedAtMs)}`;
  const logger = (config.logger ?? createLogger('@racelab/workflows')).child({ runId });

  const simulator = new Simulator({
    winResultColumn: config.winResultColumn,
    raceIdColumn: config.raceIdColumn,
    logger,
  });
  const writer = new ExperienceWriter(
    { outputDir: config.experienceDir, partitionByDate: config.partitionByDate },
    {
      clock,
      columnarWriter: config.experienceFormat === 'csv.gz' ? new CsvGzipTableWriter() : undefined,
      logger,
    }
  );
  const runner = new EarlyExperienceRunner({ simulator, writer, logger });
  const reflector = new ACEReflector({
    clock,
    minBets: config.minBets,
    alpha: config.significanceAlpha,
    logger,
  });
  const curator = new PlaybookCurator({
    outputPath: config.playbookPath,
    maxHistory: config.maxHistory,
    logger,
  });

  let disposed = false;

  logger.info('Run context created', {
    startedAt: DateTime.fromMillis(startedAtMs, { zone: 'utc' }).toISO(),
    experienceDir: config.experienceDir,
    playbookPath: config.playbookPath,
  });

  return {
    runId,
    config,
    clock,
    logger,
    simulator,
    writer,
    runner,
    reflector,
    curator,
    get disposed() {
      return disposed;
    },
    dispose() {
      if (disposed) return;
      disposed = true;
      logger.info('Run context disposed', { durationMs: clock.nowMs() - startedAtMs });
    },
  };
}
