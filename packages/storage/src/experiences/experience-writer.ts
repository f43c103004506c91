/**
 * Experience Writer
 *
 * Persists one run's experience table as a single file. Parquet is tried
 * first; any failure there falls back to gzip-compressed CSV.
 *
 * File name: `{label|prefix}_{dateSuffix}_{timestamp}.{ext}` where the date
 * suffix is the single event date, `first_last` for a range, or the
 * timestamp when no date is available or partitioning is off.
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { DateTime } from 'luxon';
import type {
  ClockPort,
  ExperienceRecord,
  ExperienceSink,
  WrittenExperiences,
} from '@racelab/core';
import { PersistenceError, createLogger, errorMessage, type Logger } from '@racelab/utils';
import { CsvGzipTableWriter, ParquetTableWriter, type TableWriter } from './table-writers.js';

export interface ExperienceWriterConfig {
  outputDir: string;
  partitionByDate?: boolean;
  filenamePrefix?: string;
}

export interface ExperienceWriterDeps {
  clock: ClockPort;
  columnarWriter?: TableWriter;
  fallbackWriter?: TableWriter;
  logger?: Logger;
}

/**
 * UTC run timestamp, e.g. 20240302T101500Z
 */
export function formatRunTimestamp(nowMs: number): string {
  return DateTime.fromMillis(nowMs, { zone: 'utc' }).toFormat("yyyyMMdd'T'HHmmss'Z'");
}

/**
 * Date part of the file name: YYYYMMDD, FIRST_LAST, or null when the records carry no dates
 */
export function dateSuffix(records: readonly ExperienceRecord[]): string | null {
  const dates = [
    ...new Set(
      records
        .map((record) => record.event_date)
        .filter((date): date is string => date !== null)
        .map((date) => date.replace(/-/g, ''))
    ),
  ].sort();
  const first = dates[0];
  const last = dates[dates.length - 1];
  if (first === undefined || last === undefined) return null;
  return first === last ? first : `${first}_${last}`;
}

export class ExperienceWriter implements ExperienceSink {
  private readonly outputDir: string;
  private readonly partitionByDate: boolean;
  private readonly filenamePrefix: string;
  private readonly clock: ClockPort;
  private readonly columnarWriter: TableWriter;
  private readonly fallbackWriter: TableWriter;
  private readonly logger: Logger;

  constructor(config: ExperienceWriterConfig, deps: ExperienceWriterDeps) {
    this.outputDir = config.outputDir;
    this.partitionByDate = config.partitionByDate ?? true;
    this.filenamePrefix = config.filenamePrefix ?? 'experiences';
    this.clock = deps.clock;
    this.columnarWriter = deps.columnarWriter ?? new ParquetTableWriter();
    this.fallbackWriter = deps.fallbackWriter ?? new CsvGzipTableWriter();
    this.logger = deps.logger ?? createLogger('@racelab/storage');
  }

  async write(records: readonly ExperienceRecord[], label?: string): Promise<WrittenExperiences> {
    await fs.mkdir(this.outputDir, { recursive: true });

    const timestamp = formatRunTimestamp(this.clock.nowMs());
    const suffix = (this.partitionByDate ? dateSuffix(records) : null) ?? timestamp;
    const base = join(this.outputDir, `${label || this.filenamePrefix}_${suffix}_${timestamp}`);

    const primaryPath = `${base}.${this.columnarWriter.format}`;
    try {
      await this.columnarWriter.write(records, primaryPath);
      this.logger.info('Experiences written', { path: primaryPath, rows: records.length });
      return { path: primaryPath, format: this.columnarWriter.format, rows: records.length };
    } catch (error) {
      this.logger.warn('Columnar write failed, falling back', {
        path: primaryPath,
        error: errorMessage(error),
      });
      await fs.rm(primaryPath, { force: true });
    }

    const fallbackPath = `${base}.${this.fallbackWriter.format}`;
    try {
      await this.fallbackWriter.write(records, fallbackPath);
    } catch (error) {
      throw new PersistenceError(
        `Failed to write experiences: ${errorMessage(error)}`,
        'writeExperiences',
        { path: fallbackPath }
      );
    }
    this.logger.info('Experiences written', { path: fallbackPath, rows: records.length });
    return { path: fallbackPath, format: this.fallbackWriter.format, rows: records.length };
  }
}
