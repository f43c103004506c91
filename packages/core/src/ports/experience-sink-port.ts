/**
 * Experience Sink Port
 *
 * Interface for persisting the experience table of one run.
 * Implementations pick the on-disk format; callers only see where it went.
 */

import type { ExperienceRecord } from '../types/experience.js';

export type ExperienceFormat = 'parquet' | 'csv.gz';

/**
 * Location and format of a written experience table
 */
export interface WrittenExperiences {
  path: string;
  format: ExperienceFormat;
  rows: number;
}

/**
 * Experience sink port
 */
export interface ExperienceSink {
  /**
   * Persist one run's records as a single file
   *
   * `label` replaces the configured filename prefix when given.
   */
  write(records: readonly ExperienceRecord[], label?: string): Promise<WrittenExperiences>;
}
