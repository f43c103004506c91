/**
 * @racelab/storage
 *
 * File-backed storage for the experience loop.
 *
 * Provides:
 * - Runner tables (CSV / JSON)
 * - Strategy definition files (JSON)
 * - Experience tables (Parquet via DuckDB, gzip CSV fallback)
 * - Playbook history (atomic JSON)
 */

// DuckDB client
export { DuckDBClient, sqlString } from './duckdb/duckdb-client.js';
export type { DuckDBQueryResult } from './duckdb/duckdb-client.js';

// Experience tables
export {
  ExperienceWriter,
  dateSuffix,
  formatRunTimestamp,
} from './experiences/experience-writer.js';
export type { ExperienceWriterConfig, ExperienceWriterDeps } from './experiences/experience-writer.js';
export { ParquetTableWriter, CsvGzipTableWriter } from './experiences/table-writers.js';
export type { TableWriter } from './experiences/table-writers.js';
export { readExperiences } from './experiences/experience-reader.js';

// Inputs
export { loadRunnerTable } from './runners/runner-table-loader.js';
export type { RunnerTableQuery } from './runners/runner-table-loader.js';
export { loadStrategyDefinitions } from './strategies/strategy-definition-loader.js';

// Playbook
export { writeFileAtomic } from './fs/atomic-write.js';
export type { AtomicWriteOptions } from './fs/atomic-write.js';
export {
  PlaybookCurator,
  DEFAULT_PLAYBOOK_PATH,
  PLAYBOOK_TEMP_PREFIX,
} from './playbook/playbook-curator.js';
export type { PlaybookCuratorOptions, PlaybookSource } from './playbook/playbook-curator.js';
