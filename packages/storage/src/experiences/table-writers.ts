/**
 * Experience table writers
 *
 * Two on-disk formats for the same typed rows: Parquet written through
 * DuckDB, and gzip-compressed CSV as the fallback. Both keep the column order
 * of EXPERIENCE_COLUMNS.
 */

import { promises as fs } from 'node:fs';
import { promisify } from 'node:util';
import { gzip } from 'node:zlib';
import { stringify } from 'csv-stringify/sync';
import {
  EXPERIENCE_COLUMNS,
  type ExperienceColumn,
  type ExperienceFormat,
  type ExperienceRecord,
} from '@racelab/core';
import { DuckDBClient, sqlString } from '../duckdb/duckdb-client.js';

const gzipAsync = promisify(gzip);

const INSERT_BATCH_SIZE = 500;

export interface TableWriter {
  readonly format: ExperienceFormat;
  write(records: readonly ExperienceRecord[], path: string): Promise<void>;
}

function sqlLiteral(record: ExperienceRecord, column: ExperienceColumn): string {
  const value = record[column.name];
  if (value === null) return 'NULL';
  if (column.type === 'VARCHAR') return sqlString(String(value));
  return `${sqlString(String(value))}::${column.type}`;
}

/**
 * Parquet through an in-memory DuckDB table and COPY
 */
export class ParquetTableWriter implements TableWriter {
  readonly format = 'parquet' as const;

  async write(records: readonly ExperienceRecord[], path: string): Promise<void> {
    const client = new DuckDBClient();
    try {
      const columnDefs = EXPERIENCE_COLUMNS.map((column) => `"${column.name}" ${column.type}`);
      await client.execute(`CREATE TABLE experiences (${columnDefs.join(', ')})`);

      for (let start = 0; start < records.length; start += INSERT_BATCH_SIZE) {
        const values = records
          .slice(start, start + INSERT_BATCH_SIZE)
          .map(
            (record) =>
              `(${EXPERIENCE_COLUMNS.map((column) => sqlLiteral(record, column)).join(', ')})`
          );
        await client.execute(`INSERT INTO experiences VALUES ${values.join(',\n')}`);
      }

      await client.execute(`COPY experiences TO ${sqlString(path)} (FORMAT PARQUET)`);
    } finally {
      client.close();
    }
  }
}

/**
 * Header row plus one line per record, gzip-compressed. Nulls are empty cells.
 */
export class CsvGzipTableWriter implements TableWriter {
  readonly format = 'csv.gz' as const;

  async write(records: readonly ExperienceRecord[], path: string): Promise<void> {
    const columns = EXPERIENCE_COLUMNS.map((column) => column.name);
    const csv = stringify([...records], { header: true, columns });
    await fs.writeFile(path, await gzipAsync(Buffer.from(csv, 'utf8')));
  }
}
