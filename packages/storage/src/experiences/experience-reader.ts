/**
 * Experience Reader
 *
 * Reads an experience file written by ExperienceWriter back into typed
 * records. The format is chosen by file extension.
 */

import { promises as fs } from 'node:fs';
import { promisify } from 'node:util';
import { gunzip } from 'node:zlib';
import { parse } from 'csv-parse/sync';
import {
  EXPERIENCE_COLUMNS,
  ExperienceRecordSchema,
  type ExperienceColumnType,
  type ExperienceRecord,
} from '@racelab/core';
import { NotFoundError, ValidationError } from '@racelab/utils';
import { DuckDBClient, sqlString } from '../duckdb/duckdb-client.js';

const gunzipAsync = promisify(gunzip);

const COLUMN_TYPES: ReadonlyMap<string, ExperienceColumnType> = new Map(
  EXPERIENCE_COLUMNS.map((column) => [column.name, column.type])
);

function fromCsvCell(column: string, cell: string): string | number | null {
  if (cell === '') return null;
  const type = COLUMN_TYPES.get(column);
  return type === 'DOUBLE' || type === 'INTEGER' ? Number(cell) : cell;
}

async function readParquetRows(path: string): Promise<Record<string, unknown>[]> {
  const client = new DuckDBClient();
  try {
    const result = await client.query(`SELECT * FROM read_parquet(${sqlString(path)})`);
    return result.rows;
  } finally {
    client.close();
  }
}

async function readCsvRows(path: string, compressed: boolean): Promise<Record<string, unknown>[]> {
  const raw = await fs.readFile(path);
  const text = (compressed ? await gunzipAsync(raw) : raw).toString('utf8');
  const rows: Record<string, string>[] = parse(text, { columns: true, skip_empty_lines: true });
  return rows.map((row) =>
    Object.fromEntries(
      Object.entries(row).map(([column, cell]) => [column, fromCsvCell(column, cell)])
    )
  );
}

function toRecord(row: Record<string, unknown>, index: number, path: string): ExperienceRecord {
  const parsed = ExperienceRecordSchema.safeParse(row);
  if (!parsed.success) {
    throw new ValidationError(`Malformed experience row ${index} in ${path}`, {
      path,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export async function readExperiences(path: string): Promise<ExperienceRecord[]> {
  try {
    await fs.access(path);
  } catch {
    throw new NotFoundError('Experience file', path);
  }

  let rows: Record<string, unknown>[];
  if (path.endsWith('.parquet')) {
    rows = await readParquetRows(path);
  } else if (path.endsWith('.csv.gz')) {
    rows = await readCsvRows(path, true);
  } else if (path.endsWith('.csv')) {
    rows = await readCsvRows(path, false);
  } else {
    throw new ValidationError(`Unsupported experience file format: ${path}`, { path });
  }

  return rows.map((row, index) => toRecord(row, index, path));
}
