/**
 * Runner table loader
 *
 * Loads scored runners from a CSV file (with header) or a JSON array of
 * objects, optionally restricted to an inclusive event-date window and capped
 * at the first N races in date order.
 */

import { promises as fs } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { createRunnerTable, type CellValue, type RunnerRow, type RunnerTable } from '@racelab/core';
import { NotFoundError, ValidationError, createLogger } from '@racelab/utils';

const logger = createLogger('@racelab/storage');

const JsonRunnerRowsSchema = z.array(
  z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
);

export interface RunnerTableQuery {
  /** Inclusive first event date (YYYY-MM-DD) */
  from?: string;
  /** Inclusive last event date (YYYY-MM-DD) */
  to?: string;
  /** Keep only the first N distinct races after sorting by event date and race id */
  maxRaces?: number;
}

function eventDay(row: RunnerRow): string | null {
  const value = row['event_date'];
  if (value === null || value === undefined) return null;
  const parsed = DateTime.fromISO(String(value).trim(), { zone: 'utc' });
  return parsed.isValid ? parsed.toISODate() : null;
}

function raceKey(row: RunnerRow): string {
  return String(row['race_id'] ?? row['win_market_id'] ?? '');
}

async function readRows(path: string): Promise<{ rows: RunnerRow[]; columns?: string[] }> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf8');
  } catch {
    throw new NotFoundError('Runner table', path);
  }

  if (path.endsWith('.json')) {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(`Runner table ${path} is not valid JSON`, {
        path,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    const parsed = JsonRunnerRowsSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError(`Runner table ${path} must be a JSON array of flat objects`, {
        path,
      });
    }
    return { rows: parsed.data };
  }

  let header: string[] = [];
  const rows: Record<string, CellValue>[] = parse(text, {
    columns: (names: string[]) => {
      header = names.map((name) => name.trim());
      return header;
    },
    skip_empty_lines: true,
    trim: true,
    cast: (value: string) => (value === '' ? null : value),
  });
  return { rows, columns: header };
}

export async function loadRunnerTable(
  path: string,
  query: RunnerTableQuery = {}
): Promise<RunnerTable> {
  const { rows, columns } = await readRows(path);
  let selected: RunnerRow[] = rows;

  if (query.from !== undefined || query.to !== undefined) {
    const from = query.from ?? '0000-01-01';
    const to = query.to ?? '9999-12-31';
    selected = selected.filter((row) => {
      const day = eventDay(row);
      return day !== null && day >= from && day <= to;
    });
    if (selected.length === 0) {
      throw new NotFoundError('Runners', `${query.from ?? '*'}..${query.to ?? '*'}`, { path });
    }
  }

  if (query.maxRaces !== undefined) {
    const ordered = [...selected].sort((a, b) => {
      const byDay = (eventDay(a) ?? '').localeCompare(eventDay(b) ?? '');
      return byDay !== 0 ? byDay : raceKey(a).localeCompare(raceKey(b));
    });
    const keep = new Set<string>();
    for (const row of ordered) {
      if (keep.size >= query.maxRaces) break;
      keep.add(raceKey(row));
    }
    selected = ordered.filter((row) => keep.has(raceKey(row)));
  }

  logger.info('Runner table loaded', { path, rows: selected.length, total: rows.length });
  return createRunnerTable(selected, columns);
}
