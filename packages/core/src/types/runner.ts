/**
 * Runner table
 *
 * One row per horse per race, already scored upstream with `model_prob`
 * and carrying market `win_odds`. Columns are explicit so that a missing
 * column can be told apart from a null cell.
 */

export type CellValue = string | number | boolean | null;

export type RunnerRow = Readonly<Record<string, CellValue>>;

export interface RunnerTable {
  readonly columns: readonly string[];
  readonly rows: readonly RunnerRow[];
}

/**
 * Columns the simulator needs on every table (the finish-result column is configurable)
 */
export const MODEL_PROB_COLUMN = 'model_prob';
export const WIN_ODDS_COLUMN = 'win_odds';
export const IMPLIED_PROB_COLUMN = 'implied_prob';
export const DEFAULT_WIN_RESULT_COLUMN = 'win_result';
export const RACE_ID_COLUMNS = ['race_id', 'win_market_id'] as const;

/**
 * Context columns carried into experience records and used for fingerprints
 */
export const DEFAULT_CONTEXT_FIELDS = [
  'track',
  'state_code',
  'distance',
  'racing_type',
  'race_type',
] as const;

/**
 * Build a table whose column set is the union of the row keys, in first-seen order.
 * Pass `columns` to declare columns that may have no values at all.
 */
export function createRunnerTable(
  rows: readonly RunnerRow[],
  columns?: readonly string[]
): RunnerTable {
  const seen = new Set<string>(columns ?? []);
  const ordered: string[] = [...seen];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        ordered.push(key);
      }
    }
  }
  return { columns: ordered, rows };
}

export function hasColumn(table: RunnerTable, column: string): boolean {
  return table.columns.includes(column);
}

/**
 * Read a numeric cell. Numeric strings are accepted; blanks, NaN and
 * non-numeric values read as null.
 */
export function numberCell(row: RunnerRow, column: string): number | null {
  const value = row[column];
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Read a cell as text. Null stays null; everything else is stringified.
 */
export function stringCell(row: RunnerRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return String(value);
}
