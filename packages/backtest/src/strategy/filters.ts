/**
 * Context filters
 *
 * A filter pairs a runner-table column with a predicate. Filters on columns
 * the table does not carry are skipped by the simulator, so definitions keep
 * working while the set of context columns evolves.
 */

import type { CellValue, FilterPredicate, FilterValue, StrategyFilter } from '@racelab/core';

function freezeFilter(column: string, predicate: FilterPredicate): StrategyFilter {
  const filter: StrategyFilter = { column, predicate: Object.freeze(predicate) };
  return Object.freeze(filter);
}

export function equalsFilter(column: string, value: FilterValue): StrategyFilter {
  return freezeFilter(column, { kind: 'equals', value });
}

export function oneOfFilter(column: string, values: readonly FilterValue[]): StrategyFilter {
  return freezeFilter(column, { kind: 'oneOf', values: Object.freeze([...values]) });
}

/**
 * Read a `{column: value | values[]}` mapping. Arrays become OneOf, scalars Equals.
 */
export function filtersFromRecord(
  record: Readonly<Record<string, FilterValue | readonly FilterValue[]>>
): StrategyFilter[] {
  return Object.entries(record).map(([column, value]) =>
    isFilterList(value) ? oneOfFilter(column, value) : equalsFilter(column, value)
  );
}

export function filtersToRecord(
  filters: readonly StrategyFilter[]
): Record<string, FilterValue | FilterValue[]> {
  const record: Record<string, FilterValue | FilterValue[]> = {};
  for (const { column, predicate } of filters) {
    record[column] = predicate.kind === 'equals' ? predicate.value : [...predicate.values];
  }
  return record;
}

function isFilterList(value: FilterValue | readonly FilterValue[]): value is readonly FilterValue[] {
  return Array.isArray(value);
}

/**
 * Cell equality. Values of different types compare by their text, so that a
 * distance of 1200 read from CSV as "1200" still matches.
 */
function cellEquals(cell: CellValue, value: FilterValue): boolean {
  if (cell === null) return false;
  if (typeof cell === typeof value) return cell === value;
  return String(cell) === String(value);
}

export function matchesFilter(filter: StrategyFilter, cell: CellValue): boolean {
  const { predicate } = filter;
  if (predicate.kind === 'equals') {
    return cellEquals(cell, predicate.value);
  }
  return predicate.values.some((value) => cellEquals(cell, value));
}
