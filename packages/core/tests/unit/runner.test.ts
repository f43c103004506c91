import { describe, it, expect } from 'vitest';
import { createRunnerTable, hasColumn, numberCell, stringCell } from '../../src/types/runner.js';

describe('createRunnerTable', () => {
  it('collects columns in first-seen order', () => {
    const table = createRunnerTable([
      { race_id: 'R1', model_prob: 0.2 },
      { race_id: 'R1', win_odds: 4.5, model_prob: 0.3 },
    ]);

    expect(table.columns).toEqual(['race_id', 'model_prob', 'win_odds']);
    expect(table.rows).toHaveLength(2);
  });

  it('keeps declared columns even without rows', () => {
    const table = createRunnerTable([], ['model_prob', 'win_odds']);

    expect(hasColumn(table, 'win_odds')).toBe(true);
    expect(hasColumn(table, 'win_result')).toBe(false);
  });
});

describe('cell readers', () => {
  const row = { a: 1.5, b: ' 2.5 ', c: '', d: null, e: 'abc', f: Number.NaN, g: true };

  it('numberCell parses numbers and numeric strings', () => {
    expect(numberCell(row, 'a')).toBe(1.5);
    expect(numberCell(row, 'b')).toBe(2.5);
  });

  it('numberCell reads blanks, text and NaN as null', () => {
    expect(numberCell(row, 'c')).toBeNull();
    expect(numberCell(row, 'd')).toBeNull();
    expect(numberCell(row, 'e')).toBeNull();
    expect(numberCell(row, 'f')).toBeNull();
    expect(numberCell(row, 'missing')).toBeNull();
  });

  it('stringCell stringifies non-null values', () => {
    expect(stringCell(row, 'a')).toBe('1.5');
    expect(stringCell(row, 'g')).toBe('true');
    expect(stringCell(row, 'd')).toBeNull();
    expect(stringCell(row, 'missing')).toBeNull();
  });
});
