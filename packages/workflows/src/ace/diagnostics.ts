/**
 * Runner table diagnostics, logged when a run produces no bets
 */

import {
  MODEL_PROB_COLUMN,
  WIN_ODDS_COLUMN,
  hasColumn,
  numberCell,
  type RunnerTable,
} from '@racelab/core';

export interface RunnerDiagnostics {
  runners: number;
  nullModelProb: number;
  nullWinOdds: number;
  meanModelProb: number | null;
  meanWinOdds: number | null;
}

function columnSummary(table: RunnerTable, column: string): { nulls: number; mean: number | null } {
  if (!hasColumn(table, column)) {
    return { nulls: table.rows.length, mean: null };
  }
  let nulls = 0;
  let total = 0;
  for (const row of table.rows) {
    const value = numberCell(row, column);
    if (value === null) {
      nulls += 1;
    } else {
      total += value;
    }
  }
  const present = table.rows.length - nulls;
  return { nulls, mean: present > 0 ? total / present : null };
}

export function diagnoseRunnerTable(table: RunnerTable): RunnerDiagnostics {
  const modelProb = columnSummary(table, MODEL_PROB_COLUMN);
  const winOdds = columnSummary(table, WIN_ODDS_COLUMN);
  return {
    runners: table.rows.length,
    nullModelProb: modelProb.nulls,
    nullWinOdds: winOdds.nulls,
    meanModelProb: modelProb.mean,
    meanWinOdds: winOdds.mean,
  };
}
