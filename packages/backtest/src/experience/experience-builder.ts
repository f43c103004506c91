/**
 * Experience builder
 *
 * Turns the settled bets of one simulation into experience records, one
 * immutable record per bet, validated as a whole before it is handed on.
 */

import {
  DEFAULT_CONTEXT_FIELDS,
  EXPERIENCE_ACTION,
  ExperienceRecordSchema,
  canonicalJson,
  computeContextHash,
  computeExperienceId,
  hasColumn,
  numberCell,
  stringCell,
  type CellValue,
  type ExperienceRecord,
  type RunnerRow,
  type RunnerTable,
} from '@racelab/core';
import { ConfigurationError, ValidationError } from '@racelab/utils';
import type { SimulatedBet, SimulationResult } from '../sim/simulator.js';
import { toParams } from '../strategy/strategy-config.js';

const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Calendar date of an event as YYYY-MM-DD, or the raw text when it is not a recognizable date
 */
export function normalizeEventDate(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  const iso = ISO_DATE_PREFIX.exec(trimmed);
  if (iso) return iso[1] ?? trimmed;
  const compact = COMPACT_DATE.exec(trimmed);
  if (compact) return `${compact[1]}-${compact[2]}-${compact[3]}`;
  return trimmed === '' ? null : trimmed;
}

export interface ExperienceBuilderOptions {
  /** Context columns fingerprinted into `context_hash` */
  contextFields?: readonly string[];
}

export class ExperienceBuilder {
  readonly contextFields: readonly string[];

  constructor(options: ExperienceBuilderOptions = {}) {
    this.contextFields = options.contextFields ?? DEFAULT_CONTEXT_FIELDS;
  }

  build(table: RunnerTable, result: SimulationResult): ExperienceRecord[] {
    if (result.bets.length === 0) return [];

    const hasRunnerId = hasColumn(table, 'runner_id');
    if (!hasRunnerId && !hasColumn(table, 'selection_id')) {
      throw new ConfigurationError(
        "Runner table needs a 'runner_id' or 'selection_id' column to identify bets",
        'runner_id'
      );
    }

    const strategyId = result.strategy.strategyId;
    const params = canonicalJson(toParams(result.strategy));
    const fields = this.contextFields.filter((field) => hasColumn(table, field));

    return result.bets.map((bet) => {
      const runnerId = this.runnerId(bet, hasRunnerId);
      return validated({
        event_date: normalizeEventDate(stringCell(bet.row, 'event_date')),
        race_id: bet.raceId,
        runner_id: runnerId,
        selection_id: stringCell(bet.row, 'selection_id'),
        strategy_id: strategyId,
        params,
        action: EXPERIENCE_ACTION,
        stake: bet.stake,
        profit: bet.profit,
        model_prob: bet.modelProb,
        implied_prob: bet.impliedProb,
        edge: bet.edge,
        win_odds: bet.winOdds,
        won_flag: bet.wonFlag,
        track: stringCell(bet.row, 'track'),
        state_code: stringCell(bet.row, 'state_code'),
        distance: numberCell(bet.row, 'distance'),
        racing_type: stringCell(bet.row, 'racing_type'),
        race_type: stringCell(bet.row, 'race_type'),
        context_hash: computeContextHash(contextOf(bet.row, fields)),
        experience_id: computeExperienceId(strategyId, bet.raceId, runnerId, EXPERIENCE_ACTION),
      });
    });
  }

  private runnerId(bet: SimulatedBet, hasRunnerId: boolean): string {
    const direct = hasRunnerId ? stringCell(bet.row, 'runner_id') : null;
    if (direct !== null) return direct;
    const selectionId = stringCell(bet.row, 'selection_id');
    if (selectionId === null) {
      throw new ValidationError(`Bet in race ${bet.raceId} has neither runner_id nor selection_id`, {
        raceId: bet.raceId,
      });
    }
    return `${bet.raceId}_${selectionId}`;
  }
}

function contextOf(row: RunnerRow, fields: readonly string[]): Record<string, CellValue> {
  return Object.fromEntries(fields.map((field) => [field, row[field] ?? null]));
}

function validated(record: ExperienceRecord): ExperienceRecord {
  const parsed = ExperienceRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new ValidationError(`Malformed experience record for race ${record.race_id}`, {
      strategyId: record.strategy_id,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}
