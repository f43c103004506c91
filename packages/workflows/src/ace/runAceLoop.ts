/**
 * ACE Loop Workflow - Strategies → experiences → playbook
 *
 * Orchestrates one pass of the experience loop:
 * 1. Expand the strategy definition file (or the default grid)
 * 2. Load the runner table, restricted to the date window and race cap
 * 3. Evaluate every strategy and persist the experiences
 * 4. Read the experiences back and reflect them into a playbook
 * 5. Append the playbook to the curated history
 *
 * When no strategy places a bet the runner table is diagnosed, and the
 * playbook is still curated from the per-strategy metrics.
 */

import { z } from 'zod';
import { DateTime } from 'luxon';
import type { ExperienceFormat, ExperienceRecord } from '@racelab/core';
import { StrategyGrid, type StrategyConfig } from '@racelab/backtest';
import { loadRunnerTable, loadStrategyDefinitions, readExperiences } from '@racelab/storage';
import { ValidationError } from '@racelab/utils';
import type { RunContext } from '../context/createRunContext.js';
import { diagnoseRunnerTable, type RunnerDiagnostics } from './diagnostics.js';

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const AceRunRequestSchema = z
  .object({
    runnersPath: z.string().min(1),
    strategyFile: z.string().min(1).optional(),
    from: IsoDateSchema.optional(),
    to: IsoDateSchema.optional(),
    maxRaces: z.number().int().positive().optional(),
    label: z.string().min(1).optional(),
  })
  .refine((req) => !req.from || !req.to || req.from <= req.to, {
    message: 'from must not be after to',
    path: ['from'],
  });

export type AceRunRequest = z.infer<typeof AceRunRequestSchema>;

/**
 * ACE run output (JSON-serializable)
 */
export type AceRunSummary = {
  runId: string;
  strategies: number;
  runners: number;
  experienceRows: number;
  experiencePath: string | null;
  experienceFormat: ExperienceFormat | null;
  playbookPath: string;
  totalProfit: number;
  potPct: number;
  significantStrategies: string[];
  bestStrategy: { strategyId: string; roiPct: number | null } | null;
  diagnostics: RunnerDiagnostics | null;
  startedAtISO: string;
  completedAtISO: string;
  durationMs: number;
};

async function resolveStrategies(
  strategyFile: string | undefined,
  ctx: RunContext
): Promise<StrategyConfig[]> {
  if (strategyFile === undefined) {
    const strategies = StrategyGrid.defaults();
    ctx.logger.info('Using default strategy grid', { strategies: strategies.length });
    return strategies;
  }
  const definitions = await loadStrategyDefinitions(strategyFile);
  const strategies = StrategyGrid.fromDefinitions(definitions);
  ctx.logger.info('Strategy definitions expanded', {
    path: strategyFile,
    definitions: definitions.length,
    strategies: strategies.length,
  });
  return strategies;
}

/**
 * Run the ACE loop once
 *
 * @param request - Runner table location, strategy file and data window
 * @param ctx - Run context from createRunContext()
 * @returns Summary of the run and the curated playbook
 */
export async function runAceLoop(request: AceRunRequest, ctx: RunContext): Promise<AceRunSummary> {
  const parsed = AceRunRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw new ValidationError('Invalid ACE run request', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  const req = parsed.data;
  const startedAtMs = ctx.clock.nowMs();

  ctx.logger.info('Starting ACE loop', {
    runnersPath: req.runnersPath,
    strategyFile: req.strategyFile,
    from: req.from,
    to: req.to,
    maxRaces: req.maxRaces,
  });

  // 1. Strategies
  const strategies = await resolveStrategies(req.strategyFile, ctx);

  // 2. Runners
  const table = await loadRunnerTable(req.runnersPath, {
    from: req.from,
    to: req.to,
    maxRaces: req.maxRaces,
  });

  // 3. Experience capture
  const output = await ctx.runner.run(table, strategies, { label: req.label });

  // 4. Reflection
  let experiences: ExperienceRecord[] | null = null;
  let diagnostics: RunnerDiagnostics | null = null;
  if (output.experiencePath !== null) {
    experiences = await readExperiences(output.experiencePath);
  } else {
    diagnostics = diagnoseRunnerTable(table);
    ctx.logger.warn('No strategy placed a bet; curating from strategy metrics only', {
      ...diagnostics,
      strategies: strategies.length,
    });
  }
  const playbook = ctx.reflector.buildPlaybook(experiences, output.strategyMetrics);

  // 5. Curation
  const playbookPath = await ctx.curator.save(playbook);

  const completedAtMs = ctx.clock.nowMs();
  const best = playbook.strategyStats[0];
  const summary: AceRunSummary = {
    runId: ctx.runId,
    strategies: strategies.length,
    runners: table.rows.length,
    experienceRows: experiences?.length ?? 0,
    experiencePath: output.experiencePath,
    experienceFormat: output.format,
    playbookPath,
    totalProfit: playbook.globalStats.total_profit,
    potPct: playbook.globalStats.pot_pct,
    significantStrategies: playbook.strategyStats
      .filter((stat) => stat.significant)
      .map((stat) => stat.strategy_id),
    bestStrategy: best ? { strategyId: best.strategy_id, roiPct: best.roi_pct } : null,
    diagnostics,
    startedAtISO: toIso(startedAtMs),
    completedAtISO: toIso(completedAtMs),
    durationMs: completedAtMs - startedAtMs,
  };

  ctx.logger.info('ACE loop completed', {
    experienceRows: summary.experienceRows,
    playbookPath,
    significant: summary.significantStrategies.length,
    durationMs: summary.durationMs,
  });
  return summary;
}

function toIso(ms: number): string {
  return DateTime.fromMillis(ms, { zone: 'utc' }).toFormat("yyyy-MM-dd'T'HH:mm:ss.SSS'Z'");
}
