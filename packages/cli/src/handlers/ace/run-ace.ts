/**
 * ACE Run Handler
 *
 * Builds a run context from the environment and flags, runs the ACE loop
 * once and returns its summary.
 *
 * Pure handler - no console.log, no process.exit.
 */

import type { RunContextConfig } from '@racelab/workflows';
import { runAceLoop, type AceRunSummary } from '@racelab/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { AceRunArgs } from '../../command-defs/ace.js';

function runOverrides(args: AceRunArgs): Partial<RunContextConfig> {
  const overrides: Partial<RunContextConfig> = {};
  if (args.experienceDir !== undefined) overrides.experienceDir = args.experienceDir;
  if (args.experienceFormat !== undefined) overrides.experienceFormat = args.experienceFormat;
  if (args.playbookPath !== undefined) overrides.playbookPath = args.playbookPath;
  if (args.minBets !== undefined) overrides.minBets = args.minBets;
  if (args.maxHistory !== undefined) overrides.maxHistory = args.maxHistory;
  if (args.alpha !== undefined) overrides.significanceAlpha = args.alpha;
  if (args.partitionByDate !== undefined) overrides.partitionByDate = args.partitionByDate;
  return overrides;
}

export async function runAceHandler(args: AceRunArgs, ctx: CommandContext): Promise<AceRunSummary> {
  const run = ctx.createRunContext(runOverrides(args));
  try {
    return await runAceLoop(
      {
        runnersPath: args.runners,
        strategyFile: args.strategies,
        from: args.from,
        to: args.to,
        maxRaces: args.maxRaces,
        label: args.label,
      },
      run
    );
  } finally {
    run.dispose();
  }
}
