/**
 * ACE Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { commandRegistry, defineCommand } from '../core/command-registry.js';
import { coerceBoolean, coerceNumber } from '../core/coerce.js';
import { execute } from '../core/execute.js';
import { aceRunSchema } from '../command-defs/ace.js';
import { runAceHandler } from '../handlers/ace/run-ace.js';

export const aceRunCommand = defineCommand({
  name: 'run',
  description: 'Backtest strategies, log experiences and curate the playbook',
  schema: aceRunSchema,
  coerce: (raw) => ({
    ...raw,
    maxRaces: coerceNumber(raw.maxRaces, 'max-races'),
    minBets: coerceNumber(raw.minBets, 'min-bets'),
    maxHistory: coerceNumber(raw.maxHistory, 'max-history'),
    alpha: coerceNumber(raw.alpha, 'alpha'),
    partitionByDate: coerceBoolean(raw.partitionByDate, 'partition-by-date'),
  }),
  handler: runAceHandler,
  examples: [
    'racelab ace run --runners data/runners.csv',
    'racelab ace run --runners data/runners.csv --strategies strategies.json --from 2024-01-01 --to 2024-03-31',
  ],
});

const aceModule: PackageCommandModule = {
  packageName: 'ace',
  description: 'Experience capture and reflection loop',
  commands: [aceRunCommand],
};

commandRegistry.registerPackage(aceModule);

/**
 * Register ACE commands
 */
export function registerAceCommands(program: Command): void {
  // Check if command already exists to avoid duplicate registration
  if (program.commands.find((cmd) => cmd.name() === 'ace')) {
    return;
  }

  const aceCmd = program.command('ace').description(aceModule.description);

  aceCmd
    .command('run')
    .description(aceRunCommand.description)
    .requiredOption('--runners <path>', 'Scored runner table (.csv or .json)')
    .option('--strategies <path>', 'Strategy definition file (JSON); default grid when omitted')
    .option('--from <date>', 'First event date, inclusive (YYYY-MM-DD)')
    .option('--to <date>', 'Last event date, inclusive (YYYY-MM-DD)')
    .option('--max-races <n>', 'Keep only the first N races')
    .option('--label <name>', 'Experience file name prefix')
    .option('--experience-dir <dir>', 'Experience output directory (ACE_EXPERIENCE_DIR)')
    .option('--experience-format <format>', 'parquet or csv.gz')
    .option('--playbook-path <path>', 'Playbook file (ACE_PLAYBOOK_PATH)')
    .option('--min-bets <n>', 'Minimum bets per track or context (ACE_MIN_BETS)')
    .option('--max-history <n>', 'Playbook snapshots kept (ACE_MAX_HISTORY)')
    .option('--alpha <p>', 'Significance level (ACE_SIGNIFICANCE_ALPHA)')
    .option('--partition-by-date <bool>', 'Date-stamped experience file names (ACE_PARTITION_BY_DATE)')
    .option('--format <format>', 'Output format (json, table)', 'json')
    .action(async (options: Record<string, unknown>) => {
      process.exitCode = await execute(aceRunCommand, options);
    });
}
