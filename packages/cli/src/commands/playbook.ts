/**
 * Playbook Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { commandRegistry, defineCommand } from '../core/command-registry.js';
import { execute } from '../core/execute.js';
import { playbookShowSchema } from '../command-defs/ace.js';
import { showPlaybookHandler } from '../handlers/playbook/show-playbook.js';

export const playbookShowCommand = defineCommand({
  name: 'show',
  description: 'Show a section of the latest curated playbook',
  schema: playbookShowSchema,
  handler: showPlaybookHandler,
  examples: ['racelab playbook show --section tracks --format table'],
});

const playbookModule: PackageCommandModule = {
  packageName: 'playbook',
  description: 'Curated playbook inspection',
  commands: [playbookShowCommand],
};

commandRegistry.registerPackage(playbookModule);

/**
 * Register playbook commands
 */
export function registerPlaybookCommands(program: Command): void {
  if (program.commands.find((cmd) => cmd.name() === 'playbook')) {
    return;
  }

  const playbookCmd = program.command('playbook').description(playbookModule.description);

  playbookCmd
    .command('show')
    .description(playbookShowCommand.description)
    .option('--playbook-path <path>', 'Playbook file (ACE_PLAYBOOK_PATH)')
    .option('--section <section>', 'strategies, tracks, contexts, global or metadata', 'strategies')
    .option('--format <format>', 'Output format (json, table)', 'table')
    .action(async (options: Record<string, unknown>) => {
      process.exitCode = await execute(playbookShowCommand, options);
    });
}
