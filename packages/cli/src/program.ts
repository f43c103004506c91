/**
 * Commander program with every command group registered
 */

import { Command } from 'commander';
import { registerAceCommands } from './commands/ace.js';
import { registerPlaybookCommands } from './commands/playbook.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('racelab')
    .description('Race strategy backtesting, experience capture and playbook curation')
    .version('0.1.0');

  registerAceCommands(program);
  registerPlaybookCommands(program);

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });

  return program;
}
