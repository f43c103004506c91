/**
 * @racelab/cli
 */

export { buildProgram } from './program.js';
export { execute } from './core/execute.js';
export type { ExecuteOptions } from './core/execute.js';
export { CommandContext } from './core/command-context.js';
export type { CommandContextOptions } from './core/command-context.js';
export { commandRegistry, defineCommand } from './core/command-registry.js';
export { aceRunCommand } from './commands/ace.js';
export { playbookShowCommand } from './commands/playbook.js';
