/**
 * Universal Command Executor
 *
 * Handles all the boring universal stuff:
 * - Split the CLI-only output format from the handler args
 * - Validate and call the handler
 * - Format output
 * - Error handling
 */

import { CommandContext } from './command-context.js';
import { formatOutput } from './output-formatter.js';
import { handleError } from './error-handler.js';
import type { OutputFormat, RegisteredCommand } from '../types/index.js';

export interface ExecuteOptions {
  ctx?: CommandContext;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

function outputFormat(value: unknown, fallback: OutputFormat): OutputFormat {
  return value === 'json' || value === 'table' ? value : fallback;
}

/**
 * Execute a registered command with raw commander options
 *
 * @returns Process exit code: 0 on success, 1 on any error
 */
export async function execute(
  command: RegisteredCommand,
  rawOptions: Record<string, unknown>,
  options: ExecuteOptions = {}
): Promise<number> {
  const stdout = options.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  const stderr = options.stderr ?? ((text: string) => process.stderr.write(`${text}\n`));

  // Format is CLI concern, not handler concern
  const { format, ...handlerArgs } = rawOptions;

  try {
    const ctx = options.ctx ?? new CommandContext();
    const result = await command.run(handlerArgs, ctx);
    stdout(formatOutput(result, outputFormat(format, 'json')));
    return 0;
  } catch (error) {
    const message = handleError(error, { command: command.name });
    stderr(`Error: ${message}`);
    return 1;
  }
}
