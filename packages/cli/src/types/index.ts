/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'table';

/**
 * Command definition structure
 */
export interface CommandDefinition<TArgs, TResult> {
  /**
   * Command name (e.g., 'run', 'show')
   */
  name: string;

  /**
   * Command description for help text
   */
  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;

  /**
   * Value coercion of raw commander options (numbers, booleans). Never renames keys.
   */
  coerce?: (raw: Record<string, unknown>) => Record<string, unknown>;

  /**
   * Pure use-case function; receives validated args
   */
  handler: (args: TArgs, ctx: CommandContext) => Promise<TResult>;

  /**
   * Optional examples for help text
   */
  examples?: string[];
}

/**
 * Command with its argument type erased, as stored in the registry
 */
export interface RegisteredCommand {
  name: string;
  description: string;
  examples?: string[];
  run(rawOptions: Record<string, unknown>, ctx: CommandContext): Promise<unknown>;
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Package name (e.g., 'ace', 'playbook')
   */
  packageName: string;

  /**
   * Package description
   */
  description: string;

  /**
   * Commands in this package
   */
  commands: RegisteredCommand[];
}
