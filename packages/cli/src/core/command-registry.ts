/**
 * Command Registry - Command lookup by package and name
 */

import type { z } from 'zod';
import type { CommandDefinition, PackageCommandModule, RegisteredCommand } from '../types/index.js';
import { ConfigurationError, ValidationError } from '@racelab/utils';

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Bind a typed definition into a registry entry: coerce, validate, then call the handler
 */
export function defineCommand<TArgs, TResult>(
  definition: CommandDefinition<TArgs, TResult>
): RegisteredCommand {
  return {
    name: definition.name,
    description: definition.description,
    examples: definition.examples,
    async run(rawOptions, ctx) {
      const coerced = definition.coerce ? definition.coerce(rawOptions) : rawOptions;
      const parsed = definition.schema.safeParse(coerced);
      if (!parsed.success) {
        throw new ValidationError(`Invalid arguments: ${describeIssues(parsed.error)}`, {
          command: definition.name,
        });
      }
      return definition.handler(parsed.data, ctx);
    },
  };
}

/**
 * Command registry for managing CLI commands
 */
export class CommandRegistry {
  private packages: Map<string, PackageCommandModule> = new Map();
  private commands: Map<string, RegisteredCommand> = new Map();

  /**
   * Register a package command module
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(
        `Package ${module.packageName} is already registered`,
        'packageName',
        { packageName: module.packageName }
      );
    }

    this.packages.set(module.packageName, module);

    // Register all commands from this package
    for (const command of module.commands) {
      const fullName = `${module.packageName}.${command.name}`;
      if (this.commands.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
      this.commands.set(fullName, command);
    }
  }

  /**
   * Get a command by full name (package.command)
   */
  getCommand(packageName: string, commandName: string): RegisteredCommand | undefined {
    return this.commands.get(`${packageName}.${commandName}`);
  }

  /**
   * Get all registered packages
   */
  getPackages(): PackageCommandModule[] {
    return Array.from(this.packages.values());
  }

  /**
   * Generate help text for a package
   */
  generatePackageHelp(packageName: string): string {
    const module = this.packages.get(packageName);
    if (!module) {
      return `Package ${packageName} not found`;
    }

    const lines: string[] = [];
    lines.push(`${module.description}`);
    lines.push('');
    lines.push('Commands:');
    for (const command of module.commands) {
      lines.push(`  ${command.name.padEnd(20)} ${command.description}`);
      for (const example of command.examples ?? []) {
        lines.push(`    Example: ${example}`);
      }
    }

    return lines.join('\n');
  }
}

/**
 * Global command registry instance
 */
export const commandRegistry = new CommandRegistry();
