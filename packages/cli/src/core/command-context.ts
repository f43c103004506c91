/**
 * Command Context - Lazy configuration and service creation
 *
 * This is NOT a framework - just an object that knows how to read the
 * environment once and create the services a command needs.
 */

import type { ClockPort } from '@racelab/core';
import { PlaybookCurator } from '@racelab/storage';
import { getAceConfig, type AceConfig } from '@racelab/utils';
import { createRunContext, type RunContext, type RunContextConfig } from '@racelab/workflows';

/**
 * Options for creating a CommandContext with overrides
 * Useful for testing
 */
export interface CommandContextOptions {
  /**
   * Environment to read configuration from (default: process.env)
   */
  env?: Record<string, string | undefined>;
  /**
   * Clock override (for deterministic runs)
   */
  clock?: ClockPort;
}

export class CommandContext {
  private aceConfig: AceConfig | null = null;

  constructor(private readonly options: CommandContextOptions = {}) {}

  /**
   * Environment configuration, read on first use
   */
  get config(): AceConfig {
    if (this.aceConfig === null) {
      this.aceConfig = getAceConfig(this.options.env ?? process.env);
    }
    return this.aceConfig;
  }

  /**
   * Context for one ACE run; flags in `overrides` win over the environment
   */
  createRunContext(overrides: Partial<RunContextConfig> = {}): RunContext {
    return createRunContext({ ...this.config, clock: this.options.clock, ...overrides });
  }

  playbookCurator(outputPath?: string): PlaybookCurator {
    return new PlaybookCurator({
      outputPath: outputPath ?? this.config.playbookPath,
      maxHistory: this.config.maxHistory,
    });
  }
}
