#!/usr/bin/env tsx

/**
 * racelab CLI Entry Point
 *
 * Command modules register themselves in commandRegistry when imported.
 * registerXCommands functions add Commander options and wire them to execute().
 */

// Loaded first: the logger reads LOG_* variables when its module is evaluated
import 'dotenv/config';
import { buildProgram } from '../program.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
