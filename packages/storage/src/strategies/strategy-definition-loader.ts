/**
 * Strategy definition file loader
 *
 * A definition file holds one JSON mapping or a list of mappings. Shape
 * validation of each mapping happens where the grid is expanded.
 */

import { promises as fs } from 'node:fs';
import { ConfigurationError, NotFoundError } from '@racelab/utils';

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function loadStrategyDefinitions(path: string): Promise<Record<string, unknown>[]> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf8');
  } catch {
    throw new NotFoundError('Strategy definition file', path);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Strategy definition file ${path} is not valid JSON`, 'strategies', {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  if (isMapping(data)) return [data];
  if (Array.isArray(data) && data.every(isMapping)) return data;
  throw new ConfigurationError(
    `Unsupported strategy definition in ${path}: expected an object or a list of objects`,
    'strategies',
    { path }
  );
}
