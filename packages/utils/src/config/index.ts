/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration for the experience and playbook loops.
 */

import { ConfigurationError } from '../errors.js';

export interface AceConfig {
  experienceDir: string;
  playbookPath: string;
  minBets: number;
  maxHistory: number;
  significanceAlpha: number;
  partitionByDate: boolean;
}

type Env = Record<string, string | undefined>;

function parseNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got '${raw}'`, key);
  }
  return value;
}

function parsePositiveInteger(env: Env, key: string, fallback: number): number {
  const value = parseNumber(env, key, fallback);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${key} must be a positive integer, got '${env[key]}'`, key);
  }
  return value;
}

function parseBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(`${key} must be a boolean, got '${raw}'`, key);
}

/**
 * Load ACE loop configuration from environment variables
 */
export function getAceConfig(env: Env = process.env): AceConfig {
  const { ACE_EXPERIENCE_DIR, ACE_PLAYBOOK_PATH } = env;

  const significanceAlpha = parseNumber(env, 'ACE_SIGNIFICANCE_ALPHA', 0.05);
  if (significanceAlpha <= 0 || significanceAlpha >= 1) {
    throw new ConfigurationError(
      `ACE_SIGNIFICANCE_ALPHA must be in (0, 1), got ${significanceAlpha}`,
      'ACE_SIGNIFICANCE_ALPHA'
    );
  }

  return {
    experienceDir: ACE_EXPERIENCE_DIR || 'data/experiences',
    playbookPath: ACE_PLAYBOOK_PATH || 'artifacts/playbook/playbook.json',
    minBets: parsePositiveInteger(env, 'ACE_MIN_BETS', 30),
    maxHistory: parsePositiveInteger(env, 'ACE_MAX_HISTORY', 10),
    significanceAlpha,
    partitionByDate: parseBoolean(env, 'ACE_PARTITION_BY_DATE', true),
  };
}
