/**
 * @racelab/core
 *
 * Foundational, shared types for the racelab packages.
 * This package has zero dependencies on other @racelab packages.
 */

export * from './types/runner.js';
export * from './types/strategy.js';
export * from './types/experience.js';
export * from './types/playbook.js';
export * from './hashing.js';
export * from './ports/index.js';
export { EVALUATION_LOGIC_VERSION } from './version.js';
