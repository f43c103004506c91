/**
 * @racelab/backtest
 *
 * Strategy model, simulator and experience capture.
 */

export {
  createStrategyConfig,
  toParams,
  type StrategyConfig,
  type StrategyConfigInput,
} from './strategy/strategy-config.js';
export {
  StrategyGrid,
  StrategyDefinitionSchema,
  DEFAULT_GRID_AXES,
  type GridAxes,
  type StrategyDefinition,
} from './strategy/strategy-grid.js';
export {
  equalsFilter,
  oneOfFilter,
  filtersFromRecord,
  filtersToRecord,
  matchesFilter,
} from './strategy/filters.js';
export {
  Simulator,
  type SimulatorOptions,
  type SimulatedBet,
  type SimulationResult,
} from './sim/simulator.js';
export {
  ExperienceBuilder,
  normalizeEventDate,
  type ExperienceBuilderOptions,
} from './experience/experience-builder.js';
export {
  EarlyExperienceRunner,
  type EarlyExperienceRunnerOptions,
  type EarlyExperienceRunOptions,
  type EarlyExperienceOutput,
} from './experience/early-experience-runner.js';
