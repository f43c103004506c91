/**
 * @racelab/workflows
 *
 * Orchestration over backtest, storage and analytics. Workflows take a
 * context and a JSON-serializable request and return a JSON-serializable summary.
 */

export { createRunContext } from './context/createRunContext.js';
export type { RunContext, RunContextConfig } from './context/createRunContext.js';

export { runAceLoop, AceRunRequestSchema } from './ace/runAceLoop.js';
export type { AceRunRequest, AceRunSummary } from './ace/runAceLoop.js';
export { diagnoseRunnerTable } from './ace/diagnostics.js';
export type { RunnerDiagnostics } from './ace/diagnostics.js';
