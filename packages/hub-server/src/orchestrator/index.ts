export { Orchestrator, mergedSummary } from './orchestrator.js';
export type { OrchestratorDeps, OrchestratorOptions } from './orchestrator.js';
