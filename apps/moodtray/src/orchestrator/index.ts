export { Orchestrator } from './orchestrator';
export type { OrchestratorOptions, OrchestratorStatus } from './orchestrator';
export { MoodCell } from './mood-cell';
export type { MoodSnapshot } from './mood-cell';
