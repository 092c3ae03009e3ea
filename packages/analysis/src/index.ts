/**
 * Section analysis: task registry, workers and orchestration
 */

export { AnalysisOrchestrator, type AnalysisOrchestratorDeps, type ExecutionMode } from './orchestrator.js';
export { DEFAULT_PATTERNS, DEFAULT_TASKS, resolveTasks, taskIdFor } from './tasks.js';
export { fanIn, fanOut, type Branch } from './graph.js';
export * from './workers/index.js';
export {
  AnalysisResponseSchema,
  FindingSchema,
  findingToDraft,
  type AnalysisInput,
  type AnalysisResultDraft,
  type AnalysisTask,
  type AnalysisWorker,
  type Finding,
  type WorkerDeps,
  type WorkerKind,
  type WorkerSpec,
} from './types.js';
export {
  DEFAULT_PROMPTS_PATH,
  PromptPackSchema,
  expandPromptPack,
  loadPromptPack,
  seedPrompts,
  type PromptPack,
  type PromptSeed,
} from './seed-prompts.js';
