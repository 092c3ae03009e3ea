import type { AnalysisWorker, WorkerDeps, WorkerSpec } from '../types.js';
import { createCriticGraphWorker } from './critic-graph.js';
import { createEchoWorker } from './echo.js';
import { createPromptLlmWorker } from './prompt-llm.js';
import { createSimpleLlmWorker } from './simple-llm.js';

export { createCriticGraphWorker, mergeFragment, toWitnessFlag } from './critic-graph.js';
export type { BranchFields, BranchFragment, Candidate, CandidateRecord } from './critic-graph.js';
export { createEchoWorker } from './echo.js';
export { createPromptLlmWorker } from './prompt-llm.js';
export { createSimpleLlmWorker } from './simple-llm.js';

/**
 * Build a fresh worker for a task's worker config
 */
export function createWorker(spec: WorkerSpec, deps: WorkerDeps): AnalysisWorker {
  switch (spec.kind) {
    case 'echo':
      return createEchoWorker(spec);
    case 'simple-llm':
      return createSimpleLlmWorker(spec, deps);
    case 'prompt-llm':
      return createPromptLlmWorker(spec, deps);
    case 'critic-graph':
      return createCriticGraphWorker(spec, deps);
  }
}
