/**
 * Types for section analysis tasks and workers
 */

import { z } from 'zod';
import type { RetryPolicy } from '@caselens/core';
import type { AnalysisResult, Insertable, PromptTemplateRepository } from '@caselens/db';
import type { LlmClient } from '@caselens/llm';

export type WorkerSpec =
  | { kind: 'echo'; content: string; justification?: string; selfConfidence?: number }
  | { kind: 'simple-llm'; promptTemplate: string; themeId?: string; patternId?: string }
  | { kind: 'prompt-llm'; themeId: string; patternId: string }
  | { kind: 'critic-graph'; themeId: string; patternId: string };

export type WorkerKind = WorkerSpec['kind'];

export interface AnalysisTask {
  taskId: string;
  worker: WorkerSpec;
  saveResults: boolean;
}

export interface AnalysisInput {
  text: string;
  experimentId: string;
  sectionId: number;
  analysisJobId: number;
}

/**
 * An AnalysisResult row before it is inserted
 */
export type AnalysisResultDraft = Insertable<AnalysisResult>;

/**
 * Produces result drafts for one section; persistence belongs to the orchestrator
 */
export interface AnalysisWorker {
  analyze(input: AnalysisInput): Promise<AnalysisResultDraft[]>;
}

export interface WorkerDeps {
  promptTemplates: PromptTemplateRepository;
  llm: LlmClient;
  retry: RetryPolicy;
}

export const FindingSchema = z.object({
  content: z.string(),
  justification: z.string().nullable().optional(),
  categories: z.array(z.string()).nullable().optional(),
  self_confidence: z.coerce.number().nullable().optional(),
});

export const AnalysisResponseSchema = z.object({
  analysis_results: z.array(FindingSchema).nullable().optional(),
});

export type Finding = z.infer<typeof FindingSchema>;

/**
 * Map a model finding onto a result draft
 */
export function findingToDraft(
  finding: Finding,
  input: AnalysisInput,
  extra: { promptTemplateId?: number | null; themeId?: string | null; patternId?: string | null } = {}
): AnalysisResultDraft {
  return {
    analysisJobId: input.analysisJobId,
    experimentId: input.experimentId,
    promptTemplateId: extra.promptTemplateId ?? null,
    themeId: extra.themeId ?? null,
    patternId: extra.patternId ?? null,
    content: finding.content,
    justification: finding.justification ?? null,
    categoryId: (finding.categories ?? []).join(', '),
    selfConfidence: finding.self_confidence ?? null,
  };
}
