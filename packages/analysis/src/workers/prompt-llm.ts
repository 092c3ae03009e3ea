import pino from 'pino';
import { ValidationError, withRetry } from '@caselens/core';
import { renderTemplate } from '@caselens/llm';
import { AnalysisResponseSchema, findingToDraft } from '../types.js';
import type { AnalysisInput, AnalysisResultDraft, AnalysisWorker, WorkerDeps, WorkerSpec } from '../types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

type PromptLlmSpec = Extract<WorkerSpec, { kind: 'prompt-llm' }>;

/**
 * One model call with the latest template stored for the theme and pattern
 */
export function createPromptLlmWorker(spec: PromptLlmSpec, { promptTemplates, llm, retry }: WorkerDeps): AnalysisWorker {
  return {
    async analyze(input: AnalysisInput): Promise<AnalysisResultDraft[]> {
      const template = promptTemplates.getLatest({ theme: spec.themeId, pattern: spec.patternId });
      if (!template) {
        throw new ValidationError(
          `Prompt template with theme ${spec.themeId} and pattern ${spec.patternId} not found`
        );
      }

      const prompt = renderTemplate(template.template, { contextText: input.text });
      const response = await withRetry(() => llm.completeJson(prompt, AnalysisResponseSchema), {
        ...retry,
        label: `prompt_llm:${spec.themeId}-${spec.patternId}`,
      });

      const drafts = (response.analysis_results ?? []).map((finding) =>
        findingToDraft(finding, input, { promptTemplateId: template.id, themeId: spec.themeId, patternId: spec.patternId })
      );
      logger.info(
        { event: 'analysis.prompt_llm.success', sectionId: input.sectionId, promptTemplateId: template.id, results: drafts.length },
        `Found ${drafts.length} results`
      );
      return drafts;
    },
  };
}
