import pino from 'pino';
import { ValidationError } from '@caselens/core';
import { renderTemplate } from '@caselens/llm';
import { AnalysisResponseSchema, findingToDraft } from '../types.js';
import type { AnalysisInput, AnalysisResultDraft, AnalysisWorker, WorkerDeps, WorkerSpec } from '../types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

type SimpleLlmSpec = Extract<WorkerSpec, { kind: 'simple-llm' }>;

/**
 * One model call with a template carried in the task config
 */
export function createSimpleLlmWorker(spec: SimpleLlmSpec, { llm }: Pick<WorkerDeps, 'llm'>): AnalysisWorker {
  return {
    async analyze(input: AnalysisInput): Promise<AnalysisResultDraft[]> {
      if (!spec.promptTemplate || spec.promptTemplate.trim().length === 0) {
        throw new ValidationError('Prompt template is not provided');
      }

      const prompt = renderTemplate(spec.promptTemplate, { contextText: input.text });
      const response = await llm.completeJson(prompt, AnalysisResponseSchema);
      const drafts = (response.analysis_results ?? []).map((finding) =>
        findingToDraft(finding, input, { themeId: spec.themeId, patternId: spec.patternId })
      );

      logger.info(
        { event: 'analysis.simple_llm.success', sectionId: input.sectionId, analysisJobId: input.analysisJobId, results: drafts.length },
        `Found ${drafts.length} results`
      );
      return drafts;
    },
  };
}
