/**
 * Section extractor
 *
 * Asks the model for the narrative passages of a parsed document, then keeps only
 * the passages that pass the fuzzy subset check against the document text.
 */

import { z } from 'zod';
import pino from 'pino';
import { ValidationError, withRetry } from '@caselens/core';
import type { RetryPolicy } from '@caselens/core';
import type { PromptTemplateRepository } from '@caselens/db';
import { renderTemplate } from '@caselens/llm';
import type { LlmClient } from '@caselens/llm';
import { isValidSubset } from './fuzzy.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const SECTION_EXTRACTOR_AGENT = 'section_extractor';

const ExtractionResponseSchema = z.object({
  narratives: z.array(z.string()).nullable().optional(),
});

export interface SectionExtractor {
  extract(documentText: string): Promise<string[]>;
}

export interface SectionExtractorDeps {
  promptTemplates: PromptTemplateRepository;
  llm: LlmClient;
  retry: RetryPolicy;
}

export function createSectionExtractor({ promptTemplates, llm, retry }: SectionExtractorDeps): SectionExtractor {
  return {
    async extract(documentText: string): Promise<string[]> {
      const template = promptTemplates.getLatest({ agent: SECTION_EXTRACTOR_AGENT });
      if (!template) {
        throw new ValidationError(`No prompt template found for agent '${SECTION_EXTRACTOR_AGENT}'`);
      }

      const prompt = renderTemplate(template.template, { contextText: documentText });
      const response = await withRetry(() => llm.completeJson(prompt, ExtractionResponseSchema), {
        ...retry,
        label: 'extract_sections',
      });

      const narratives = response.narratives ?? [];
      if (narratives.length === 0) {
        logger.info({ event: 'ingestion.extract.empty', promptTemplateId: template.id }, 'No narratives extracted');
        return [];
      }

      const accepted: string[] = [];
      narratives.forEach((narrative, index) => {
        if (isValidSubset(documentText, narrative)) {
          accepted.push(narrative);
        } else {
          logger.warn(
            { event: 'ingestion.extract.rejected', index, chars: narrative.length },
            'Dropping extracted narrative not found in the document'
          );
        }
      });

      logger.info(
        { event: 'ingestion.extract.success', candidates: narratives.length, accepted: accepted.length },
        `Extracted ${accepted.length} sections`
      );
      return accepted;
    },
  };
}
