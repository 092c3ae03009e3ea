/**
 * PII redactor
 *
 * One model call per section using the latest "redactor" prompt, followed by
 * the deterministic identifier scrub.
 */

import { z } from 'zod';
import pino from 'pino';
import { ValidationError, withRetry } from '@caselens/core';
import type { RetryPolicy } from '@caselens/core';
import type { PromptTemplateRepository } from '@caselens/db';
import { renderTemplate } from '@caselens/llm';
import type { LlmClient } from '@caselens/llm';
import { scrubIdentifiers } from './redaction.js';
import type { RedactionReport } from './redaction.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const REDACTOR_AGENT = 'redactor';

const RedactionResponseSchema = z.object({
  redacted_text: z.string(),
});

export interface RedactionOutcome {
  redactedText: string;
  report: RedactionReport;
}

export interface Redactor {
  redact(content: string): Promise<RedactionOutcome>;
}

export interface RedactorDeps {
  promptTemplates: PromptTemplateRepository;
  llm: LlmClient;
  retry: RetryPolicy;
}

export function createRedactor({ promptTemplates, llm, retry }: RedactorDeps): Redactor {
  return {
    async redact(content: string): Promise<RedactionOutcome> {
      const template = promptTemplates.getLatest({ agent: REDACTOR_AGENT });
      if (!template) {
        throw new ValidationError(`No prompt template found for agent '${REDACTOR_AGENT}'`);
      }

      const prompt = renderTemplate(template.template, { contextText: content });
      const response = await withRetry(() => llm.completeJson(prompt, RedactionResponseSchema), {
        ...retry,
        label: 'redact',
      });

      const scrubbed = scrubIdentifiers(response.redacted_text);
      if (scrubbed.report.replacements > 0) {
        logger.warn(
          { event: 'privacy.scrub.residual', patterns: scrubbed.report.patternsMatched, replacements: scrubbed.report.replacements },
          'Identifiers remained after model redaction'
        );
      }

      logger.debug(
        { event: 'privacy.redact.success', promptTemplateId: template.id, inputChars: content.length, outputChars: scrubbed.redactedText.length },
        'Section redacted'
      );
      return scrubbed;
    },
  };
}
