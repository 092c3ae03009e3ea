import { ValidationError } from '@caselens/core';
import type { LayoutSettings } from '@caselens/config';
import { createAzureLayoutParser } from './azure.js';
import { createPlainTextParser } from './text.js';
import type { DocumentParser } from './types.js';

export { createAzureLayoutParser } from './azure.js';
export { createPlainTextParser } from './text.js';
export type { AzureLayoutConfig, DocumentParser, ParsedDocument, ParsedPage, ParseOptions } from './types.js';

/**
 * Build the configured document parser
 */
export function createDocumentParser(settings: LayoutSettings): DocumentParser {
  if (settings.provider === 'text') {
    return createPlainTextParser();
  }
  if (!settings.endpoint || !settings.apiKey) {
    throw new ValidationError('LAYOUT_ENDPOINT and LAYOUT_API_KEY are required for the azure layout parser');
  }
  return createAzureLayoutParser({
    endpoint: settings.endpoint,
    apiKey: settings.apiKey,
    apiVersion: settings.apiVersion,
    pollIntervalMs: settings.pollIntervalMs,
    maxPolls: settings.maxPolls,
    timeoutMs: settings.timeoutMs,
  });
}
