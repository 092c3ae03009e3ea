/**
 * Document Intelligence layout client (REST)
 *
 * Submits the document to the analyze endpoint, then polls the returned
 * Operation-Location until the analysis succeeds or fails.
 */

import { z } from 'zod';
import pino from 'pino';
import { RemoteServiceError, ValidationError } from '@caselens/core';
import type { AzureLayoutConfig, DocumentParser, ParsedDocument } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const AnalyzeResultSchema = z
  .object({
    content: z.string().default(''),
    pages: z
      .array(
        z
          .object({
            pageNumber: z.number(),
            lines: z.array(z.unknown()).optional(),
          })
          .passthrough()
      )
      .default([]),
    paragraphs: z.array(z.object({ content: z.string() }).passthrough()).optional(),
  })
  .passthrough();

const OperationSchema = z
  .object({
    status: z.enum(['notStarted', 'running', 'succeeded', 'failed', 'canceled']),
    analyzeResult: AnalyzeResultSchema.optional(),
    error: z.object({ code: z.string().optional(), message: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createAzureLayoutParser(config: AzureLayoutConfig): DocumentParser {
  const {
    apiKey,
    apiVersion = '2024-11-30',
    modelId = 'prebuilt-layout',
    pollIntervalMs = 1000,
    maxPolls = 120,
    timeoutMs = 60000,
    fetchFn = fetch,
  } = config;

  if (!config.endpoint || !apiKey) {
    throw new ValidationError('LAYOUT_ENDPOINT and LAYOUT_API_KEY are required for the azure layout parser');
  }
  const endpoint = config.endpoint.replace(/\/+$/, '');

  async function send(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetchFn(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new RemoteServiceError(
          'layout',
          `Layout API error: ${response.status} ${response.statusText}`,
          response.status,
          body.substring(0, 500)
        );
      }
      return response;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new RemoteServiceError('layout', `Layout API request timeout (${timeoutMs}ms)`, 408);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  return {
    async parse(data: Buffer): Promise<ParsedDocument> {
      const startTime = Date.now();
      const analyzeUrl = `${endpoint}/documentintelligence/documentModels/${modelId}:analyze?api-version=${encodeURIComponent(apiVersion)}`;

      const submitted = await send(analyzeUrl, {
        method: 'POST',
        headers: {
          'Ocp-Apim-Subscription-Key': apiKey,
          'Content-Type': 'application/octet-stream',
        },
        body: data,
      });

      const operationLocation = submitted.headers.get('Operation-Location');
      if (!operationLocation) {
        throw new RemoteServiceError('layout', 'Layout API response is missing the Operation-Location header', submitted.status);
      }

      logger.info({ event: 'layout.analyze.submitted', modelId, bytes: data.byteLength }, 'Layout analysis submitted');

      for (let poll = 1; poll <= maxPolls; poll++) {
        await sleep(pollIntervalMs);
        const response = await send(operationLocation, {
          method: 'GET',
          headers: { 'Ocp-Apim-Subscription-Key': apiKey },
        });
        const operation = OperationSchema.parse(await response.json());

        if (operation.status === 'succeeded') {
          const result = operation.analyzeResult ?? AnalyzeResultSchema.parse({});
          logger.info(
            { event: 'layout.analyze.success', pages: result.pages.length, polls: poll, durationMs: Date.now() - startTime },
            'Layout analysis succeeded'
          );
          return {
            content: result.content,
            pages: result.pages.map((page) => ({ pageNumber: page.pageNumber, lineCount: page.lines?.length ?? 0 })),
            paragraphs: (result.paragraphs ?? []).map((paragraph) => paragraph.content),
            raw: result,
          };
        }

        if (operation.status === 'failed' || operation.status === 'canceled') {
          throw new RemoteServiceError(
            'layout',
            `Layout analysis ${operation.status}: ${operation.error?.message ?? 'no detail'}`
          );
        }
      }

      throw new RemoteServiceError('layout', `Layout analysis did not finish after ${maxPolls} polls`);
    },
  };
}
