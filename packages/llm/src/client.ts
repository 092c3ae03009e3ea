/**
 * Chat-completion client (OpenAI or Azure OpenAI)
 */

import { z } from 'zod';
import type { ZodType, ZodTypeDef } from 'zod';
import pino from 'pino';
import { LlmResponseError, RemoteServiceError, ValidationError, errorMessage } from '@caselens/core';
import type { LlmSettings } from '@caselens/config';
import { parseJsonResponse } from './json.js';
import type { CompletionOptions, LlmClient, LlmClientConfig } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      total_tokens: z.number().optional(),
    })
    .optional(),
});

const DEFAULT_SYSTEM_PROMPT = 'You are a careful legal document analyst. Follow the instructions exactly.';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create LLM client
 */
export function createLlmClient(config: LlmClientConfig): LlmClient {
  const {
    provider,
    apiKey,
    model = 'gpt-4o-mini',
    apiVersion = '2024-10-21',
    temperature = 0,
    timeout = 60000,
    maxRetries = 0,
    systemPrompt = DEFAULT_SYSTEM_PROMPT,
    fetchFn = fetch,
  } = config;

  if (!apiKey || apiKey.trim().length === 0) {
    throw new ValidationError('LLM API key is required');
  }

  let url: string;
  let headers: Record<string, string>;
  if (provider === 'OPENAI') {
    const baseUrl = (config.baseUrl || 'https://api.openai.com/v1').replace(/\/+$/, '');
    url = `${baseUrl}/chat/completions`;
    headers = { Authorization: `Bearer ${apiKey}`, 'Content-Type': 'application/json' };
  } else if (provider === 'AZURE_OPENAI') {
    if (!config.baseUrl) {
      throw new ValidationError('LLM base URL (Azure OpenAI endpoint) is required for provider AZURE_OPENAI');
    }
    const endpoint = config.baseUrl.replace(/\/+$/, '');
    url = `${endpoint}/openai/deployments/${encodeURIComponent(model)}/chat/completions?api-version=${encodeURIComponent(apiVersion)}`;
    headers = { 'api-key': apiKey, 'Content-Type': 'application/json' };
  } else {
    throw new ValidationError(`Unsupported LLM provider: ${String(provider)}`);
  }

  /**
   * POST with timeout and transport retries (429, 5xx, timeout)
   */
  async function request(body: Record<string, unknown>): Promise<z.infer<typeof ChatCompletionSchema>> {
    const startTime = Date.now();

    logger.debug({ event: 'llm.request.start', provider, model, timeoutMs: timeout }, 'Starting LLM API request');

    for (let attempt = 0; ; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      let retryReason: string | null = null;
      let waitMs = Math.min(1000 * Math.pow(2, attempt), 10000);

      try {
        const response = await fetchFn(url, {
          method: 'POST',
          headers,
          body: JSON.stringify(body),
          signal: controller.signal,
        });

        if (response.status === 429) {
          retryReason = 'rate_limit';
          const retryAfter = response.headers.get('Retry-After');
          if (retryAfter) {
            waitMs = Number.parseInt(retryAfter, 10) * 1000 || waitMs;
          }
        } else if (response.status >= 500) {
          retryReason = 'server_error';
        }

        if (retryReason && attempt < maxRetries) {
          await response.text().catch(() => '');
        } else if (!response.ok) {
          const responseBody = await response.text().catch(() => '');
          const kind = response.status === 401 || response.status === 403 ? 'authentication error' : 'error';
          logger.error(
            {
              event: 'llm.request.fail',
              statusCode: response.status,
              durationMs: Date.now() - startTime,
              attempt: attempt + 1,
            },
            'LLM API request failed'
          );
          throw new RemoteServiceError(
            'llm',
            `LLM API ${kind}: ${response.status} ${response.statusText}`,
            response.status,
            responseBody.substring(0, 500)
          );
        } else {
          const parsed = ChatCompletionSchema.safeParse(await response.json());
          if (!parsed.success) {
            throw new LlmResponseError(`Unexpected LLM API response shape: ${parsed.error.message}`);
          }

          logger.info(
            {
              event: 'llm.request.success',
              durationMs: Date.now() - startTime,
              attempt: attempt + 1,
              tokens: parsed.data.usage?.total_tokens,
            },
            'LLM API request succeeded'
          );
          return parsed.data;
        }
      } catch (error) {
        if (!(error instanceof Error && error.name === 'AbortError')) {
          throw error;
        }
        retryReason = 'timeout';
        if (attempt >= maxRetries) {
          logger.error(
            { event: 'llm.request.fail', errorType: 'timeout', durationMs: Date.now() - startTime, attempt: attempt + 1 },
            'LLM API request timeout'
          );
          throw new RemoteServiceError('llm', `LLM API request timeout after ${timeout}ms`);
        }
      } finally {
        clearTimeout(timeoutId);
      }

      logger.info(
        { event: 'llm.request.retry', attempt: attempt + 1, reason: retryReason, waitMs },
        `LLM request retrying in ${waitMs}ms`
      );
      await sleep(waitMs);
    }
  }

  async function complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const body: Record<string, unknown> = {
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: prompt },
      ],
      temperature: options.temperature ?? temperature,
    };
    if (provider === 'OPENAI') {
      body.model = model;
    }
    if (options.json) {
      body.response_format = { type: 'json_object' };
    }
    if (options.maxTokens !== undefined) {
      body.max_tokens = options.maxTokens;
    }

    const response = await request(body);
    return response.choices[0]?.message.content ?? '';
  }

  return {
    complete,

    async completeJson<T>(prompt: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
      const raw = await complete(prompt, { json: true });
      const validated = schema.safeParse(parseJsonResponse(raw));
      if (!validated.success) {
        logger.warn(
          { event: 'llm.response.invalid', issues: validated.error.issues.length },
          'LLM response failed schema validation'
        );
        throw new LlmResponseError(`LLM response failed validation: ${errorMessage(validated.error)}`, raw.substring(0, 500));
      }
      return validated.data;
    },
  };
}

/**
 * Build a client from LLM settings
 */
export function createLlmClientFromSettings(settings: LlmSettings): LlmClient {
  return createLlmClient({
    provider: settings.provider,
    apiKey: settings.apiKey ?? '',
    baseUrl: settings.baseUrl,
    model: settings.model,
    apiVersion: settings.apiVersion,
    temperature: settings.temperature,
    timeout: settings.timeoutMs,
    maxRetries: settings.maxRetries,
  });
}
