/**
 * Types for the chat-completion client
 */

import type { ZodType, ZodTypeDef } from 'zod';

export type LlmProvider = 'OPENAI' | 'AZURE_OPENAI';

export interface LlmClientConfig {
  provider: LlmProvider;
  apiKey: string;
  /** OpenAI: API base URL. Azure OpenAI: resource endpoint */
  baseUrl?: string;
  /** OpenAI: model name. Azure OpenAI: deployment name */
  model?: string;
  apiVersion?: string;
  temperature?: number;
  timeout?: number;
  /** Transport-level retries for 429/5xx/timeouts; callers own the retry policy, so this defaults to 0 */
  maxRetries?: number;
  systemPrompt?: string;
  fetchFn?: typeof fetch;
}

export interface CompletionOptions {
  json?: boolean;
  temperature?: number;
  maxTokens?: number;
}

export interface LlmClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
  completeJson<T>(prompt: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T>;
}
