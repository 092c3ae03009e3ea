/**
 * In-process LLM client for tests
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { LlmResponseError } from '@caselens/core';
import { parseJsonResponse } from './json.js';
import type { LlmClient } from './types.js';

export type FakeResponder = (prompt: string, callIndex: number) => string | Promise<string>;

export interface FakeLlmClient extends LlmClient {
  prompts: string[];
}

/**
 * Client whose completions come from respond(); every prompt is recorded
 */
export function createFakeLlmClient(respond: FakeResponder): FakeLlmClient {
  const prompts: string[] = [];

  async function complete(prompt: string): Promise<string> {
    const index = prompts.length;
    prompts.push(prompt);
    return respond(prompt, index);
  }

  return {
    prompts,
    complete,
    async completeJson<T>(prompt: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
      const raw = await complete(prompt);
      const validated = schema.safeParse(parseJsonResponse(raw));
      if (!validated.success) {
        throw new LlmResponseError('LLM response failed validation', raw);
      }
      return validated.data;
    },
  };
}
