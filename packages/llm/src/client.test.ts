import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { LlmResponseError, RemoteServiceError, ValidationError } from '@caselens/core';
import { createLlmClient } from './client.js';

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }], usage: { total_tokens: 12 } }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('createLlmClient', () => {
  it('should call the OpenAI chat completions endpoint', async () => {
    const fetchFn = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => completion('hello'));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-secret', model: 'test-model', fetchFn });

    await expect(client.complete('prompt')).resolves.toBe('hello');

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' });
    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe('test-model');
    expect(body.messages[1]).toEqual({ role: 'user', content: 'prompt' });
  });

  it('should target the Azure deployment URL with an api-key header', async () => {
    const fetchFn = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => completion('ok'));
    const client = createLlmClient({
      provider: 'AZURE_OPENAI',
      apiKey: 'test-secret',
      baseUrl: 'https://example.openai.azure.com/',
      model: 'deploy-1',
      apiVersion: '2024-10-21',
      fetchFn,
    });

    await client.complete('prompt', { json: true });

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://example.openai.azure.com/openai/deployments/deploy-1/chat/completions?api-version=2024-10-21');
    expect(init?.headers).toEqual({ 'api-key': 'test-secret', 'Content-Type': 'application/json' });
    const body = JSON.parse(String(init?.body));
    expect(body.model).toBeUndefined();
    expect(body.response_format).toEqual({ type: 'json_object' });
  });

  it('should validate JSON completions against a schema', async () => {
    const fetchFn = vi.fn(async () => completion('```json\n{"redacted_text": "[NAME] was seen"}\n```'));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-secret', fetchFn });

    await expect(client.completeJson('p', z.object({ redacted_text: z.string() }))).resolves.toEqual({
      redacted_text: '[NAME] was seen',
    });
  });

  it('should raise LlmResponseError when the JSON does not match the schema', async () => {
    const fetchFn = vi.fn(async () => completion('{"unexpected": 1}'));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-secret', fetchFn });

    await expect(client.completeJson('p', z.object({ redacted_text: z.string() }))).rejects.toBeInstanceOf(LlmResponseError);
  });

  it('should not retry by default and surface the status code', async () => {
    const fetchFn = vi.fn(async () => new Response('overloaded', { status: 503, statusText: 'Service Unavailable' }));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-secret', fetchFn });

    const error = await client.complete('p').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RemoteServiceError);
    expect(error instanceof RemoteServiceError ? error.statusCode : undefined).toBe(503);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should require an API key', () => {
    expect(() => createLlmClient({ provider: 'OPENAI', apiKey: ' ' })).toThrow(ValidationError);
  });
});
