import { describe, it, expect, vi } from 'vitest';
import { RemoteServiceError } from '@caselens/core';
import { createAzureLayoutParser } from './azure.js';
import { createPlainTextParser } from './text.js';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

describe('createPlainTextParser', () => {
  it('should decode text into one page with paragraphs', async () => {
    const parsed = await createPlainTextParser().parse(Buffer.from('First para\nline two\r\n\r\nSecond para'));

    expect(parsed.content).toBe('First para\nline two\n\nSecond para');
    expect(parsed.pages).toEqual([{ pageNumber: 1, lineCount: 4 }]);
    expect(parsed.paragraphs).toEqual(['First para\nline two', 'Second para']);
  });
});

describe('createAzureLayoutParser', () => {
  it('should submit the document and poll the operation until it succeeds', async () => {
    const responses = [
      new Response(null, { status: 202, headers: { 'Operation-Location': 'https://layout.test/operations/1' } }),
      new Response(JSON.stringify({ status: 'running' })),
      new Response(
        JSON.stringify({
          status: 'succeeded',
          analyzeResult: {
            content: 'Officer report text',
            pages: [{ pageNumber: 1, lines: [{}, {}] }],
            paragraphs: [{ content: 'Officer report text' }],
          },
        })
      ),
    ];
    const fetchFn = vi.fn(async (..._args: FetchArgs) => responses.shift() ?? new Response('gone', { status: 500 }));
    const parser = createAzureLayoutParser({
      endpoint: 'https://layout.test/',
      apiKey: 'test-secret',
      pollIntervalMs: 1,
      fetchFn,
    });

    const parsed = await parser.parse(Buffer.from('%PDF'));

    expect(parsed.content).toBe('Officer report text');
    expect(parsed.pages).toEqual([{ pageNumber: 1, lineCount: 2 }]);
    expect(parsed.paragraphs).toEqual(['Officer report text']);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(fetchFn.mock.calls[0]?.[0]).toBe(
      'https://layout.test/documentintelligence/documentModels/prebuilt-layout:analyze?api-version=2024-11-30'
    );
    expect(fetchFn.mock.calls[1]?.[0]).toBe('https://layout.test/operations/1');
  });

  it('should raise when the analysis fails', async () => {
    const responses = [
      new Response(null, { status: 202, headers: { 'Operation-Location': 'https://layout.test/operations/2' } }),
      new Response(JSON.stringify({ status: 'failed', error: { message: 'corrupt file' } })),
    ];
    const parser = createAzureLayoutParser({
      endpoint: 'https://layout.test',
      apiKey: 'test-secret',
      pollIntervalMs: 1,
      fetchFn: vi.fn(async () => responses.shift() ?? new Response('gone', { status: 500 })),
    });

    await expect(parser.parse(Buffer.from('x'))).rejects.toThrow('Layout analysis failed: corrupt file');
  });

  it('should stop polling after the configured limit', async () => {
    const parser = createAzureLayoutParser({
      endpoint: 'https://layout.test',
      apiKey: 'test-secret',
      pollIntervalMs: 1,
      maxPolls: 2,
      fetchFn: vi.fn(async (...[input]: FetchArgs) =>
        String(input).includes(':analyze')
          ? new Response(null, { status: 202, headers: { 'Operation-Location': 'https://layout.test/operations/3' } })
          : new Response(JSON.stringify({ status: 'running' }))
      ),
    });

    await expect(parser.parse(Buffer.from('x'))).rejects.toBeInstanceOf(RemoteServiceError);
  });
});
