export * from './client.js';
export * from './json.js';
export * from './template.js';
export type { LlmClient, LlmClientConfig, LlmProvider, CompletionOptions } from './types.js';
