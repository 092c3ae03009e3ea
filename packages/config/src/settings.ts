/**
 * Typed application settings
 *
 * Built once from the environment and passed by construction to whatever needs it.
 * Tests build their own values with buildSettings().
 */

import { z } from 'zod';
import { ValidationError } from '@caselens/core';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const lowerEnum = <const T extends [string, ...string[]]>(values: T) =>
  z.preprocess((value) => (typeof value === 'string' ? value.trim().toLowerCase() : value), z.enum(values));

const upperEnum = <const T extends [string, ...string[]]>(values: T) =>
  z.preprocess((value) => (typeof value === 'string' ? value.trim().toUpperCase() : value), z.enum(values));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const StorageSettingsSchema = z.object({
  provider: lowerEnum(['s3', 'r2', 'minio', 'memory']).default('memory'),
  endpoint: optionalString,
  region: z.string().default('us-east-1'),
  accessKeyId: optionalString,
  secretAccessKey: optionalString,
  sourceContainer: z.string().min(1).default('corpus'),
  processedContainer: z.string().min(1).default('processed'),
  sectionContainer: z.string().min(1).default('sections'),
});

export const LlmSettingsSchema = z.object({
  provider: upperEnum(['OPENAI', 'AZURE_OPENAI']).default('OPENAI'),
  apiKey: optionalString,
  baseUrl: optionalString,
  model: z.string().min(1).default('gpt-4o-mini'),
  apiVersion: z.string().default('2024-10-21'),
  temperature: z.coerce.number().min(0).max(2).default(0),
  timeoutMs: positiveInt(60_000),
  maxRetries: z.coerce.number().int().min(0).default(0),
});

export const LayoutSettingsSchema = z.object({
  provider: lowerEnum(['azure', 'text']).default('text'),
  endpoint: optionalString,
  apiKey: optionalString,
  apiVersion: z.string().default('2024-11-30'),
  pollIntervalMs: positiveInt(1000),
  maxPolls: positiveInt(120),
  timeoutMs: positiveInt(60_000),
});

export const CmsSettingsSchema = z.object({
  endpoint: optionalString,
  functionKey: optionalString,
  username: optionalString,
  password: optionalString,
  timeoutMs: positiveInt(30_000),
});

export const SettingsSchema = z.object({
  app: z.object({
    name: z.string().default('caselens'),
    environment: z.string().default('development'),
    logLevel: z.string().default('info'),
  }),
  database: z.object({
    path: z.string().min(1).default('./data/caselens.db'),
  }),
  storage: StorageSettingsSchema,
  llm: LlmSettingsSchema,
  layout: LayoutSettingsSchema,
  cms: CmsSettingsSchema,
  retry: z.object({
    attempts: positiveInt(3),
    delayMs: z.coerce.number().int().min(0).default(1000),
  }),
  redis: z.object({
    url: z.string().default('redis://localhost:6379'),
  }),
  worker: z.object({
    concurrency: positiveInt(2),
  }),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
export type StorageSettings = Settings['storage'];
export type LlmSettings = Settings['llm'];
export type LayoutSettings = Settings['layout'];
export type CmsSettings = Settings['cms'];

const SECTION_KEYS = ['app', 'database', 'storage', 'llm', 'layout', 'cms', 'retry', 'redis', 'worker'] as const;

function parseSettings(raw: Record<string, unknown>): Settings {
  const withSections: Record<string, unknown> = { ...raw };
  for (const key of SECTION_KEYS) {
    withSections[key] = withSections[key] ?? {};
  }

  const parsed = SettingsSchema.safeParse(withSections);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid settings: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Validate a settings tree, filling defaults
 */
export function buildSettings(input: Partial<SettingsInput> = {}): Settings {
  return parseSettings(input);
}

/**
 * Read settings from environment variables
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const read = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value && value.length > 0 ? value : undefined;
  };

  return parseSettings({
    app: {
      name: read('APP_NAME'),
      environment: read('APP_ENV') || read('NODE_ENV'),
      logLevel: read('LOG_LEVEL'),
    },
    database: {
      path: read('DATABASE_PATH'),
    },
    storage: {
      provider: read('STORAGE_PROVIDER'),
      endpoint: read('STORAGE_ENDPOINT'),
      region: read('STORAGE_REGION'),
      accessKeyId: read('STORAGE_ACCESS_KEY_ID'),
      secretAccessKey: read('STORAGE_SECRET_ACCESS_KEY'),
      sourceContainer: read('STORAGE_SOURCE_CONTAINER'),
      processedContainer: read('STORAGE_PROCESSED_CONTAINER'),
      sectionContainer: read('STORAGE_SECTION_CONTAINER'),
    },
    llm: {
      provider: read('LLM_PROVIDER'),
      apiKey: read('LLM_API_KEY'),
      baseUrl: read('LLM_BASE_URL'),
      model: read('LLM_MODEL'),
      apiVersion: read('LLM_API_VERSION'),
      temperature: read('LLM_TEMPERATURE'),
      timeoutMs: read('LLM_TIMEOUT_MS'),
      maxRetries: read('LLM_MAX_RETRIES'),
    },
    layout: {
      provider: read('LAYOUT_PROVIDER'),
      endpoint: read('LAYOUT_ENDPOINT'),
      apiKey: read('LAYOUT_API_KEY'),
      apiVersion: read('LAYOUT_API_VERSION'),
      pollIntervalMs: read('LAYOUT_POLL_INTERVAL_MS'),
      maxPolls: read('LAYOUT_MAX_POLLS'),
      timeoutMs: read('LAYOUT_TIMEOUT_MS'),
    },
    cms: {
      endpoint: read('CMS_ENDPOINT'),
      functionKey: read('CMS_FUNCTION_KEY'),
      username: read('CMS_USERNAME'),
      password: read('CMS_PASSWORD'),
      timeoutMs: read('CMS_TIMEOUT_MS'),
    },
    retry: {
      attempts: read('RETRY_ATTEMPTS'),
      delayMs: read('RETRY_DELAY_MS'),
    },
    redis: {
      url: read('REDIS_URL'),
    },
    worker: {
      concurrency: read('WORKER_CONCURRENCY'),
    },
  });
}
