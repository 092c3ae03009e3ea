/**
 * Centralized environment variable loader
 *
 * Locates repo root and loads .env file deterministically.
 * Provides diagnostics and validation without logging secrets.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';
import { z } from 'zod';

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  requiredKeys: Array<{ key: string; present: boolean; maskedValue?: string; length?: number; source?: string }>;
  warnings: string[];
}

export interface EnvInitResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, string>; // key -> '.env' | '.env.local'
}

const WorkspaceManifestSchema = z.object({
  name: z.string().optional(),
  workspaces: z.unknown().optional(),
});

function isWorkspaceRoot(packageJsonPath: string): boolean {
  try {
    const parsed = WorkspaceManifestSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success && (parsed.data.workspaces !== undefined || parsed.data.name === 'caselens');
  } catch {
    // Unreadable manifest: keep walking up
    return false;
  }
}

/**
 * Find repository root by walking up from current directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);
  const root = resolve('/');

  while (current !== root) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath) && isWorkspaceRoot(packageJsonPath)) {
      return current;
    }

    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return resolve(startPath);
}

/**
 * Mask sensitive values for logging
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

function isSecretKey(key: string): boolean {
  return key.includes('KEY') || key.includes('SECRET') || key.includes('PASSWORD') || key.includes('TOKEN');
}

let cachedResult: EnvInitResult | null = null;

function loadFile(path: string, label: string, keysLoaded: string[], keySources: Record<string, string>): boolean {
  const result = config({ path, override: true });
  const hasParsedValues = !!(result.parsed && Object.keys(result.parsed).length > 0);
  const loaded = result.error === undefined || hasParsedValues;

  if (result.parsed) {
    for (const [key, value] of Object.entries(result.parsed)) {
      if (value.trim().length > 0) {
        keySources[key] = label;
        if (!keysLoaded.includes(key)) {
          keysLoaded.push(key);
        }
      }
    }
  }

  if (!loaded && result.error) {
    console.warn(`[env] Warning: Error loading ${label} file: ${result.error.message}`);
  }
  return loaded;
}

/**
 * Initialize environment variables
 * Must be called before any code reads process.env
 *
 * Loads from:
 * 1. <repo-root>/.env (always, if exists)
 * 2. <repo-root>/.env.local (if exists, overrides .env)
 *
 * An existing non-empty variable is never replaced by an empty value from a file.
 */
export function initEnv(envFileOverride?: string): EnvInitResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot(process.cwd());
  const envFilePath = resolve(envFileOverride || process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const existingEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value && value.trim().length > 0) {
      existingEnv[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  let loaded = false;
  if (existsSync(envFilePath)) {
    loaded = loadFile(envFilePath, '.env', keysLoaded, keySources);
  } else if (process.env.NODE_ENV !== 'test') {
    console.warn(`[env] .env file not found at: ${envFilePath}`);
  }

  const localLoaded = existsSync(envLocalFilePath)
    ? loadFile(envLocalFilePath, '.env.local', keysLoaded, keySources)
    : false;

  for (const [key, existingValue] of Object.entries(existingEnv)) {
    const currentValue = process.env[key];
    if (!currentValue || currentValue.trim().length === 0) {
      process.env[key] = existingValue;
    }
  }

  cachedResult = { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded, keySources };
  return cachedResult;
}

/**
 * Get environment diagnostics (safe for logging, no secrets)
 */
export function getEnvDiagnostics(requiredKeys: readonly string[]): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = findRepoRoot(cwd);
  const envFilePath = resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envFileExists = existsSync(envFilePath);
  const keySources = cachedResult?.keySources || {};

  const requiredKeysStatus = requiredKeys.map((key) => {
    const value = process.env[key]?.trim();
    if (!value) {
      return { key, present: false };
    }
    return {
      key,
      present: true,
      length: value.length,
      maskedValue: isSecretKey(key) ? maskValue(value) : undefined,
      source: keySources[key],
    };
  });

  const warnings: string[] = [];
  if (!envFileExists) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }
  for (const key of requiredKeys) {
    const value = process.env[key];
    if (value && hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
  }

  return { cwd, repoRoot, envFilePath, envFileExists, requiredKeys: requiredKeysStatus, warnings };
}

/**
 * Validate required environment variables
 */
export function validateRequiredEnv(
  requiredKeys: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; missing: string[] } {
  const missing = requiredKeys.filter((key) => !env[key] || env[key]?.trim().length === 0);
  return { valid: missing.length === 0, missing };
}

/**
 * Safe environment variable getter
 * Reads from process.env, trims whitespace, and validates
 *
 * @throws Error with clear message if missing or empty
 */
export function requireEnv(key: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[key];

  if (!value || value.trim().length === 0) {
    throw new Error(
      `Missing or empty required environment variable: ${key}\n` +
        `Please check your .env file and ensure ${key} is set with a non-empty value.`
    );
  }

  return value.trim();
}
