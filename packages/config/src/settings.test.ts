import { describe, it, expect } from 'vitest';
import { buildSettings, loadSettings } from './settings.js';
import { validateRequiredEnv, requireEnv, maskValue } from './env.js';
import { ValidationError } from '@caselens/core';

describe('loadSettings', () => {
  it('should fill defaults when the environment is empty', () => {
    const settings = loadSettings({});

    expect(settings.storage.provider).toBe('memory');
    expect(settings.storage.sourceContainer).toBe('corpus');
    expect(settings.storage.processedContainer).toBe('processed');
    expect(settings.storage.sectionContainer).toBe('sections');
    expect(settings.retry).toEqual({ attempts: 3, delayMs: 1000 });
    expect(settings.llm.provider).toBe('OPENAI');
    expect(settings.llm.maxRetries).toBe(0);
    expect(settings.layout.provider).toBe('text');
  });

  it('should coerce numbers and normalise provider casing', () => {
    const settings = loadSettings({
      STORAGE_PROVIDER: 'MinIO',
      LLM_PROVIDER: 'azure_openai',
      RETRY_ATTEMPTS: '5',
      RETRY_DELAY_MS: '250',
      STORAGE_SOURCE_CONTAINER: 'raw-docs',
      CMS_ENDPOINT: '  ',
    });

    expect(settings.storage.provider).toBe('minio');
    expect(settings.llm.provider).toBe('AZURE_OPENAI');
    expect(settings.retry).toEqual({ attempts: 5, delayMs: 250 });
    expect(settings.storage.sourceContainer).toBe('raw-docs');
    expect(settings.cms.endpoint).toBeUndefined();
  });

  it('should reject invalid values with a ValidationError', () => {
    expect(() => loadSettings({ RETRY_ATTEMPTS: 'zero' })).toThrow(ValidationError);
    expect(() => loadSettings({ STORAGE_PROVIDER: 'ftp' })).toThrow(/storage\.provider/);
  });
});

describe('buildSettings', () => {
  it('should accept partial sections', () => {
    const settings = buildSettings({ retry: { attempts: 1, delayMs: 0 } });
    expect(settings.retry).toEqual({ attempts: 1, delayMs: 0 });
    expect(settings.database.path).toBe('./data/caselens.db');
  });
});

describe('env helpers', () => {
  it('should list missing and blank keys', () => {
    const result = validateRequiredEnv(['A', 'B', 'C'], { A: 'x', B: '   ' });
    expect(result).toEqual({ valid: false, missing: ['B', 'C'] });
  });

  it('should trim required values and throw on blanks', () => {
    expect(requireEnv('KEY', { KEY: '  value ' })).toBe('value');
    expect(() => requireEnv('KEY', { KEY: '' })).toThrow(/Missing or empty required environment variable: KEY/);
  });

  it('should mask secrets', () => {
    expect(maskValue('short')).toBe('*****');
    expect(maskValue('test-secret-value')).toBe('test...alue');
  });
});
