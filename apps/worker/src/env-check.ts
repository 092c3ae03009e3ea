/**
 * Worker environment diagnostics script
 * Run with: npm run worker:env
 */

import { initEnv, getEnvDiagnostics, loadSettings, validateRequiredEnv } from '@caselens/config';
import { errorMessage } from '@caselens/core';

const requiredEnvVars = ['REDIS_URL', 'DATABASE_PATH'];
const optionalEnvVars = [
  'LOG_LEVEL',
  'STORAGE_PROVIDER',
  'STORAGE_ENDPOINT',
  'STORAGE_ACCESS_KEY_ID',
  'STORAGE_SECRET_ACCESS_KEY',
  'LLM_PROVIDER',
  'LLM_API_KEY',
  'LLM_BASE_URL',
  'LAYOUT_PROVIDER',
  'LAYOUT_API_KEY',
  'CMS_ENDPOINT',
  'CMS_FUNCTION_KEY',
  'CMS_USERNAME',
  'CMS_PASSWORD',
];

// Initialize env
const { repoRoot, envFilePath, loaded } = initEnv();

console.log('🔍 Worker: Environment Diagnostics\n');
console.log(`   Node version: ${process.version}`);
console.log(`   Environment: ${process.env.NODE_ENV || 'development'}`);
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env loaded: ${loaded ? '✅' : '❌'}\n`);

const diagnostics = getEnvDiagnostics([...requiredEnvVars, ...optionalEnvVars]);

console.log('   Keys:');
for (const key of diagnostics.requiredKeys) {
  const required = requiredEnvVars.includes(key.key);
  const status = key.present ? '✅' : required ? '❌' : '⚪';
  const value = key.maskedValue ? ` (${key.maskedValue})` : '';
  console.log(`     ${status} ${key.key}${value}`);
}

if (diagnostics.warnings.length > 0) {
  console.log('\n   ⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`     - ${warning}`);
  }
}

const validation = validateRequiredEnv(requiredEnvVars);
if (!validation.valid) {
  console.log('\n❌ Missing required environment variables:');
  for (const envVar of validation.missing) {
    console.log(`   - ${envVar}`);
  }
  process.exit(1);
}

try {
  const settings = loadSettings();
  console.log(`\n✅ Settings valid (storage: ${settings.storage.provider}, llm: ${settings.llm.provider}, layout: ${settings.layout.provider})`);
} catch (error) {
  console.log(`\n❌ ${errorMessage(error)}`);
  process.exit(1);
}
