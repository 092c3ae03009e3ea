/**
 * CLI script to load the default prompt templates
 *
 * Usage: npm run seed:prompts [-- --file ./my-prompts.json]
 */

import { resolve } from 'path';
import { initEnv, loadSettings } from '@caselens/config';
import { closeDatabase, createRepositories, openDatabase } from '@caselens/db';
import { errorMessage } from '@caselens/core';
import { DEFAULT_PROMPTS_PATH, expandPromptPack, loadPromptPack, seedPrompts } from './seed-prompts.js';

// Load env (centralized)
initEnv();

function main() {
  const args = process.argv.slice(2);
  const fileIndex = args.indexOf('--file');
  const fileArg = fileIndex >= 0 ? args[fileIndex + 1] : undefined;
  const file = fileArg ? resolve(fileArg) : DEFAULT_PROMPTS_PATH;

  const settings = loadSettings();
  const db = openDatabase(settings.database.path);
  console.log(`🌱 Seeding prompt templates from ${file}`);

  try {
    const saved = seedPrompts(createRepositories(db), expandPromptPack(loadPromptPack(file)));
    console.log(`\n✅ Seeded ${saved.length} prompt templates`);
  } catch (error) {
    console.error(`\n❌ Seeding failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    closeDatabase(db);
  }
}

main();
