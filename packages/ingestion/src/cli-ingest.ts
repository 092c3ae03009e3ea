/**
 * CLI script to run one ingestion
 *
 * Usage: npm run ingest -- --filepath ./samples/report.pdf [--experiment exp-1]
 *        npm run ingest -- --blob FILEPATH/report.pdf
 *        npm run ingest -- --urn 01AB2345678
 *        npm run ingest -- --urns 01AB2345678,02CD3456789
 */

import { resolve } from 'path';
import { initEnv, loadSettings } from '@caselens/config';
import { closeDatabase, createDbAuditSink, openDatabase } from '@caselens/db';
import { createContentStore } from '@caselens/storage';
import { createDocumentParser } from '@caselens/layout';
import { createLlmClientFromSettings } from '@caselens/llm';
import { createCmsClientFromSettings } from '@caselens/cms';
import { errorMessage } from '@caselens/core';
import { IngestionOrchestrator } from './orchestrator.js';
import type { IngestionTrigger } from './types.js';

// Load env (centralized)
initEnv();

const USAGE = 'Usage: cli-ingest (--filepath <path> | --blob <name> | --urn <urn> | --urns <a,b,...>) [--experiment <id>]';

function parseArgs(args: string[]): { trigger: IngestionTrigger; experimentId?: string } | null {
  let trigger: IngestionTrigger | null = null;
  let experimentId: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[i + 1];
    if (value === undefined) {
      break;
    }
    switch (flag) {
      case '--filepath':
        trigger = { type: 'filepath', filePath: resolve(value) };
        break;
      case '--blob':
        trigger = { type: 'blob_name', blobName: value };
        break;
      case '--urn':
        trigger = { type: 'urn', urn: value };
        break;
      case '--urns':
        trigger = { type: 'urn_list', urns: value.split(',').map((urn) => urn.trim()).filter(Boolean) };
        break;
      case '--experiment':
        experimentId = value;
        break;
      default:
        continue;
    }
    i++;
  }

  return trigger ? { trigger, experimentId } : null;
}

async function main() {
  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed) {
    console.error(USAGE);
    process.exit(2);
  }

  const settings = loadSettings();
  const db = openDatabase(settings.database.path);
  console.log(`🌱 Ingesting ${parsed.trigger.type} into ${settings.database.path}`);

  try {
    const orchestrator = new IngestionOrchestrator({
      settings,
      db,
      contentStore: createContentStore(settings.storage),
      parser: createDocumentParser(settings.layout),
      llm: createLlmClientFromSettings(settings.llm),
      createCmsClient: () => createCmsClientFromSettings(settings.cms),
      audit: createDbAuditSink(db),
    });

    const startTime = Date.now();
    const result = await orchestrator.ingest(parsed.trigger, parsed.experimentId);
    const duration = Date.now() - startTime;

    console.log(result.success ? `\n✅ Ingestion complete!` : `\n❌ Ingestion failed: ${result.error}`);
    console.log(`   Experiment: ${result.experimentId ?? '-'}`);
    console.log(`   Cases: ${result.caseIds.length}, documents: ${result.documentIds.length}, versions: ${result.versionIds.length}`);
    console.log(`   Sections: ${result.sectionIds.join(', ') || 'none'}`);
    console.log(`   Duration: ${duration}ms`);

    console.log(
      JSON.stringify({
        event: result.success ? 'ingestion.cli.success' : 'ingestion.cli.fail',
        triggerType: parsed.trigger.type,
        experimentId: result.experimentId,
        sectionCount: result.sectionIds.length,
        error: result.error,
        durationMs: duration,
      })
    );

    if (!result.success) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(`\n❌ Ingestion failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    closeDatabase(db);
  }
}

main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
