/**
 * Collaborators shared by every job the worker runs
 */

import type { Settings } from '@caselens/config';
import { closeDatabase, createDbAuditSink, openDatabase } from '@caselens/db';
import type { Db } from '@caselens/db';
import type { AuditSink } from '@caselens/core';
import { createContentStore } from '@caselens/storage';
import type { ContentStore } from '@caselens/storage';
import { createDocumentParser } from '@caselens/layout';
import type { DocumentParser } from '@caselens/layout';
import { createLlmClientFromSettings } from '@caselens/llm';
import type { LlmClient } from '@caselens/llm';
import { createCmsClientFromSettings } from '@caselens/cms';
import type { CaseManagementClient } from '@caselens/cms';
import type { AnalysisTask, ExecutionMode } from '@caselens/analysis';

export interface WorkerContainer {
  settings: Settings;
  db: Db;
  contentStore: ContentStore;
  parser: DocumentParser;
  llm: LlmClient;
  createCmsClient: () => CaseManagementClient;
  audit: AuditSink;
  tasks?: AnalysisTask[];
  analysisMode?: ExecutionMode;
}

export function createContainer(settings: Settings): WorkerContainer {
  const db = openDatabase(settings.database.path);
  return {
    settings,
    db,
    contentStore: createContentStore(settings.storage),
    parser: createDocumentParser(settings.layout),
    llm: createLlmClientFromSettings(settings.llm),
    // a fresh client per ingestion, so tokens never outlive one run
    createCmsClient: () => createCmsClientFromSettings(settings.cms),
    audit: createDbAuditSink(db),
  };
}

export function closeContainer(container: WorkerContainer): void {
  closeDatabase(container.db);
}
