/**
 * Ingestion orchestrator
 *
 * Routes a trigger to the matching flow, stores raw and parsed documents, and turns
 * every processed version into redacted Section rows with their full text in the
 * section container. ingest() never throws; failures come back on the result.
 */

import { readFile as readFileFromDisk } from 'fs/promises';
import { basename } from 'path';
import pino from 'pino';
import {
  AuditAction,
  AuditActor,
  AuditEventType,
  errorMessage,
  noopAuditSink,
  safeAudit,
  withRetry,
} from '@caselens/core';
import type { AuditActionName, AuditSink, RetryPolicy } from '@caselens/core';
import type { Settings } from '@caselens/config';
import { createRepositories, withSession } from '@caselens/db';
import type { Db, Repositories, Version } from '@caselens/db';
import {
  blobBaseName,
  blobExtension,
  localUploadBlobName,
  mimeTypeFor,
  parsedBlobName,
  rawBlobName,
  sectionBlobName,
} from '@caselens/storage';
import type { ContentStore } from '@caselens/storage';
import type { DocumentParser } from '@caselens/layout';
import type { LlmClient } from '@caselens/llm';
import type { CaseManagementClient, CmsDocument } from '@caselens/cms';
import { createRedactor } from '@caselens/privacy';
import type { Redactor } from '@caselens/privacy';
import { createSectionExtractor } from './extractor.js';
import type { SectionExtractor } from './extractor.js';
import { emptyResult, failedResult, mergeIds } from './types.js';
import type { IngestionResult, IngestionTrigger } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const PLACEHOLDER_CASE_URN = '01BL0000001';

export const ALLOWED_DOC_CATEGORIES: readonly string[] = ['Review', 'MGForm'];
export const ALLOWED_DOC_TYPES: readonly string[] = ['MG 3', 'MG3', 'MG3 (with Schedule of Charges)'];
export const ALLOWED_MIME_TYPES: readonly string[] = [
  'application/pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
];

export interface IngestionOrchestratorDeps {
  settings: Settings;
  db: Db;
  contentStore: ContentStore;
  parser: DocumentParser;
  llm: LlmClient;
  createCmsClient: () => CaseManagementClient;
  audit?: AuditSink;
  correlationId?: string;
  readFile?: (path: string) => Promise<Buffer>;
}

interface DownloadedDocument {
  document: CmsDocument;
  data: Buffer;
}

/**
 * All three allow-lists must pass
 */
export function isSelectedDocument(document: CmsDocument): boolean {
  return (
    document.cmsDocCategory !== null &&
    ALLOWED_DOC_CATEGORIES.includes(document.cmsDocCategory) &&
    document.type !== null &&
    ALLOWED_DOC_TYPES.includes(document.type) &&
    document.mimeType !== null &&
    ALLOWED_MIME_TYPES.includes(document.mimeType)
  );
}

export class IngestionOrchestrator {
  private readonly settings: Settings;
  private readonly repos: Repositories;
  private readonly contentStore: ContentStore;
  private readonly parser: DocumentParser;
  private readonly createCmsClient: () => CaseManagementClient;
  private readonly audit: AuditSink;
  private readonly correlationId: string | undefined;
  private readonly readFile: (path: string) => Promise<Buffer>;
  private readonly retry: RetryPolicy;
  private readonly extractor: SectionExtractor;
  private readonly redactor: Redactor;

  constructor(deps: IngestionOrchestratorDeps) {
    this.settings = deps.settings;
    this.repos = createRepositories(deps.db);
    this.contentStore = deps.contentStore;
    this.parser = deps.parser;
    this.createCmsClient = deps.createCmsClient;
    this.audit = deps.audit ?? noopAuditSink;
    this.correlationId = deps.correlationId;
    this.readFile = deps.readFile ?? ((path) => readFileFromDisk(path));
    this.retry = deps.settings.retry;

    const agentDeps = { promptTemplates: this.repos.promptTemplates, llm: deps.llm, retry: this.retry };
    this.extractor = createSectionExtractor(agentDeps);
    this.redactor = createRedactor(agentDeps);
  }

  async ingest(trigger: IngestionTrigger, experimentId?: string): Promise<IngestionResult> {
    const startTime = Date.now();
    logger.info(
      { event: 'ingestion.start', triggerType: trigger.type, experimentId, correlationId: this.correlationId },
      'Ingestion started'
    );

    let result: IngestionResult;
    try {
      const experiment = withSession(this.repos, (session) => session.experiments.upsert({ id: experimentId }));
      result = await this.route(trigger, experiment.id);
      result.experimentId = experiment.id;
    } catch (error) {
      result = failedResult(errorMessage(error));
      result.experimentId = experimentId;
    }

    const fields = {
      triggerType: trigger.type,
      experimentId: result.experimentId,
      correlationId: this.correlationId,
      sections: result.sectionIds.length,
      durationMs: Date.now() - startTime,
    };
    if (result.success) {
      logger.info({ event: 'ingestion.success', ...fields }, 'Ingestion finished');
    } else {
      logger.error({ event: 'ingestion.fail', ...fields, error: result.error }, 'Ingestion failed');
    }
    return result;
  }

  private route(trigger: IngestionTrigger, experimentId: string): Promise<IngestionResult> {
    switch (trigger.type) {
      case 'urn':
        return this.ingestSingleUrn(trigger.urn, experimentId);
      case 'urn_list':
        return this.ingestUrnList(trigger.urns, experimentId);
      case 'blob_name':
        return this.ingestBlob(trigger.blobName, experimentId);
      case 'filepath':
        return this.ingestFile(trigger.filePath, experimentId);
    }
  }

  private auditEvent(action: AuditActionName, objectType: string, objectId?: string | number | null): void {
    safeAudit(this.audit, {
      eventType: AuditEventType.INGESTION,
      actorId: AuditActor.INGESTION_ORCHESTRATOR,
      action,
      objectType,
      objectId,
      correlationId: this.correlationId,
    });
  }

  private async authenticatedClient(): Promise<CaseManagementClient | null> {
    const client = this.createCmsClient();
    this.auditEvent(AuditAction.CMS_AUTH_REQUEST, 'cms');
    if (!(await client.authenticate())) {
      return null;
    }
    this.auditEvent(AuditAction.CMS_TOKEN_ISSUED, 'cms');
    return client;
  }

  private async ingestSingleUrn(urn: string, experimentId: string): Promise<IngestionResult> {
    const client = await this.authenticatedClient();
    if (!client) {
      return failedResult('CMS authentication failed');
    }
    return this.ingestUrn(client, urn, experimentId);
  }

  private async ingestUrnList(urns: string[], experimentId: string): Promise<IngestionResult> {
    const client = await this.authenticatedClient();
    if (!client) {
      return failedResult('CMS authentication failed');
    }

    const result = emptyResult();
    for (const urn of urns) {
      let part: IngestionResult;
      try {
        part = await this.ingestUrn(client, urn, experimentId);
      } catch (error) {
        part = failedResult(errorMessage(error));
      }

      if (part.success) {
        mergeIds(result, part);
      } else {
        result.success = false;
        result.error = `One or more URNs failed ingestion. Latest error: ${part.error ?? 'unknown error'}`;
        logger.warn({ event: 'ingestion.urn.fail', urn, error: part.error }, 'URN ingestion failed, continuing');
      }
    }
    return result;
  }

  private async ingestUrn(client: CaseManagementClient, urn: string, experimentId: string): Promise<IngestionResult> {
    this.auditEvent(AuditAction.CMS_METADATA_REQUEST, 'case', urn);
    const cmsCaseId = await client.resolveReference(urn);
    if (cmsCaseId === null) {
      return failedResult(`Could not resolve URN ${urn}`);
    }

    const summary = await client.getSummary(cmsCaseId);

    this.auditEvent(AuditAction.CMS_DOCUMENTS_REQUEST, 'case', cmsCaseId);
    const documents = await client.listDocuments(cmsCaseId);
    const selected = documents.filter(isSelectedDocument);
    if (selected.length === 0) {
      return failedResult(`No document selected for case ${cmsCaseId}`);
    }
    logger.info(
      { event: 'ingestion.urn.documents', urn, caseId: cmsCaseId, listed: documents.length, selected: selected.length },
      'Documents selected'
    );

    const downloads: DownloadedDocument[] = [];
    for (const document of selected) {
      downloads.push({ document, data: await client.download(cmsCaseId, document.id, document.versionId) });
    }

    const defendants = await client.getDefendants(cmsCaseId, { includeCharges: true, includeOffences: true });

    const caseRow = withSession(this.repos, (session) => {
      const saved = session.cases.upsertCase({
        id: cmsCaseId,
        urn: summary?.urn ?? urn,
        finalised: summary?.finalised ?? null,
        areaId: summary?.areaId ?? null,
        areaName: summary?.areaName ?? null,
        unitId: summary?.unitId ?? null,
        unitName: summary?.unitName ?? null,
        registrationDate: summary?.registrationDate ?? null,
      });

      for (const defendant of defendants) {
        const defendantRow = session.defendants.upsert({
          id: defendant.id ?? undefined,
          caseId: saved.id,
          dob: defendant.dob,
          gender: defendant.gender,
          ethnicity: defendant.ethnicity,
        });
        for (const charge of defendant.charges) {
          session.charges.upsert({
            id: charge.id ?? undefined,
            defendantId: defendantRow.id,
            code: charge.code,
            description: charge.description,
            latestVerdict: charge.latestVerdict,
          });
        }
        for (const offence of defendant.offences) {
          session.offences.upsert({
            id: offence.id ?? undefined,
            defendantId: defendantRow.id,
            code: offence.code,
            type: offence.type,
            description: offence.description,
            active: offence.active,
          });
        }
      }
      return saved;
    });

    const { sourceContainer } = this.settings.storage;
    const blobNames = new Map<number, string>();
    for (const { document, data } of downloads) {
      const name = rawBlobName(experimentId, caseRow.id, document.id, document.versionId, document.fileExtension ?? '');
      await this.contentStore.put(sourceContainer, name, data, { contentType: document.mimeType ?? undefined });
      blobNames.set(document.versionId, name);
    }

    const versions = withSession(this.repos, (session) =>
      downloads.map(({ document }) => {
        session.documents.upsert({
          id: document.id,
          caseId: caseRow.id,
          originalFileName: document.originalFileName,
          cmsDocCategory: document.cmsDocCategory,
          docType: document.type,
          fileExtension: document.fileExtension,
          mimeType: document.mimeType,
        });
        return session.versions.upsert({
          id: document.versionId,
          documentId: document.id,
          sourceBlobContainer: sourceContainer,
          sourceBlobName: blobNames.get(document.versionId) ?? null,
        });
      })
    );

    const result = emptyResult();
    result.caseIds.push(caseRow.id);
    for (const version of versions) {
      try {
        mergeIds(result, await this.processVersion(version, experimentId));
      } catch (error) {
        const message = errorMessage(error);
        result.success = false;
        result.error = message;
        logger.warn(
          { event: 'ingestion.version.fail', urn, versionId: version.id, error: message },
          'Version processing failed, continuing'
        );
      }
    }
    return result;
  }

  private async ingestBlob(blobName: string, experimentId: string): Promise<IngestionResult> {
    const fileName = blobBaseName(blobName);
    const extension = blobExtension(blobName);
    const { sourceContainer } = this.settings.storage;

    const { caseId, version } = withSession(this.repos, (session) => {
      const placeholder =
        session.cases.getByUrn(PLACEHOLDER_CASE_URN) ?? session.cases.create({ urn: PLACEHOLDER_CASE_URN });
      const document = session.documents.create({
        caseId: placeholder.id,
        originalFileName: fileName,
        fileExtension: extension || null,
        mimeType: mimeTypeFor(blobName),
      });
      const created = session.versions.create({
        documentId: document.id,
        sourceBlobContainer: sourceContainer,
        sourceBlobName: blobName,
      });
      return { caseId: placeholder.id, version: created };
    });

    const result = await this.processVersion(version, experimentId);
    result.caseIds.push(caseId);
    return result;
  }

  private async ingestFile(filePath: string, experimentId: string): Promise<IngestionResult> {
    let data: Buffer;
    try {
      data = await this.readFile(filePath);
    } catch (error) {
      return failedResult(`Failed to read file: ${errorMessage(error)}`);
    }

    const blobName = localUploadBlobName(basename(filePath));
    await this.contentStore.put(this.settings.storage.sourceContainer, blobName, data, {
      contentType: mimeTypeFor(blobName),
    });
    logger.info({ event: 'ingestion.file.uploaded', filePath, blobName }, 'Local file uploaded');
    return this.ingestBlob(blobName, experimentId);
  }

  /**
   * Parse, extract, redact and persist the sections of one version
   */
  async processVersion(version: Version, experimentId: string): Promise<IngestionResult> {
    const { processedContainer, sectionContainer } = this.settings.storage;
    if (!version.sourceBlobContainer || !version.sourceBlobName) {
      throw new Error(`Version ${version.id} has no source blob`);
    }
    const sourceName = version.sourceBlobName;
    const raw = await this.contentStore.get(version.sourceBlobContainer, sourceName);

    this.auditEvent(AuditAction.DOCUMENT_PARSE_REQUEST, 'version', version.id);
    const mimeType = mimeTypeFor(sourceName);
    const parsed = await withRetry(() => this.parser.parse(raw, { mimeType }), { ...this.retry, label: 'parse_document' });

    const parsedName = parsedBlobName(sourceName);
    await this.contentStore.put(processedContainer, parsedName, JSON.stringify(parsed.raw), {
      contentType: 'application/json',
    });
    withSession(this.repos, (session) =>
      session.versions.update(version.id, { parsedBlobContainer: processedContainer, parsedBlobName: parsedName })
    );

    this.auditEvent(AuditAction.SECTION_EXTRACTION_REQUEST, 'version', version.id);
    const narratives = await this.extractor.extract(parsed.content);

    const sectionIds: number[] = [];
    for (const narrative of narratives) {
      this.auditEvent(AuditAction.SECTION_REDACTION_REQUEST, 'version', version.id);
      const { redactedText } = await this.redactor.redact(narrative);

      const section = withSession(this.repos, (session) =>
        session.sections.create({
          versionId: version.id,
          documentId: version.documentId,
          experimentId,
          redactedContent: redactedText,
        })
      );

      const contentName = sectionBlobName(experimentId, version.id, section.id);
      await this.contentStore.put(sectionContainer, contentName, narrative, { contentType: 'text/plain' });
      withSession(this.repos, (session) =>
        session.sections.update(section.id, { contentBlobContainer: sectionContainer, contentBlobName: contentName })
      );
      sectionIds.push(section.id);
    }

    logger.info(
      { event: 'ingestion.version.success', versionId: version.id, sections: sectionIds.length },
      'Version processed'
    );
    return { ...emptyResult(), documentIds: [version.documentId], versionIds: [version.id], sectionIds };
  }
}
