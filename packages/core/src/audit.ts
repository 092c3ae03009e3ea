/**
 * Audit side channel.
 *
 * Events carry enough to correlate a pipeline run; writing them must never
 * change the outcome of the run.
 */

import pino from 'pino';
import { errorMessage } from './errors.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const AuditEventType = {
  INGESTION: 'INGESTION',
  ANALYSIS_ORCHESTRATION: 'ANALYSIS_ORCHESTRATION',
} as const;

export const AuditActor = {
  INGESTION_ORCHESTRATOR: 'INGESTION_ORCHESTRATOR',
  ANALYSIS_ORCHESTRATOR: 'ANALYSIS_ORCHESTRATOR',
} as const;

export const AuditAction = {
  CMS_AUTH_REQUEST: 'CMS_AUTH_REQUEST',
  CMS_TOKEN_ISSUED: 'CMS_TOKEN_ISSUED',
  CMS_METADATA_REQUEST: 'CMS_METADATA_REQUEST',
  CMS_DOCUMENTS_REQUEST: 'CMS_DOCUMENTS_REQUEST',
  DOCUMENT_PARSE_REQUEST: 'DOCUMENT_PARSE_REQUEST',
  SECTION_EXTRACTION_REQUEST: 'SECTION_EXTRACTION_REQUEST',
  SECTION_REDACTION_REQUEST: 'SECTION_REDACTION_REQUEST',
  ANALYSIS_JOB_BEGIN: 'ANALYSIS_JOB_BEGIN',
  ANALYSIS_TASK_BEGIN: 'ANALYSIS_TASK_BEGIN',
  ANALYSIS_TASK_END: 'ANALYSIS_TASK_END',
} as const;

export type AuditActionName = (typeof AuditAction)[keyof typeof AuditAction];

export interface AuditEvent {
  eventType: string;
  actorId: string;
  action: AuditActionName;
  objectType: string;
  objectId?: string | number | null;
  correlationId?: string | null;
  source?: string;
}

export interface AuditSink {
  log(event: AuditEvent): void;
}

export const noopAuditSink: AuditSink = {
  log: () => undefined,
};

/**
 * Write an audit event; a failing sink is reported and ignored
 */
export function safeAudit(sink: AuditSink, event: AuditEvent): void {
  try {
    sink.log(event);
  } catch (error) {
    logger.warn(
      {
        event: 'audit.write.fail',
        action: event.action,
        objectType: event.objectType,
        objectId: event.objectId,
        correlationId: event.correlationId,
        error: errorMessage(error),
      },
      'Failed to write audit event'
    );
  }
}
