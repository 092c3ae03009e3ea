/**
 * Job handlers
 *
 * Plain functions over a container, so they run the same under BullMQ and in tests.
 * Each returns the response shape the trigger layer reports back.
 */

import { z } from 'zod';
import pino from 'pino';
import { JOB_NAMES, ValidationError } from '@caselens/core';
import type { AnalyzeSectionJobPayload, IngestJobPayload, WorkflowJobPayload } from '@caselens/core';
import { createRepositories } from '@caselens/db';
import { IngestionOrchestrator, parseTrigger } from '@caselens/ingestion';
import { AnalysisOrchestrator } from '@caselens/analysis';
import type { WorkerContainer } from './container.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export type JobStatus = 'success' | 'error';

export interface IngestResponse {
  status: JobStatus;
  sectionIds: number[];
  experimentId: string | null;
  correlationId: string | null;
  error: string | null;
}

export interface AnalyzeSectionResponse {
  status: JobStatus;
  experimentId: string;
  sectionId: number;
  analysisJobId: number;
  taskIds: string[];
  correlationId: string | null;
}

export interface WorkflowResponse {
  status: JobStatus;
  experimentId: string | null;
  correlationId: string | null;
  sectionIds: number[];
  analysisJobIds: number[];
  error: string | null;
}

export type JobResponse = IngestResponse | AnalyzeSectionResponse | WorkflowResponse;

const optionalId = z.string().trim().min(1).optional();

const IngestPayloadSchema = z.object({
  triggerType: z.enum(['urn', 'urn_list', 'blob_name', 'filepath']),
  value: z.union([z.string(), z.array(z.string())]),
  experimentId: optionalId,
  correlationId: optionalId,
});

const AnalyzeSectionPayloadSchema = z.object({
  sectionId: z.coerce.number().int().positive(),
  taskIds: z.array(z.string()).optional(),
  experimentId: optionalId,
  correlationId: optionalId,
});

const WorkflowPayloadSchema = IngestPayloadSchema.extend({
  taskIds: z.array(z.string()).optional(),
});

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, jobName: string, data: unknown): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Invalid ${jobName} payload: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export async function runIngestJob(container: WorkerContainer, payload: IngestJobPayload): Promise<IngestResponse> {
  const trigger = parseTrigger(payload.triggerType, payload.value);
  const correlationId = payload.correlationId ?? null;

  const orchestrator = new IngestionOrchestrator({
    settings: container.settings,
    db: container.db,
    contentStore: container.contentStore,
    parser: container.parser,
    llm: container.llm,
    createCmsClient: container.createCmsClient,
    audit: container.audit,
    correlationId: payload.correlationId,
  });
  const result = await orchestrator.ingest(trigger, payload.experimentId);

  return {
    status: result.success ? 'success' : 'error',
    sectionIds: result.sectionIds,
    experimentId: result.experimentId ?? payload.experimentId ?? null,
    correlationId,
    error: result.error ?? null,
  };
}

export async function runAnalyzeSectionJob(
  container: WorkerContainer,
  payload: AnalyzeSectionJobPayload
): Promise<AnalyzeSectionResponse> {
  const orchestrator = new AnalysisOrchestrator({
    db: container.db,
    contentStore: container.contentStore,
    llm: container.llm,
    retry: container.settings.retry,
    tasks: container.tasks,
    mode: container.analysisMode,
    audit: container.audit,
    correlationId: payload.correlationId,
  });
  const job = await orchestrator.analyzeSection(payload.sectionId, payload.taskIds, payload.experimentId);

  return {
    status: 'success',
    experimentId: job.experimentId,
    sectionId: payload.sectionId,
    analysisJobId: job.id,
    taskIds: createRepositories(container.db).analysisJobs.taskIdsOf(job),
    correlationId: payload.correlationId ?? null,
  };
}

/**
 * Ingest, then analyze every created section in order.
 * A failed ingestion is returned as is; a failing analysis propagates.
 */
export async function runWorkflowJob(container: WorkerContainer, payload: WorkflowJobPayload): Promise<WorkflowResponse> {
  const ingestion = await runIngestJob(container, payload);
  if (ingestion.status !== 'success') {
    return { ...ingestion, analysisJobIds: [] };
  }

  const analysisJobIds: number[] = [];
  for (const sectionId of ingestion.sectionIds) {
    const analysis = await runAnalyzeSectionJob(container, {
      sectionId,
      taskIds: payload.taskIds,
      correlationId: payload.correlationId,
    });
    analysisJobIds.push(analysis.analysisJobId);
  }

  logger.info(
    {
      event: 'worker.workflow.complete',
      experimentId: ingestion.experimentId,
      sections: ingestion.sectionIds.length,
      analysisJobIds,
      correlationId: ingestion.correlationId,
    },
    'Workflow complete'
  );

  return {
    status: 'success',
    experimentId: ingestion.experimentId,
    correlationId: ingestion.correlationId,
    sectionIds: ingestion.sectionIds,
    analysisJobIds,
    error: null,
  };
}

/**
 * Validate a queued payload and route it to its handler by job name
 */
export async function processJob(container: WorkerContainer, name: string, data: unknown): Promise<JobResponse> {
  switch (name) {
    case JOB_NAMES.INGEST:
      return runIngestJob(container, parsePayload(IngestPayloadSchema, name, data));
    case JOB_NAMES.ANALYZE_SECTION:
      return runAnalyzeSectionJob(container, parsePayload(AnalyzeSectionPayloadSchema, name, data));
    case JOB_NAMES.WORKFLOW:
      return runWorkflowJob(container, parsePayload(WorkflowPayloadSchema, name, data));
    default:
      throw new ValidationError(`Unknown job name '${name}'. Expected one of: ${Object.values(JOB_NAMES).join(', ')}`);
  }
}
