/**
 * Shared queue types and utilities
 */

export const QUEUE_NAME = 'caselens-pipeline';

export const JOB_NAMES = {
  INGEST: 'ingest',
  ANALYZE_SECTION: 'analyze-section',
  WORKFLOW: 'workflow',
} as const;

export type TriggerType = 'urn' | 'urn_list' | 'blob_name' | 'filepath';

export interface IngestJobPayload {
  triggerType: TriggerType;
  value: string | string[];
  experimentId?: string;
  correlationId?: string;
}

export interface AnalyzeSectionJobPayload {
  sectionId: number;
  taskIds?: string[];
  experimentId?: string;
  correlationId?: string;
}

export type WorkflowJobPayload = IngestJobPayload & {
  taskIds?: string[];
};

export type PipelineJob =
  | { name: typeof JOB_NAMES.INGEST; data: IngestJobPayload }
  | { name: typeof JOB_NAMES.ANALYZE_SECTION; data: AnalyzeSectionJobPayload }
  | { name: typeof JOB_NAMES.WORKFLOW; data: WorkflowJobPayload };

function sanitizeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, '_');
}

/**
 * Build a unique job ID
 * Format: ${jobName}__${subject}__${correlationId}
 * Uses double underscore (__) as separator to avoid BullMQ restrictions on colons
 */
export function buildJobId(job: PipelineJob): string {
  let subject: string;
  if (job.name === JOB_NAMES.ANALYZE_SECTION) {
    subject = String(job.data.sectionId);
  } else {
    const value = job.data.value;
    subject = Array.isArray(value) ? value.join('+') : value;
  }

  const base = `${job.name}__${sanitizeSegment(subject)}`;
  if (job.data.correlationId) {
    return `${base}__${sanitizeSegment(job.data.correlationId)}`;
  }
  return base;
}
