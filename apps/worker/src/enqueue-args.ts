import { randomUUID } from 'crypto';
import { JOB_NAMES } from '@caselens/core';
import type { PipelineJob, TriggerType } from '@caselens/core';
import { TRIGGER_TYPES } from '@caselens/ingestion';

export const USAGE =
  'Usage: enqueue (ingest|workflow) --type <urn|urn_list|blob_name|filepath> --value <value> [--experiment <id>] [--tasks <a,b>] [--correlation <id>]\n' +
  '       enqueue analyze-section --section <id> [--experiment <id>] [--tasks <a,b>] [--correlation <id>]';

function isTriggerType(value: string): value is TriggerType {
  return TRIGGER_TYPES.some((type) => type === value);
}

function readFlags(args: string[]): Map<string, string> {
  const flags = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[i + 1];
    if (flag?.startsWith('--') && value !== undefined) {
      flags.set(flag.slice(2), value);
      i++;
    }
  }
  return flags;
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Parse command line arguments into a pipeline job, or null when they are incomplete.
 * Without --correlation each call gets a fresh run id so the queue never drops a re-run.
 */
export function buildJob(args: string[]): PipelineJob | null {
  const [name, ...rest] = args;
  const flags = readFlags(rest);
  const experimentId = flags.get('experiment');
  const correlationId = flags.get('correlation') ?? randomUUID();
  const taskIds = splitList(flags.get('tasks'));

  if (name === JOB_NAMES.ANALYZE_SECTION) {
    const sectionId = Number.parseInt(flags.get('section') ?? '', 10);
    if (Number.isNaN(sectionId)) return null;
    return { name, data: { sectionId, taskIds, experimentId, correlationId } };
  }

  if (name !== JOB_NAMES.INGEST && name !== JOB_NAMES.WORKFLOW) return null;

  const triggerType = flags.get('type');
  const value = flags.get('value');
  if (!triggerType || !isTriggerType(triggerType) || !value) return null;

  const data = {
    triggerType,
    value: triggerType === 'urn_list' ? (splitList(value) ?? []) : value,
    experimentId,
    correlationId,
  };
  return name === JOB_NAMES.INGEST ? { name, data } : { name, data: { ...data, taskIds } };
}
