import type { TriggerType } from '@caselens/core';

export type IngestionTrigger =
  | { type: 'urn'; urn: string }
  | { type: 'urn_list'; urns: string[] }
  | { type: 'blob_name'; blobName: string }
  | { type: 'filepath'; filePath: string };

export interface IngestionResult {
  success: boolean;
  caseIds: number[];
  documentIds: number[];
  versionIds: number[];
  sectionIds: number[];
  experimentId?: string;
  error?: string;
}

export const TRIGGER_TYPES: readonly TriggerType[] = ['urn', 'urn_list', 'blob_name', 'filepath'];

export function emptyResult(success = true): IngestionResult {
  return { success, caseIds: [], documentIds: [], versionIds: [], sectionIds: [] };
}

export function failedResult(error: string): IngestionResult {
  return { ...emptyResult(false), error };
}

/**
 * Append the ids of part into into; success and error are left to the caller
 */
export function mergeIds(into: IngestionResult, part: IngestionResult): void {
  into.caseIds.push(...part.caseIds);
  into.documentIds.push(...part.documentIds);
  into.versionIds.push(...part.versionIds);
  into.sectionIds.push(...part.sectionIds);
}
