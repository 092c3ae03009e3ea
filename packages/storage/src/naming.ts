/**
 * Blob naming scheme
 *
 *   raw      {experiment}/{case}/{document}_{version}{ext}
 *   parsed   {raw}.json
 *   section  {experiment}/{version}/{section}.txt
 *   upload   FILEPATH/{fileName}
 */

export const LOCAL_UPLOAD_PREFIX = 'FILEPATH';

export function rawBlobName(
  experimentId: string,
  caseId: number,
  documentId: number,
  versionId: number,
  extension: string
): string {
  const ext = extension && !extension.startsWith('.') ? `.${extension}` : extension;
  return `${experimentId}/${caseId}/${documentId}_${versionId}${ext}`;
}

export function parsedBlobName(rawName: string): string {
  return `${rawName}.json`;
}

export function sectionBlobName(experimentId: string, versionId: number, sectionId: number): string {
  return `${experimentId}/${versionId}/${sectionId}.txt`;
}

export function localUploadBlobName(fileName: string): string {
  return `${LOCAL_UPLOAD_PREFIX}/${fileName}`;
}

/**
 * Last path segment of a blob name
 */
export function blobBaseName(name: string): string {
  const parts = name.split('/');
  return parts[parts.length - 1] ?? name;
}

/**
 * Extension including the dot, lower-cased; empty when there is none
 */
export function blobExtension(name: string): string {
  const base = blobBaseName(name);
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.substring(dot).toLowerCase() : '';
}

const MIME_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.doc': 'application/msword',
  '.txt': 'text/plain',
  '.json': 'application/json',
};

export function mimeTypeFor(name: string): string {
  return MIME_TYPES[blobExtension(name)] ?? 'application/octet-stream';
}
