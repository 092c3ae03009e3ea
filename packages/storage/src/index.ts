/**
 * Content storage for raw documents, parsed output and section text
 * Supports AWS S3, Cloudflare R2 and MinIO, plus an in-memory store
 */

export * from './client.js';
export * from './naming.js';
export type { BlobData, ContentStore, StorageConfig, StorageProvider } from './types.js';
