/**
 * Types for content storage
 */

export type StorageProvider = 's3' | 'r2' | 'minio';

export interface StorageConfig {
  provider: StorageProvider;
  endpoint?: string; // Required for R2/minio, empty for AWS S3
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
}

export type BlobData = Uint8Array | string;

/**
 * Blob read/write keyed by container and name
 */
export interface ContentStore {
  put(container: string, name: string, data: BlobData, options?: { contentType?: string }): Promise<void>;
  get(container: string, name: string): Promise<Buffer>;
}
