/**
 * S3-compatible content store (AWS S3, Cloudflare R2, MinIO)
 *
 * A container maps to a bucket and a blob name to an object key.
 */

import { S3Client, PutObjectCommand, GetObjectCommand } from '@aws-sdk/client-s3';
import pino from 'pino';
import { NotFoundError, ValidationError, errorMessage } from '@caselens/core';
import type { StorageSettings } from '@caselens/config';
import type { BlobData, ContentStore, StorageConfig } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/**
 * Validate endpoint URL format
 */
export function validateEndpoint(endpoint: string): void {
  if (!endpoint || endpoint.trim().length === 0) {
    throw new ValidationError('STORAGE_ENDPOINT is required but is empty or missing');
  }

  if (endpoint.includes('...')) {
    throw new ValidationError(
      'STORAGE_ENDPOINT contains invalid placeholder "...". Please set a valid endpoint URL (e.g., https://<accountId>.r2.cloudflarestorage.com)'
    );
  }

  if (!endpoint.startsWith('http://') && !endpoint.startsWith('https://')) {
    throw new ValidationError(
      `STORAGE_ENDPOINT must start with http:// or https://. Got: ${endpoint.substring(0, 50)}${endpoint.length > 50 ? '...' : ''}`
    );
  }

  let hostname: string;
  try {
    hostname = new URL(endpoint).hostname;
  } catch (error) {
    throw new ValidationError(`STORAGE_ENDPOINT is not a valid URL: ${errorMessage(error)}`);
  }
  if (!hostname) {
    throw new ValidationError(`STORAGE_ENDPOINT has invalid hostname: ${hostname}`);
  }
}

/**
 * Extract hostname from endpoint URL for logging (safe, no secrets)
 */
function extractEndpointHost(endpoint: string | undefined): string {
  if (!endpoint) return 'aws-s3';
  try {
    return new URL(endpoint).hostname;
  } catch {
    return 'invalid';
  }
}

/**
 * Create S3 client from config
 */
export function createS3Client(config: StorageConfig): S3Client {
  const clientConfig: {
    region: string;
    credentials: { accessKeyId: string; secretAccessKey: string };
    endpoint?: string;
    forcePathStyle?: boolean;
  } = {
    region: config.region,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  };

  if (config.provider === 'r2' || config.provider === 'minio') {
    if (!config.endpoint) {
      throw new ValidationError(
        `STORAGE_ENDPOINT is required for provider "${config.provider}". Please set STORAGE_ENDPOINT in your .env file.`
      );
    }
    validateEndpoint(config.endpoint);
    clientConfig.endpoint = config.endpoint;
    // R2 and minio require path-style addressing
    clientConfig.forcePathStyle = true;
  } else if (config.endpoint) {
    validateEndpoint(config.endpoint);
    clientConfig.endpoint = config.endpoint;
  }

  return new S3Client(clientConfig);
}

function isMissingObject(error: unknown): boolean {
  return error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound');
}

/**
 * Content store backed by an S3 client
 */
export function createS3ContentStore(config: StorageConfig, client: S3Client = createS3Client(config)): ContentStore {
  const endpointHost = extractEndpointHost(config.endpoint);

  return {
    async put(container: string, name: string, data: BlobData, options: { contentType?: string } = {}): Promise<void> {
      const body = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
      try {
        await client.send(
          new PutObjectCommand({
            Bucket: container,
            Key: name,
            Body: body,
            ContentType: options.contentType,
            ContentLength: body.byteLength,
          })
        );
        logger.debug(
          { event: 'storage.put.success', endpointHost, container, name, bytes: body.byteLength },
          'Blob written'
        );
      } catch (error) {
        logger.error({ event: 'storage.put.fail', endpointHost, container, name, error: errorMessage(error) }, 'Blob write failed');
        throw error;
      }
    },

    async get(container: string, name: string): Promise<Buffer> {
      try {
        const response = await client.send(new GetObjectCommand({ Bucket: container, Key: name }));
        if (!response.Body) {
          throw new NotFoundError('Blob', `${container}/${name}`);
        }
        const bytes = await response.Body.transformToByteArray();
        logger.debug({ event: 'storage.get.success', endpointHost, container, name, bytes: bytes.byteLength }, 'Blob read');
        return Buffer.from(bytes);
      } catch (error) {
        if (isMissingObject(error)) {
          throw new NotFoundError('Blob', `${container}/${name}`);
        }
        logger.error({ event: 'storage.get.fail', endpointHost, container, name, error: errorMessage(error) }, 'Blob read failed');
        throw error;
      }
    },
  };
}

/**
 * In-process content store
 */
export function createMemoryContentStore(): ContentStore & { list(container?: string): string[] } {
  const blobs = new Map<string, Buffer>();
  const keyOf = (container: string, name: string) => `${container}/${name}`;

  return {
    async put(container, name, data) {
      blobs.set(keyOf(container, name), typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data));
    },

    async get(container, name) {
      const blob = blobs.get(keyOf(container, name));
      if (!blob) {
        throw new NotFoundError('Blob', keyOf(container, name));
      }
      return Buffer.from(blob);
    },

    list(container?: string) {
      const keys = [...blobs.keys()].sort();
      return container ? keys.filter((key) => key.startsWith(`${container}/`)) : keys;
    },
  };
}

/**
 * Build the configured content store
 */
export function createContentStore(settings: StorageSettings): ContentStore {
  if (settings.provider === 'memory') {
    logger.warn({ event: 'storage.provider.memory' }, 'Using in-memory content store; blobs are lost on exit');
    return createMemoryContentStore();
  }

  if (!settings.accessKeyId || !settings.secretAccessKey) {
    throw new ValidationError('STORAGE_ACCESS_KEY_ID and STORAGE_SECRET_ACCESS_KEY are required for remote storage');
  }

  return createS3ContentStore({
    provider: settings.provider,
    endpoint: settings.endpoint,
    region: settings.region,
    accessKeyId: settings.accessKeyId,
    secretAccessKey: settings.secretAccessKey,
  });
}
