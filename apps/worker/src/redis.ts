import { Redis } from 'ioredis';

// Host and port of a Redis URL, without credentials
export function extractRedisHost(url: string): string {
  try {
    const urlObj = new URL(url);
    return `${urlObj.hostname}:${urlObj.port || '6379'}`;
  } catch {
    return 'unknown';
  }
}

// Replace the password of a Redis URL for logging
export function redactRedisUrl(url: string): string {
  try {
    const urlObj = new URL(url);
    if (urlObj.password) {
      urlObj.password = '***';
    }
    return urlObj.toString();
  } catch {
    return url.replace(/:[^:@]+@/, ':***@');
  }
}

export function createRedisConnection(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: null, // Required for BullMQ
  });
}
