import { createHash } from 'crypto';

/**
 * Hex md5 of a string; used as the merge key for findings before any row exists
 */
export function contentHash(content: string): string {
  return createHash('md5').update(content, 'utf-8').digest('hex');
}
