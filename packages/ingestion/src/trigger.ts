import { ValidationError } from '@caselens/core';
import { TRIGGER_TYPES } from './types.js';
import type { IngestionTrigger } from './types.js';

/**
 * Build a trigger from its wire form.
 * urn_list accepts an array or a comma-separated string.
 */
export function parseTrigger(type: string, value: string | string[]): IngestionTrigger {
  const single = (): string => {
    const text = Array.isArray(value) ? value[0] : value;
    if (!text || text.trim().length === 0) {
      throw new ValidationError(`A value is required for trigger type '${type}'`);
    }
    return text.trim();
  };

  switch (type) {
    case 'urn':
      return { type: 'urn', urn: single() };
    case 'urn_list': {
      const urns = (Array.isArray(value) ? value : value.split(','))
        .map((urn) => urn.trim())
        .filter((urn) => urn.length > 0);
      if (urns.length === 0) {
        throw new ValidationError("At least one URN is required for trigger type 'urn_list'");
      }
      return { type: 'urn_list', urns };
    }
    case 'blob_name':
      return { type: 'blob_name', blobName: single() };
    case 'filepath':
      return { type: 'filepath', filePath: single() };
    default:
      throw new ValidationError(`Unknown trigger type '${type}'. Expected one of: ${TRIGGER_TYPES.join(', ')}`);
  }
}
