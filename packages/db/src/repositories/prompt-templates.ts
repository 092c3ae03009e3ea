import pino from 'pino';
import type { Db } from '../client.js';
import { PromptTemplateSchema } from '../entities.js';
import type { PromptTemplate } from '../entities.js';
import { BaseRepository } from './base.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface PromptKey {
  agent?: string;
  theme?: string;
  pattern?: string;
}

/**
 * Compare two version strings.
 * Dotted segments compare numerically when both are numeric, lexicographically otherwise.
 * A missing version sorts lowest.
 */
export function compareVersions(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;

  const left = a.split('.');
  const right = b.split('.');
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const l = left[i];
    const r = right[i];
    if (l === undefined) return -1;
    if (r === undefined) return 1;
    if (l === r) continue;

    const ln = /^\d+$/.test(l) ? Number(l) : NaN;
    const rn = /^\d+$/.test(r) ? Number(r) : NaN;
    if (!Number.isNaN(ln) && !Number.isNaN(rn)) {
      if (ln !== rn) return ln < rn ? -1 : 1;
      continue;
    }
    return l < r ? -1 : 1;
  }
  return 0;
}

export class PromptTemplateRepository extends BaseRepository<PromptTemplate> {
  constructor(db: Db) {
    super(db, 'prompt_templates', PromptTemplateSchema, Object.keys(PromptTemplateSchema.shape));
  }

  private keyFilters(key: PromptKey): Partial<PromptTemplate> {
    const filters: Partial<PromptTemplate> = {};
    if (key.agent !== undefined) filters.agent = key.agent;
    if (key.theme !== undefined) filters.theme = key.theme;
    if (key.pattern !== undefined) filters.pattern = key.pattern;
    return filters;
  }

  /**
   * Current template for a key: the greatest version among matching rows.
   * Unspecified key parts are not filtered on.
   */
  getLatest(key: PromptKey): PromptTemplate | null {
    const candidates = this.getBy(this.keyFilters(key));
    let latest: PromptTemplate | null = null;
    for (const candidate of candidates) {
      if (!latest || compareVersions(candidate.version, latest.version) >= 0) {
        latest = candidate;
      }
    }

    logger.debug(
      { event: 'db.prompt.lookup', ...key, found: latest !== null, version: latest?.version, candidates: candidates.length },
      'Prompt template lookup'
    );
    return latest;
  }

  /**
   * Insert a template, or replace the text of the row with the same key and version
   */
  upsertBy(input: PromptKey & { template: string; version: string; name?: string }): PromptTemplate {
    const existing = this.getOneBy({
      agent: input.agent ?? null,
      theme: input.theme ?? null,
      pattern: input.pattern ?? null,
      version: input.version,
    });

    if (existing) {
      return this.update(existing.id, { template: input.template, name: input.name ?? existing.name }) ?? existing;
    }

    return this.create({
      name: input.name ?? null,
      agent: input.agent ?? null,
      theme: input.theme ?? null,
      pattern: input.pattern ?? null,
      version: input.version,
      template: input.template,
    });
  }
}
