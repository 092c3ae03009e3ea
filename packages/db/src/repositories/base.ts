/**
 * Generic table repository over better-sqlite3
 *
 * Entities are camelCase, columns are snake_case. Every row read back is validated
 * with the table's zod schema. Calls are synchronous so they compose inside a
 * withSession transaction.
 */

import type { z } from 'zod';
import { ValidationError } from '@caselens/core';
import type { Db } from '../client.js';
import { nowIso } from '../client.js';
import type { BaseEntity, Filters, Insertable, Updatable } from '../entities.js';

export type SqlValue = string | number | bigint | Buffer | null;

export function toColumnName(key: string): string {
  return key.replace(/[A-Z]/g, (char) => `_${char.toLowerCase()}`);
}

export function toPropertyName(column: string): string {
  return column.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

export function toSqlValue(value: unknown): SqlValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint' || Buffer.isBuffer(value)) {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  throw new ValidationError(`Unsupported column value of type ${typeof value}`);
}

export interface PageOptions {
  limit?: number;
  offset?: number;
}

export class BaseRepository<T extends BaseEntity> {
  private readonly columns: ReadonlySet<string>;

  constructor(
    protected readonly db: Db,
    protected readonly table: string,
    protected readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    columns: readonly string[]
  ) {
    this.columns = new Set(columns);
  }

  protected toEntity(row: unknown): T {
    if (typeof row !== 'object' || row === null) {
      throw new ValidationError(`Unexpected row shape from ${this.table}`);
    }
    const mapped: Record<string, unknown> = {};
    for (const [column, value] of Object.entries(row)) {
      mapped[toPropertyName(column)] = value;
    }
    return this.schema.parse(mapped);
  }

  protected toEntityOrNull(row: unknown): T | null {
    return row === undefined ? null : this.toEntity(row);
  }

  private assignments(fields: object): Array<[string, SqlValue]> {
    const pairs: Array<[string, SqlValue]> = [];
    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined) {
        continue;
      }
      if (!this.columns.has(key)) {
        throw new ValidationError(`Unknown column "${key}" for table ${this.table}`);
      }
      pairs.push([toColumnName(key), toSqlValue(value)]);
    }
    return pairs;
  }

  protected where(filters: object): { clause: string; params: SqlValue[] } {
    const parts: string[] = [];
    const params: SqlValue[] = [];
    for (const [column, value] of this.assignments(filters)) {
      if (value === null) {
        parts.push(`${column} IS NULL`);
      } else {
        parts.push(`${column} = ?`);
        params.push(value);
      }
    }
    return { clause: parts.length > 0 ? ` WHERE ${parts.join(' AND ')}` : '', params };
  }

  create(input: Insertable<T>): T {
    const pairs = this.assignments(input);
    pairs.push(['created_at', nowIso()]);

    const columns = pairs.map(([column]) => column).join(', ');
    const placeholders = pairs.map(() => '?').join(', ');
    const row = this.db
      .prepare(`INSERT INTO ${this.table} (${columns}) VALUES (${placeholders}) RETURNING *`)
      .get(...pairs.map(([, value]) => value));
    return this.toEntity(row);
  }

  getById(id: T['id']): T | null {
    return this.toEntityOrNull(this.db.prepare(`SELECT * FROM ${this.table} WHERE id = ?`).get(id));
  }

  getBy(filters: Filters<T>, page: PageOptions = {}): T[] {
    const { clause, params } = this.where(filters);
    let sql = `SELECT * FROM ${this.table}${clause} ORDER BY id`;
    if (page.limit !== undefined) {
      sql += ` LIMIT ${Math.max(0, Math.floor(page.limit))} OFFSET ${Math.max(0, Math.floor(page.offset ?? 0))}`;
    }
    return this.db
      .prepare(sql)
      .all(...params)
      .map((row) => this.toEntity(row));
  }

  getOneBy(filters: Filters<T>): T | null {
    const { clause, params } = this.where(filters);
    return this.toEntityOrNull(this.db.prepare(`SELECT * FROM ${this.table}${clause} ORDER BY id LIMIT 1`).get(...params));
  }

  getAll(page: PageOptions = {}): T[] {
    return this.getBy({}, page);
  }

  update(id: T['id'], fields: Updatable<T>): T | null {
    return this.updateFields(id, fields);
  }

  /**
   * Update in place when a supplied id exists, otherwise insert
   */
  upsert(input: Insertable<T> & { id?: T['id'] }): T {
    const existingId = input.id;
    if (existingId !== undefined && this.getById(existingId)) {
      const fields: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(input)) {
        if (key !== 'id') {
          fields[key] = value;
        }
      }
      const updated = this.updateFields(existingId, fields);
      if (updated) {
        return updated;
      }
    }
    return this.create(input);
  }

  protected updateFields(id: T['id'], fields: object): T | null {
    const pairs = this.assignments(fields);
    if (pairs.length === 0) {
      return this.getById(id);
    }
    const setClause = pairs.map(([column]) => `${column} = ?`).join(', ');
    const row = this.db
      .prepare(`UPDATE ${this.table} SET ${setClause} WHERE id = ? RETURNING *`)
      .get(...pairs.map(([, value]) => value), id);
    return this.toEntityOrNull(row);
  }

  delete(id: T['id']): boolean {
    return this.db.prepare(`DELETE FROM ${this.table} WHERE id = ?`).run(id).changes > 0;
  }

  deleteBy(filters: Filters<T>): number {
    const { clause, params } = this.where(filters);
    return this.db.prepare(`DELETE FROM ${this.table}${clause}`).run(...params).changes;
  }

  count(filters: Filters<T> = {}): number {
    const { clause, params } = this.where(filters);
    const row = this.db.prepare(`SELECT COUNT(*) AS total FROM ${this.table}${clause}`).get(...params);
    if (typeof row === 'object' && row !== null && 'total' in row && typeof row.total === 'number') {
      return row.total;
    }
    return 0;
  }

  exists(filters: Filters<T>): boolean {
    return this.getOneBy(filters) !== null;
  }
}
