import type { AuditEvent, AuditSink } from '@caselens/core';
import type { Db } from '../client.js';
import { EventSchema } from '../entities.js';
import type { EventRecord } from '../entities.js';
import { BaseRepository } from './base.js';

export class EventRepository extends BaseRepository<EventRecord> {
  constructor(db: Db) {
    super(db, 'events', EventSchema, Object.keys(EventSchema.shape));
  }

  log(event: AuditEvent): EventRecord {
    return this.create({
      source: event.source ?? 'caselens',
      eventType: event.eventType,
      actorId: event.actorId,
      action: event.action,
      objectType: event.objectType,
      objectId: event.objectId === undefined || event.objectId === null ? null : String(event.objectId),
      correlationId: event.correlationId ?? null,
    });
  }

  getByCorrelation(correlationId: string): EventRecord[] {
    return this.getBy({ correlationId });
  }
}

/**
 * Audit sink that appends Event rows
 */
export function createDbAuditSink(db: Db): AuditSink {
  const events = new EventRepository(db);
  return {
    log: (event) => {
      events.log(event);
    },
  };
}
