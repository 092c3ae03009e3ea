import pino from 'pino';
import type { Db } from '../client.js';
import { CaseSchema, ChargeSchema, DefendantSchema, OffenceSchema } from '../entities.js';
import type { Case, Charge, Defendant, Insertable, Offence } from '../entities.js';
import { BaseRepository } from './base.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export class CaseRepository extends BaseRepository<Case> {
  constructor(db: Db) {
    super(db, 'cases', CaseSchema, Object.keys(CaseSchema.shape));
  }

  getByUrn(urn: string): Case | null {
    return this.getOneBy({ urn });
  }

  /**
   * Update by supplied id, else by matching URN, else create
   */
  upsertCase(input: Insertable<Case>): Case {
    const { id, ...fields } = input;

    if (id !== undefined && this.getById(id)) {
      const updated = this.update(id, fields);
      if (updated) {
        logger.debug({ event: 'db.case.upsert', caseId: id, action: 'updated_by_id' }, 'Case updated');
        return updated;
      }
    }

    const byUrn = this.getByUrn(input.urn);
    if (byUrn) {
      const updated = this.update(byUrn.id, fields);
      logger.debug({ event: 'db.case.upsert', caseId: byUrn.id, action: 'updated_by_urn' }, 'Case updated');
      return updated ?? byUrn;
    }

    const created = this.create(input);
    logger.debug({ event: 'db.case.upsert', caseId: created.id, action: 'created' }, 'Case created');
    return created;
  }
}

export class DefendantRepository extends BaseRepository<Defendant> {
  constructor(db: Db) {
    super(db, 'defendants', DefendantSchema, Object.keys(DefendantSchema.shape));
  }
}

export class ChargeRepository extends BaseRepository<Charge> {
  constructor(db: Db) {
    super(db, 'charges', ChargeSchema, Object.keys(ChargeSchema.shape));
  }
}

export class OffenceRepository extends BaseRepository<Offence> {
  constructor(db: Db) {
    super(db, 'offences', OffenceSchema, Object.keys(OffenceSchema.shape));
  }
}
