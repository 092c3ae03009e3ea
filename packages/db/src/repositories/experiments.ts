import { randomUUID } from 'crypto';
import type { Db } from '../client.js';
import { ExperimentSchema } from '../entities.js';
import type { Experiment, Insertable } from '../entities.js';
import { BaseRepository } from './base.js';

export class ExperimentRepository extends BaseRepository<Experiment> {
  constructor(db: Db) {
    super(db, 'experiments', ExperimentSchema, Object.keys(ExperimentSchema.shape));
  }

  override create(input: Insertable<Experiment> = {}): Experiment {
    return super.create({ id: input.id ?? randomUUID() });
  }

  /**
   * Return the experiment with the supplied id, creating it when missing.
   * Experiments are never mutated after creation.
   */
  override upsert(input: Insertable<Experiment> = {}): Experiment {
    if (input.id !== undefined) {
      const existing = this.getById(input.id);
      if (existing) {
        return existing;
      }
    }
    return this.create(input);
  }
}
