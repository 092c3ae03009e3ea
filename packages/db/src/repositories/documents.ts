import type { Db } from '../client.js';
import { DocumentSchema, SectionSchema, VersionSchema } from '../entities.js';
import type { Document, Section, Version } from '../entities.js';
import { BaseRepository } from './base.js';

export class DocumentRepository extends BaseRepository<Document> {
  constructor(db: Db) {
    super(db, 'documents', DocumentSchema, Object.keys(DocumentSchema.shape));
  }
}

export class VersionRepository extends BaseRepository<Version> {
  constructor(db: Db) {
    super(db, 'versions', VersionSchema, Object.keys(VersionSchema.shape));
  }
}

export class SectionRepository extends BaseRepository<Section> {
  constructor(db: Db) {
    super(db, 'sections', SectionSchema, Object.keys(SectionSchema.shape));
  }
}
