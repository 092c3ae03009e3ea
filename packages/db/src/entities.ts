/**
 * Row schemas for every table
 *
 * Rows come back from SQLite with snake_case keys; the repository layer maps them to
 * camelCase and validates them here. SQLite has no boolean type, so 0/1 columns are
 * read back through sqliteBoolean.
 */

import { z } from 'zod';

const sqliteBoolean = z
  .union([z.boolean(), z.number()])
  .nullable()
  .transform((value) => (value === null ? null : Boolean(value)));

const id = z.number().int();
const text = z.string().nullable();
const integer = z.number().int().nullable();
const real = z.number().nullable();
const createdAt = z.string();

export const CaseSchema = z.object({
  id,
  urn: z.string(),
  finalised: sqliteBoolean,
  areaId: integer,
  areaName: text,
  unitId: integer,
  unitName: text,
  registrationDate: text,
  createdAt,
});

export const DefendantSchema = z.object({
  id,
  caseId: id,
  dob: text,
  gender: text,
  ethnicity: text,
  createdAt,
});

export const ChargeSchema = z.object({
  id,
  defendantId: id,
  code: text,
  description: text,
  latestVerdict: text,
  createdAt,
});

export const OffenceSchema = z.object({
  id,
  defendantId: id,
  code: text,
  type: text,
  description: text,
  active: sqliteBoolean,
  createdAt,
});

export const DocumentSchema = z.object({
  id,
  caseId: id,
  originalFileName: text,
  cmsDocCategory: text,
  docType: text,
  fileExtension: text,
  mimeType: text,
  createdAt,
});

export const VersionSchema = z.object({
  id,
  documentId: id,
  sourceBlobContainer: text,
  sourceBlobName: text,
  parsedBlobContainer: text,
  parsedBlobName: text,
  createdAt,
});

export const ExperimentSchema = z.object({
  id: z.string(),
  createdAt,
});

export const SectionSchema = z.object({
  id,
  versionId: id,
  documentId: integer,
  experimentId: z.string(),
  redactedContent: text,
  contentBlobContainer: text,
  contentBlobName: text,
  createdAt,
});

export const AnalysisJobSchema = z.object({
  id,
  sectionId: id,
  experimentId: z.string(),
  taskIds: z.string(),
  createdAt,
});

export const AnalysisResultSchema = z.object({
  id,
  analysisJobId: id,
  experimentId: z.string(),
  promptTemplateId: integer,
  themeId: text,
  patternId: text,
  content: z.string(),
  justification: text,
  categoryId: text,
  selfConfidence: real,
  isWitness: sqliteBoolean,
  rewrittenPhrase: text,
  rewrittenExplanation: text,
  defenceVerdict: text,
  defencePattern: text,
  defenceArgument: text,
  reviewerFinalVerdict: text,
  reviewerConfidenceScore: real,
  reviewerReasoning: text,
  createdAt,
});

export const PromptTemplateSchema = z.object({
  id,
  name: text,
  agent: text,
  theme: text,
  pattern: text,
  version: text,
  template: z.string(),
  createdAt,
});

export const EventSchema = z.object({
  id,
  source: text,
  eventType: text,
  actorId: text,
  action: text,
  objectType: text,
  objectId: text,
  correlationId: text,
  createdAt,
});

export type Case = z.infer<typeof CaseSchema>;
export type Defendant = z.infer<typeof DefendantSchema>;
export type Charge = z.infer<typeof ChargeSchema>;
export type Offence = z.infer<typeof OffenceSchema>;
export type Document = z.infer<typeof DocumentSchema>;
export type Version = z.infer<typeof VersionSchema>;
export type Experiment = z.infer<typeof ExperimentSchema>;
export type Section = z.infer<typeof SectionSchema>;
export type AnalysisJob = z.infer<typeof AnalysisJobSchema>;
export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;
export type PromptTemplate = z.infer<typeof PromptTemplateSchema>;
export type EventRecord = z.infer<typeof EventSchema>;

export interface BaseEntity {
  id: number | string;
  createdAt: string;
}

type NullableKeys<T> = { [K in keyof T]-?: null extends T[K] ? K : never }[keyof T];

/**
 * Fields accepted on insert: nullable columns and the id are optional, createdAt is set by the repository
 */
export type Insertable<T extends BaseEntity> = Partial<Pick<T, NullableKeys<T> | 'id'>> &
  Omit<T, NullableKeys<T> | 'id' | 'createdAt'>;

/**
 * Fields accepted on update
 */
export type Updatable<T extends BaseEntity> = Partial<Omit<T, 'id' | 'createdAt'>>;

export type Filters<T extends BaseEntity> = Partial<T>;
