/**
 * Relational store for cases, documents, sections and analysis output
 */

export { openDatabase, closeDatabase, checkDbConnection, nowIso, IN_MEMORY_DB, type Db } from './client.js';
export * from './entities.js';
export { BaseRepository, toColumnName, toPropertyName, type PageOptions } from './repositories/base.js';
export * from './repositories/cases.js';
export * from './repositories/documents.js';
export * from './repositories/experiments.js';
export * from './repositories/analysis.js';
export * from './repositories/prompt-templates.js';
export * from './repositories/events.js';
export { createRepositories, withSession, deleteCaseCascade, type Repositories } from './session.js';
