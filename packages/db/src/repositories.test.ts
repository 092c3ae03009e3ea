import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, closeDatabase, IN_MEMORY_DB } from './client.js';
import type { Db } from './client.js';
import { createRepositories, withSession, deleteCaseCascade } from './session.js';
import type { Repositories } from './session.js';
import { compareVersions } from './repositories/prompt-templates.js';
import { createDbAuditSink } from './repositories/events.js';

let db: Db;
let repos: Repositories;

beforeEach(() => {
  db = openDatabase(IN_MEMORY_DB);
  repos = createRepositories(db);
});

afterEach(() => {
  closeDatabase(db);
});

describe('BaseRepository', () => {
  it('should create rows and map columns back to camelCase', () => {
    const created = repos.cases.create({ urn: '01TS1111111', areaName: 'North', finalised: true });

    expect(created.id).toBe(1);
    expect(created.urn).toBe('01TS1111111');
    expect(created.areaName).toBe('North');
    expect(created.finalised).toBe(true);
    expect(created.unitId).toBeNull();
    expect(typeof created.createdAt).toBe('string');
  });

  it('should filter with getBy, count and exists, treating null as IS NULL', () => {
    const first = repos.cases.create({ urn: 'A' });
    repos.documents.create({ caseId: first.id, mimeType: 'application/pdf' });
    repos.documents.create({ caseId: first.id });

    expect(repos.documents.count({ caseId: first.id })).toBe(2);
    expect(repos.documents.getBy({ mimeType: null })).toHaveLength(1);
    expect(repos.documents.exists({ mimeType: 'application/pdf' })).toBe(true);
    expect(repos.documents.exists({ mimeType: 'text/plain' })).toBe(false);
  });

  it('should update in place on upsert when the supplied id exists and create otherwise', () => {
    const kase = repos.cases.create({ urn: 'B' });
    const document = repos.documents.upsert({ id: 900, caseId: kase.id, originalFileName: 'first.pdf' });
    expect(document.id).toBe(900);

    const again = repos.documents.upsert({ id: 900, caseId: kase.id, originalFileName: 'renamed.pdf' });
    expect(again.id).toBe(900);
    expect(again.originalFileName).toBe('renamed.pdf');
    expect(repos.documents.count()).toBe(1);
  });

  it('should page through getAll', () => {
    for (const urn of ['p1', 'p2', 'p3']) {
      repos.cases.create({ urn });
    }
    expect(repos.cases.getAll({ limit: 2, offset: 1 }).map((row) => row.urn)).toEqual(['p2', 'p3']);
  });
});

describe('CaseRepository.upsertCase', () => {
  it('should update by id, then by URN, and otherwise create', () => {
    const byId = repos.cases.upsertCase({ id: 10, urn: 'URN-1', areaName: 'East' });
    expect(byId.id).toBe(10);

    const sameId = repos.cases.upsertCase({ id: 10, urn: 'URN-1', areaName: 'West' });
    expect(sameId.id).toBe(10);
    expect(sameId.areaName).toBe('West');

    const byUrn = repos.cases.upsertCase({ urn: 'URN-1', unitName: 'Unit 4' });
    expect(byUrn.id).toBe(10);
    expect(byUrn.unitName).toBe('Unit 4');
    expect(byUrn.areaName).toBe('West');

    const fresh = repos.cases.upsertCase({ urn: 'URN-2' });
    expect(fresh.id).not.toBe(10);
    expect(repos.cases.count()).toBe(2);
  });
});

describe('ExperimentRepository', () => {
  it('should generate a UUID when no id is supplied', () => {
    const experiment = repos.experiments.upsert();
    expect(experiment.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should return the existing experiment for a supplied id', () => {
    const first = repos.experiments.upsert({ id: 'exp-1' });
    const second = repos.experiments.upsert({ id: 'exp-1' });
    expect(second).toEqual(first);
    expect(repos.experiments.count()).toBe(1);
  });
});

describe('PromptTemplateRepository', () => {
  it('should compare versions numerically by segment', () => {
    expect(compareVersions('10', '9')).toBe(1);
    expect(compareVersions('1.2', '1.10')).toBe(-1);
    expect(compareVersions('1.0', '1.0.1')).toBe(-1);
    expect(compareVersions(null, '0')).toBe(-1);
    expect(compareVersions('b', 'a')).toBe(1);
  });

  it('should return the greatest version for a key', () => {
    repos.promptTemplates.create({ agent: 'critic', theme: 'theme1', pattern: 'emotional', version: '9', template: 'v9' });
    repos.promptTemplates.create({ agent: 'critic', theme: 'theme1', pattern: 'emotional', version: '10', template: 'v10' });
    repos.promptTemplates.create({ agent: 'critic', theme: 'theme1', pattern: 'relevant', version: '99', template: 'other' });

    expect(repos.promptTemplates.getLatest({ agent: 'critic', theme: 'theme1', pattern: 'emotional' })?.template).toBe('v10');
    expect(repos.promptTemplates.getLatest({ agent: 'missing' })).toBeNull();
  });

  it('should replace the text of an identical key and version on upsertBy', () => {
    repos.promptTemplates.upsertBy({ agent: 'redactor', version: '1', template: 'old' });
    repos.promptTemplates.upsertBy({ agent: 'redactor', version: '1', template: 'new' });

    expect(repos.promptTemplates.count({ agent: 'redactor' })).toBe(1);
    expect(repos.promptTemplates.getLatest({ agent: 'redactor' })?.template).toBe('new');
  });
});

describe('withSession', () => {
  it('should roll back every write when the callback throws', () => {
    expect(() =>
      withSession(repos, (session) => {
        session.cases.create({ urn: 'rolled-back' });
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect(repos.cases.getByUrn('rolled-back')).toBeNull();
  });

  it('should commit when the callback returns', () => {
    const created = withSession(repos, (session) => session.cases.create({ urn: 'kept' }));
    expect(repos.cases.getById(created.id)?.urn).toBe('kept');
  });
});

describe('deleteCaseCascade', () => {
  it('should remove the case and everything it owns', () => {
    const kase = repos.cases.create({ urn: 'C-1' });
    const defendant = repos.defendants.create({ caseId: kase.id, gender: 'F' });
    repos.charges.create({ defendantId: defendant.id, code: 'X1' });
    repos.offences.create({ defendantId: defendant.id, active: false });
    const document = repos.documents.create({ caseId: kase.id });
    const version = repos.versions.create({ documentId: document.id });
    const experiment = repos.experiments.create();
    const section = repos.sections.create({ versionId: version.id, documentId: document.id, experimentId: experiment.id });
    const job = repos.analysisJobs.create({ sectionId: section.id, experimentId: experiment.id, taskIds: 'a,b' });
    repos.analysisResults.create({ analysisJobId: job.id, experimentId: experiment.id, content: 'finding' });

    expect(deleteCaseCascade(repos, kase.id)).toBe(true);

    expect(repos.cases.count()).toBe(0);
    expect(repos.defendants.count()).toBe(0);
    expect(repos.charges.count()).toBe(0);
    expect(repos.offences.count()).toBe(0);
    expect(repos.documents.count()).toBe(0);
    expect(repos.versions.count()).toBe(0);
    expect(repos.sections.count()).toBe(0);
    expect(repos.analysisJobs.count()).toBe(0);
    expect(repos.analysisResults.count()).toBe(0);
    expect(repos.experiments.count()).toBe(1);
  });

  it('should report a missing case', () => {
    expect(deleteCaseCascade(repos, 404)).toBe(false);
  });
});

describe('createDbAuditSink', () => {
  it('should append event rows with stringified object ids', () => {
    const sink = createDbAuditSink(db);
    sink.log({
      eventType: 'INGESTION',
      actorId: 'INGESTION_ORCHESTRATOR',
      action: 'CMS_AUTH_REQUEST',
      objectType: 'Case',
      objectId: 7,
      correlationId: 'corr-9',
    });

    const [event] = repos.events.getByCorrelation('corr-9');
    expect(event?.objectId).toBe('7');
    expect(event?.action).toBe('CMS_AUTH_REQUEST');
    expect(event?.source).toBe('caselens');
  });

  it('should report job task ids in order', () => {
    const experiment = repos.experiments.create();
    const kase = repos.cases.create({ urn: 'J' });
    const document = repos.documents.create({ caseId: kase.id });
    const version = repos.versions.create({ documentId: document.id });
    const section = repos.sections.create({ versionId: version.id, experimentId: experiment.id });
    const job = repos.analysisJobs.create({ sectionId: section.id, experimentId: experiment.id, taskIds: 'x,y' });
    expect(repos.analysisJobs.taskIdsOf(job)).toEqual(['x', 'y']);
  });
});
