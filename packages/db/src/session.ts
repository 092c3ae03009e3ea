import pino from 'pino';
import type { Db } from './client.js';
import { AnalysisJobRepository, AnalysisResultRepository } from './repositories/analysis.js';
import { CaseRepository, ChargeRepository, DefendantRepository, OffenceRepository } from './repositories/cases.js';
import { DocumentRepository, SectionRepository, VersionRepository } from './repositories/documents.js';
import { EventRepository } from './repositories/events.js';
import { ExperimentRepository } from './repositories/experiments.js';
import { PromptTemplateRepository } from './repositories/prompt-templates.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface Repositories {
  db: Db;
  cases: CaseRepository;
  defendants: DefendantRepository;
  charges: ChargeRepository;
  offences: OffenceRepository;
  documents: DocumentRepository;
  versions: VersionRepository;
  experiments: ExperimentRepository;
  sections: SectionRepository;
  analysisJobs: AnalysisJobRepository;
  analysisResults: AnalysisResultRepository;
  promptTemplates: PromptTemplateRepository;
  events: EventRepository;
}

export function createRepositories(db: Db): Repositories {
  return {
    db,
    cases: new CaseRepository(db),
    defendants: new DefendantRepository(db),
    charges: new ChargeRepository(db),
    offences: new OffenceRepository(db),
    documents: new DocumentRepository(db),
    versions: new VersionRepository(db),
    experiments: new ExperimentRepository(db),
    sections: new SectionRepository(db),
    analysisJobs: new AnalysisJobRepository(db),
    analysisResults: new AnalysisResultRepository(db),
    promptTemplates: new PromptTemplateRepository(db),
    events: new EventRepository(db),
  };
}

/**
 * Run fn as one unit of work: committed when it returns, rolled back when it throws.
 *
 * The callback is synchronous; better-sqlite3 refuses a transaction function that
 * returns a promise, so no remote call can run while the session is open.
 */
export function withSession<T>(repos: Repositories, fn: (session: Repositories) => T): T {
  return repos.db.transaction(() => fn(repos))();
}

/**
 * Delete a case and everything it owns, children first
 */
export function deleteCaseCascade(repos: Repositories, caseId: number): boolean {
  return withSession(repos, (session) => {
    const target = session.cases.getById(caseId);
    if (!target) {
      return false;
    }

    const documents = session.documents.getBy({ caseId });
    let sectionCount = 0;
    for (const document of documents) {
      for (const version of session.versions.getBy({ documentId: document.id })) {
        for (const section of session.sections.getBy({ versionId: version.id })) {
          for (const job of session.analysisJobs.getBy({ sectionId: section.id })) {
            session.analysisResults.deleteBy({ analysisJobId: job.id });
            session.analysisJobs.delete(job.id);
          }
          session.sections.delete(section.id);
          sectionCount++;
        }
        session.versions.delete(version.id);
      }
      session.documents.delete(document.id);
    }

    const defendants = session.defendants.getBy({ caseId });
    for (const defendant of defendants) {
      session.charges.deleteBy({ defendantId: defendant.id });
      session.offences.deleteBy({ defendantId: defendant.id });
      session.defendants.delete(defendant.id);
    }

    session.cases.delete(caseId);
    logger.info(
      {
        event: 'db.case.cascade_delete',
        caseId,
        documents: documents.length,
        defendants: defendants.length,
        sections: sectionCount,
      },
      'Case deleted with dependants'
    );
    return true;
  });
}
