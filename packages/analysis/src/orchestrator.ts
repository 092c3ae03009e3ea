/**
 * Analysis orchestrator
 *
 * Creates one AnalysisJob per invocation and runs the selected tasks against the
 * section text. Results are appended, never overwritten: re-running a section
 * creates a new job with new results.
 */

import pino from 'pino';
import {
  AuditAction,
  AuditActor,
  AuditEventType,
  DEFAULT_RETRY_POLICY,
  NotFoundError,
  ValidationError,
  errorMessage,
  noopAuditSink,
  safeAudit,
} from '@caselens/core';
import type { AuditActionName, AuditSink, RetryPolicy } from '@caselens/core';
import { createRepositories, withSession } from '@caselens/db';
import type { AnalysisJob, Db, Repositories } from '@caselens/db';
import type { ContentStore } from '@caselens/storage';
import type { LlmClient } from '@caselens/llm';
import { DEFAULT_TASKS, resolveTasks } from './tasks.js';
import type { AnalysisInput, AnalysisTask, WorkerDeps } from './types.js';
import { createWorker } from './workers/index.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export type ExecutionMode = 'sequential' | 'concurrent';

export interface AnalysisOrchestratorDeps {
  db: Db;
  contentStore: ContentStore;
  llm: LlmClient;
  retry?: RetryPolicy;
  tasks?: AnalysisTask[];
  mode?: ExecutionMode;
  audit?: AuditSink;
  correlationId?: string;
}

export class AnalysisOrchestrator {
  private readonly repos: Repositories;
  private readonly contentStore: ContentStore;
  private readonly workerDeps: WorkerDeps;
  private readonly tasks: AnalysisTask[];
  private readonly mode: ExecutionMode;
  private readonly audit: AuditSink;
  private readonly correlationId: string | undefined;

  constructor(deps: AnalysisOrchestratorDeps) {
    this.repos = createRepositories(deps.db);
    this.contentStore = deps.contentStore;
    this.workerDeps = {
      promptTemplates: this.repos.promptTemplates,
      llm: deps.llm,
      retry: deps.retry ?? DEFAULT_RETRY_POLICY,
    };
    this.tasks = deps.tasks ?? DEFAULT_TASKS;
    this.mode = deps.mode ?? 'sequential';
    this.audit = deps.audit ?? noopAuditSink;
    this.correlationId = deps.correlationId;

    logger.debug({ event: 'analysis.orchestrator.init', tasks: this.tasks.length, mode: this.mode }, 'Analysis orchestrator ready');
  }

  get taskIds(): string[] {
    return this.tasks.map((task) => task.taskId);
  }

  /**
   * Analyze a stored section, loading its full text from the content store
   */
  async analyzeSection(sectionId: number, taskIds?: string[], experimentId?: string): Promise<AnalysisJob> {
    const { section, experiment } = withSession(this.repos, (session) => {
      const found = session.sections.getById(sectionId);
      if (!found) {
        throw new NotFoundError('Section', sectionId);
      }
      return { section: found, experiment: session.experiments.upsert({ id: experimentId ?? found.experimentId }) };
    });

    if (!section.contentBlobContainer || !section.contentBlobName) {
      throw new ValidationError(`Section ${sectionId} has no stored content yet`);
    }
    const text = (await this.contentStore.get(section.contentBlobContainer, section.contentBlobName)).toString('utf-8');

    return this.analyze(text, experiment.id, sectionId, taskIds);
  }

  /**
   * Run the selected tasks against text and persist results of tasks that save them
   */
  async analyze(text: string, experimentId: string, sectionId: number, taskIds?: string[]): Promise<AnalysisJob> {
    const tasks = resolveTasks(this.tasks, taskIds);

    const job = withSession(this.repos, (session) =>
      session.analysisJobs.create({
        sectionId,
        experimentId,
        taskIds: tasks.map((task) => task.taskId).join(','),
      })
    );
    logger.info(
      { event: 'analysis.job.created', analysisJobId: job.id, sectionId, experimentId, tasks: tasks.length, mode: this.mode },
      `Created AnalysisJob ${job.id} for section ${sectionId}`
    );
    this.auditEvent(AuditAction.ANALYSIS_JOB_BEGIN, 'ANALYSIS_JOB', job.id);

    const input: AnalysisInput = { text, experimentId, sectionId, analysisJobId: job.id };
    const startTime = Date.now();
    try {
      if (this.mode === 'concurrent') {
        await this.runConcurrently(tasks, input);
      } else {
        for (const task of tasks) {
          await this.runTask(task, input);
        }
      }
    } catch (error) {
      logger.error(
        { event: 'analysis.job.fail', analysisJobId: job.id, sectionId, error: errorMessage(error) },
        `Error analyzing section ${sectionId}`
      );
      throw error;
    }

    logger.info(
      { event: 'analysis.job.success', analysisJobId: job.id, sectionId, durationMs: Date.now() - startTime },
      'Analysis job finished'
    );
    return job;
  }

  private async runConcurrently(tasks: AnalysisTask[], input: AnalysisInput): Promise<void> {
    const settled = await Promise.allSettled(tasks.map((task) => this.runTask(task, input)));
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
    }
  }

  private async runTask(task: AnalysisTask, input: AnalysisInput): Promise<void> {
    this.auditEvent(AuditAction.ANALYSIS_TASK_BEGIN, 'ANALYSIS_TASK', task.taskId);
    const startTime = Date.now();

    try {
      const worker = createWorker(task.worker, this.workerDeps);
      const drafts = await worker.analyze(input);

      if (task.saveResults && drafts.length > 0) {
        withSession(this.repos, (session) => {
          for (const draft of drafts) {
            session.analysisResults.create(draft);
          }
        });
      }

      logger.info(
        {
          event: 'analysis.task.success',
          taskId: task.taskId,
          analysisJobId: input.analysisJobId,
          results: drafts.length,
          saved: task.saveResults,
          durationMs: Date.now() - startTime,
        },
        `Task ${task.taskId} finished`
      );
    } catch (error) {
      logger.error(
        { event: 'analysis.task.fail', taskId: task.taskId, analysisJobId: input.analysisJobId, error: errorMessage(error) },
        `Error running task ${task.taskId}`
      );
      throw error;
    }

    this.auditEvent(AuditAction.ANALYSIS_TASK_END, 'ANALYSIS_TASK', task.taskId);
  }

  private auditEvent(action: AuditActionName, objectType: string, objectId: string | number): void {
    safeAudit(this.audit, {
      eventType: AuditEventType.ANALYSIS_ORCHESTRATION,
      actorId: AuditActor.ANALYSIS_ORCHESTRATOR,
      action,
      objectType,
      objectId,
      correlationId: this.correlationId,
      source: 'AnalysisOrchestrator',
    });
  }
}
