import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError, ValidationError } from '@caselens/core';
import type { AuditEvent } from '@caselens/core';
import { openDatabase, IN_MEMORY_DB, createRepositories } from '@caselens/db';
import type { Db, Repositories, Section } from '@caselens/db';
import { createMemoryContentStore } from '@caselens/storage';
import type { ContentStore } from '@caselens/storage';
import { createFakeLlmClient } from '@caselens/llm/testing';
import type { FakeLlmClient } from '@caselens/llm/testing';
import { AnalysisOrchestrator } from './orchestrator.js';
import type { AnalysisOrchestratorDeps } from './orchestrator.js';
import { DEFAULT_TASKS, resolveTasks } from './tasks.js';
import type { AnalysisTask } from './types.js';

const SECTION_TEXT = 'The suspect was polite and cooperative throughout.';

const ECHO_A: AnalysisTask = { taskId: 'echo-a', worker: { kind: 'echo', content: 'A', selfConfidence: 0.5 }, saveResults: true };
const ECHO_B: AnalysisTask = { taskId: 'echo-b', worker: { kind: 'echo', content: 'B' }, saveResults: false };
const ECHO_TASKS: AnalysisTask[] = [ECHO_A, ECHO_B];

async function seedSection(repos: Repositories, store: ContentStore, withContent = true): Promise<Section> {
  const caseRow = repos.cases.create({ urn: '01AB2345678' });
  const document = repos.documents.create({ caseId: caseRow.id });
  const version = repos.versions.create({ documentId: document.id });
  const experiment = repos.experiments.create({ id: 'exp-1' });
  const section = repos.sections.create({
    versionId: version.id,
    documentId: document.id,
    experimentId: experiment.id,
    redactedContent: SECTION_TEXT,
  });
  if (!withContent) {
    return section;
  }
  const name = `exp-1/${version.id}/${section.id}.txt`;
  await store.put('sections', name, SECTION_TEXT);
  return repos.sections.update(section.id, { contentBlobContainer: 'sections', contentBlobName: name }) ?? section;
}

describe('resolveTasks', () => {
  it('should select every task when no ids are given', () => {
    expect(resolveTasks(ECHO_TASKS).map((task) => task.taskId)).toEqual(['echo-a', 'echo-b']);
    expect(resolveTasks(ECHO_TASKS, []).map((task) => task.taskId)).toEqual(['echo-a', 'echo-b']);
  });

  it('should keep request order and drop unknown ids', () => {
    expect(resolveTasks(ECHO_TASKS, ['echo-b', 'nope', 'echo-a']).map((task) => task.taskId)).toEqual(['echo-b', 'echo-a']);
    expect(resolveTasks(ECHO_TASKS, ['nope'])).toEqual([]);
  });
});

describe('DEFAULT_TASKS', () => {
  it('should register the thirteen saved critic-graph tasks', () => {
    expect(DEFAULT_TASKS).toHaveLength(13);
    expect(DEFAULT_TASKS[0]).toEqual({
      taskId: 'theme1-appropriateness',
      worker: { kind: 'critic-graph', themeId: 'theme1', patternId: 'appropriateness' },
      saveResults: true,
    });
    expect(DEFAULT_TASKS.map((task) => task.taskId)).toContain('theme2-victim');
    expect(DEFAULT_TASKS.every((task) => task.worker.kind === 'critic-graph' && task.saveResults)).toBe(true);
  });
});

describe('AnalysisOrchestrator', () => {
  let db: Db;
  let repos: Repositories;
  let store: ReturnType<typeof createMemoryContentStore>;
  let llm: FakeLlmClient;
  let events: AuditEvent[];

  const build = (overrides: Partial<AnalysisOrchestratorDeps> = {}) =>
    new AnalysisOrchestrator({
      db,
      contentStore: store,
      llm,
      retry: { attempts: 3, delayMs: 0 },
      tasks: ECHO_TASKS,
      audit: { log: (event) => events.push(event) },
      correlationId: 'corr-9',
      ...overrides,
    });

  beforeEach(() => {
    db = openDatabase(IN_MEMORY_DB);
    repos = createRepositories(db);
    store = createMemoryContentStore();
    llm = createFakeLlmClient(() => '{"analysis_results": []}');
    events = [];
  });

  it('should create a job and persist only results of saving tasks', async () => {
    const section = await seedSection(repos, store);

    const job = await build().analyzeSection(section.id);

    expect(job).toMatchObject({ sectionId: section.id, experimentId: 'exp-1', taskIds: 'echo-a,echo-b' });
    expect(repos.analysisResults.getByJob(job.id)).toEqual([
      expect.objectContaining({ analysisJobId: job.id, experimentId: 'exp-1', content: 'A', selfConfidence: 0.5 }),
    ]);
  });

  it('should record only the known task ids on the job', async () => {
    const section = await seedSection(repos, store);

    const job = await build().analyzeSection(section.id, ['echo-b', 'missing']);

    expect(job.taskIds).toBe('echo-b');
    expect(repos.analysisJobs.taskIdsOf(job)).toEqual(['echo-b']);
    expect(repos.analysisResults.count()).toBe(0);
  });

  it('should upsert a supplied experiment', async () => {
    const section = await seedSection(repos, store);

    const job = await build().analyzeSection(section.id, undefined, 'exp-2');

    expect(job.experimentId).toBe('exp-2');
    expect(repos.experiments.getById('exp-2')).not.toBeNull();
    expect(repos.analysisResults.getByJob(job.id)[0]?.experimentId).toBe('exp-2');
  });

  it('should append a new job and new results on every run', async () => {
    const section = await seedSection(repos, store);
    const orchestrator = build();

    const first = await orchestrator.analyzeSection(section.id);
    const second = await orchestrator.analyzeSection(section.id);

    expect(second.id).not.toBe(first.id);
    expect(repos.analysisJobs.count({ sectionId: section.id })).toBe(2);
    expect(repos.analysisResults.count()).toBe(2);
  });

  it('should raise NotFoundError for an unknown section', async () => {
    await expect(build().analyzeSection(404)).rejects.toBeInstanceOf(NotFoundError);
    expect(repos.analysisJobs.count()).toBe(0);
  });

  it('should refuse a section whose content pointer is not set yet', async () => {
    const section = await seedSection(repos, store, false);

    await expect(build().analyzeSection(section.id)).rejects.toBeInstanceOf(ValidationError);
    expect(repos.analysisJobs.count()).toBe(0);
  });

  it('should pass the stored section text to the workers', async () => {
    const section = await seedSection(repos, store);
    const tasks: AnalysisTask[] = [
      { taskId: 'simple', worker: { kind: 'simple-llm', promptTemplate: 'Check: {{ contextText }}' }, saveResults: true },
    ];

    await build({ tasks }).analyzeSection(section.id);

    expect(llm.prompts).toEqual([`Check: ${SECTION_TEXT}`]);
  });

  it('should keep the job and earlier results when a task fails', async () => {
    const section = await seedSection(repos, store);
    const tasks: AnalysisTask[] = [
      ECHO_A,
      { taskId: 'broken', worker: { kind: 'simple-llm', promptTemplate: '' }, saveResults: true },
    ];

    await expect(build({ tasks }).analyzeSection(section.id)).rejects.toThrow('Prompt template is not provided');

    expect(repos.analysisJobs.count()).toBe(1);
    expect(repos.analysisResults.getAll().map((result) => result.content)).toEqual(['A']);
  });

  it('should write job and task audit events', async () => {
    const section = await seedSection(repos, store);

    const job = await build().analyzeSection(section.id);

    expect(events.map((event) => [event.action, event.objectId])).toEqual([
      ['ANALYSIS_JOB_BEGIN', job.id],
      ['ANALYSIS_TASK_BEGIN', 'echo-a'],
      ['ANALYSIS_TASK_END', 'echo-a'],
      ['ANALYSIS_TASK_BEGIN', 'echo-b'],
      ['ANALYSIS_TASK_END', 'echo-b'],
    ]);
    expect(events.every((event) => event.correlationId === 'corr-9')).toBe(true);
  });

  it('should run every task at once in concurrent mode', async () => {
    const section = await seedSection(repos, store);
    const pending: Array<() => void> = [];
    llm = createFakeLlmClient(
      (prompt) =>
        new Promise<string>((resolve) => {
          pending.push(() => resolve(JSON.stringify({ analysis_results: [{ content: prompt }] })));
          if (pending.length === 2) {
            pending.forEach((release) => release());
          }
        })
    );
    const tasks: AnalysisTask[] = [
      { taskId: 'one', worker: { kind: 'simple-llm', promptTemplate: 'one' }, saveResults: true },
      { taskId: 'two', worker: { kind: 'simple-llm', promptTemplate: 'two' }, saveResults: true },
    ];

    const job = await build({ tasks, mode: 'concurrent' }).analyzeSection(section.id);

    expect(
      repos.analysisResults
        .getByJob(job.id)
        .map((result) => result.content)
        .sort()
    ).toEqual(['one', 'two']);
  });
});
