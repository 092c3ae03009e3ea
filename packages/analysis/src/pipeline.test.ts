import { describe, it, expect } from 'vitest';
import { buildSettings } from '@caselens/config';
import { openDatabase, IN_MEMORY_DB, createRepositories } from '@caselens/db';
import { IngestionOrchestrator } from '@caselens/ingestion';
import { createPlainTextParser } from '@caselens/layout';
import { createFakeLlmClient } from '@caselens/llm/testing';
import { createMemoryContentStore } from '@caselens/storage';
import { AnalysisOrchestrator } from './orchestrator.js';
import type { AnalysisTask } from './types.js';

const REPORT = 'Officer attended at 10pm. The angry suspect was arrested after a short chase. He was calm later.';
const NARRATIVE = 'The angry suspect was arrested after a short chase.';

const TASKS: AnalysisTask[] = [
  { taskId: 'tone', worker: { kind: 'simple-llm', promptTemplate: 'Tone: {{ contextText }}' }, saveResults: true },
  { taskId: 'theme1-emotional', worker: { kind: 'prompt-llm', themeId: 'theme1', patternId: 'emotional' }, saveResults: true },
];

describe('ingest then analyse', () => {
  it('should run every registered task over a section ingested from a file', async () => {
    const db = openDatabase(IN_MEMORY_DB);
    const repos = createRepositories(db);
    const store = createMemoryContentStore();
    repos.promptTemplates.create({ agent: 'section_extractor', version: '1', template: 'Extract: {{ contextText }}' });
    repos.promptTemplates.create({ agent: 'redactor', version: '1', template: 'Redact: {{ contextText }}' });
    const emotional = repos.promptTemplates.create({
      theme: 'theme1',
      pattern: 'emotional',
      version: '1',
      template: 'Emotional: {{ contextText }}',
    });

    const llm = createFakeLlmClient((prompt) => {
      if (prompt.startsWith('Extract: ')) {
        return JSON.stringify({ narratives: [NARRATIVE] });
      }
      if (prompt.startsWith('Redact: ')) {
        return JSON.stringify({ redacted_text: prompt.replace('Redact: ', '') });
      }
      const content = prompt.startsWith('Tone: ') ? 'short chase' : 'angry suspect';
      return JSON.stringify({ analysis_results: [{ content, justification: 'flagged' }] });
    });

    const ingested = await new IngestionOrchestrator({
      settings: buildSettings({ retry: { attempts: 1, delayMs: 0 } }),
      db,
      contentStore: store,
      parser: createPlainTextParser(),
      llm,
      createCmsClient: () => {
        throw new Error('case management is not used for file ingestion');
      },
      readFile: async () => Buffer.from(REPORT),
    }).ingest({ type: 'filepath', filePath: '/tmp/report.txt' }, 'exp-1');

    expect(ingested).toMatchObject({ success: true, sectionIds: [1] });

    const job = await new AnalysisOrchestrator({
      db,
      contentStore: store,
      llm,
      retry: { attempts: 1, delayMs: 0 },
      tasks: TASKS,
    }).analyzeSection(1);

    expect(repos.analysisJobs.taskIdsOf(job)).toEqual(['tone', 'theme1-emotional']);
    expect(llm.prompts.slice(-2)).toEqual([`Tone: ${NARRATIVE}`, `Emotional: ${NARRATIVE}`]);
    expect(repos.analysisResults.getByJob(job.id)).toEqual([
      expect.objectContaining({ analysisJobId: job.id, content: 'short chase', promptTemplateId: null }),
      expect.objectContaining({ analysisJobId: job.id, content: 'angry suspect', promptTemplateId: emotional.id, themeId: 'theme1' }),
    ]);
  });
});
