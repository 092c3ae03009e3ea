import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ValidationError } from '@caselens/core';
import { openDatabase, IN_MEMORY_DB, createRepositories } from '@caselens/db';
import type { Repositories } from '@caselens/db';
import { expandPromptPack, loadPromptPack, seedPrompts } from './seed-prompts.js';
import type { PromptPack } from './seed-prompts.js';
import { DEFAULT_TASKS } from './tasks.js';

const TINY_PACK: PromptPack = {
  version: '2',
  agents: [{ agent: 'reviewer', template: 'Review {{ phrase }}' }],
  patternAgents: [{ agent: 'critic', name: 'Critic', template: '%PATTERN_NAME% (%PATTERN_ID%): %PATTERN_DESCRIPTION%' }],
  patterns: [{ theme: 'theme1', pattern: 'emotional', name: 'Emotive language', description: 'Loaded words.' }],
};

describe('expandPromptPack', () => {
  it('should fill pattern placeholders once per pattern', () => {
    expect(expandPromptPack(TINY_PACK)).toEqual([
      { agent: 'reviewer', template: 'Review {{ phrase }}', version: '2' },
      {
        agent: 'critic',
        theme: 'theme1',
        pattern: 'emotional',
        name: 'Critic: Emotive language',
        version: '2',
        template: 'Emotive language (emotional): Loaded words.',
      },
    ]);
  });

  it('should expand the bundled pack to shared plus per-pattern templates', () => {
    const seeds = expandPromptPack(loadPromptPack());

    expect(seeds).toHaveLength(31);
    const victim = seeds.find((seed) => seed.agent === 'critic' && seed.theme === 'theme2' && seed.pattern === 'victim');
    expect(victim?.template).toContain('Victim blaming');
    expect(victim?.template).toContain('{{ contextText }}');
    expect(victim?.template).not.toContain('%PATTERN');
  });
});

describe('loadPromptPack', () => {
  it('should reject a pack that does not match the schema', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'prompts-')), 'broken.json');
    writeFileSync(path, JSON.stringify({ version: '1', agents: [] }));

    expect(() => loadPromptPack(path)).toThrow(ValidationError);
  });
});

describe('seedPrompts', () => {
  let repos: Repositories;

  beforeEach(() => {
    repos = createRepositories(openDatabase(IN_MEMORY_DB));
  });

  it('should be idempotent per key and version', () => {
    seedPrompts(repos);
    seedPrompts(repos);

    expect(repos.promptTemplates.count()).toBe(31);
  });

  it('should replace the text of an existing version', () => {
    seedPrompts(repos, expandPromptPack(TINY_PACK));
    const [reviewer] = expandPromptPack(TINY_PACK);
    seedPrompts(repos, reviewer ? [{ ...reviewer, template: 'Review again {{ phrase }}' }] : []);

    expect(repos.promptTemplates.count()).toBe(2);
    expect(repos.promptTemplates.getLatest({ agent: 'reviewer' })?.template).toBe('Review again {{ phrase }}');
  });

  it('should provide critic and defence templates for every default task', () => {
    seedPrompts(repos);

    for (const task of DEFAULT_TASKS) {
      if (task.worker.kind !== 'critic-graph') continue;
      const key = { theme: task.worker.themeId, pattern: task.worker.patternId };
      expect(repos.promptTemplates.getLatest({ agent: 'critic', ...key })).not.toBeNull();
      expect(repos.promptTemplates.getLatest({ agent: 'defence', ...key })).not.toBeNull();
    }
  });
});
