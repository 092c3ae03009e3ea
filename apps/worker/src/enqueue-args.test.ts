import { describe, it, expect } from 'vitest';
import { buildJobId } from '@caselens/core';
import { buildJob } from './enqueue-args.js';

describe('buildJob', () => {
  it('should give every run without --correlation its own job id', () => {
    const first = buildJob(['analyze-section', '--section', '12']);
    const second = buildJob(['analyze-section', '--section', '12']);
    if (!first || !second) throw new Error('expected jobs');

    const firstId = buildJobId(first);
    const secondId = buildJobId(second);
    expect(firstId).toMatch(/^analyze-section__12__/);
    expect(secondId).toMatch(/^analyze-section__12__/);
    expect(firstId).not.toBe(secondId);
  });

  it('should keep an explicit correlation id', () => {
    const job = buildJob(['analyze-section', '--section', '12', '--correlation', 'run-1']);
    if (!job) throw new Error('expected a job');

    expect(buildJobId(job)).toBe('analyze-section__12__run-1');
  });

  it('should split a urn list and the task filter for workflows', () => {
    const job = buildJob(['workflow', '--type', 'urn_list', '--value', '01AB,02CD', '--tasks', 'a, b', '--correlation', 'c1']);

    expect(job).toEqual({
      name: 'workflow',
      data: { triggerType: 'urn_list', value: ['01AB', '02CD'], experimentId: undefined, correlationId: 'c1', taskIds: ['a', 'b'] },
    });
  });

  it('should reject incomplete arguments', () => {
    expect(buildJob(['analyze-section', '--section', 'x'])).toBeNull();
    expect(buildJob(['ingest', '--type', 'folder', '--value', 'a'])).toBeNull();
    expect(buildJob(['cleanup'])).toBeNull();
  });
});
