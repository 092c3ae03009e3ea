import { describe, it, expect } from 'vitest';
import { buildJobId, JOB_NAMES } from './queue.js';

describe('buildJobId', () => {
  it('should key analysis jobs by section id', () => {
    expect(buildJobId({ name: JOB_NAMES.ANALYZE_SECTION, data: { sectionId: 42 } })).toBe('analyze-section__42');
  });

  it('should append the correlation id when present', () => {
    const id = buildJobId({
      name: JOB_NAMES.INGEST,
      data: { triggerType: 'urn', value: '01TS0000001', correlationId: 'run-7' },
    });
    expect(id).toBe('ingest__01TS0000001__run-7');
  });

  it('should join URN lists and replace characters BullMQ rejects', () => {
    const id = buildJobId({
      name: JOB_NAMES.WORKFLOW,
      data: { triggerType: 'urn_list', value: ['A:1', 'B 2'] },
    });
    expect(id).toBe('workflow__A_1_B_2');
  });
});
