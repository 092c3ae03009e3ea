import { describe, it, expect } from 'vitest';
import { fanIn, fanOut } from './graph.js';
import type { Branch } from './graph.js';

interface Item {
  key: string;
  value: number;
}

describe('fanOut', () => {
  it('should start every (item, branch) unit before any of them completes', async () => {
    const started: string[] = [];
    const releases: Array<() => void> = [];
    const gate = (label: string) =>
      new Promise<string>((resolve) => {
        started.push(label);
        releases.push(() => resolve(label));
        if (releases.length === 4) {
          releases.forEach((release) => release());
        }
      });

    const branches: Array<Branch<Item, string>> = [(item) => gate(`a:${item.key}`), (item) => gate(`b:${item.key}`)];
    const fragments = await fanOut(
      [
        { key: 'x', value: 1 },
        { key: 'y', value: 2 },
      ],
      branches
    );

    expect(started).toEqual(['a:x', 'b:x', 'a:y', 'b:y']);
    expect(fragments).toEqual(['a:x', 'b:x', 'a:y', 'b:y']);
  });

  it('should reject with the first failure only after every unit settles', async () => {
    let finished = 0;
    const slow: Branch<Item, number> = async (item) => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      finished++;
      return item.value;
    };
    const failing: Branch<Item, number> = async () => {
      throw new Error('branch exploded');
    };

    await expect(fanOut([{ key: 'x', value: 1 }], [failing, slow])).rejects.toThrow('branch exploded');
    expect(finished).toBe(1);
  });

  it('should return nothing for no items', async () => {
    await expect(fanOut<Item, number>([], [async (item) => item.value])).resolves.toEqual([]);
  });
});

describe('fanIn', () => {
  const key = {
    record: (record: { id: string }) => record.id,
    fragment: (fragment: { id: string }) => fragment.id,
  };

  it('should fold fragments onto the record with the same key', () => {
    const records = [
      { id: 'a', tags: ['critic'] },
      { id: 'b', tags: ['critic'] },
    ];
    const fragments = [
      { id: 'b', tag: 'rewrite' },
      { id: 'a', tag: 'witness' },
      { id: 'a', tag: 'rewrite' },
      { id: 'z', tag: 'orphan' },
    ];

    const merged = fanIn(records, fragments, key, (record, fragment) => ({
      ...record,
      tags: [...record.tags, fragment.tag],
    }));

    expect(merged).toEqual([
      { id: 'a', tags: ['critic', 'witness', 'rewrite'] },
      { id: 'b', tags: ['critic', 'rewrite'] },
    ]);
  });

  it('should leave records without fragments unchanged', () => {
    const records = [{ id: 'a' }];
    expect(fanIn(records, [], key, (record) => record)).toEqual([{ id: 'a' }]);
  });
});
