/**
 * Fan-out / fan-in over plain promises
 *
 * Every (item, branch) pair starts at once; the fan-out settles only when all of
 * them have settled. Fragments are merged back onto their record by key after that,
 * so branches never share mutable state.
 */

export type Branch<T, F> = (item: T) => Promise<F>;

/**
 * Run every branch for every item concurrently.
 * Resolves with all fragments, or rejects with the first failure once every unit has settled.
 */
export async function fanOut<T, F>(items: readonly T[], branches: ReadonlyArray<Branch<T, F>>): Promise<F[]> {
  const settled = await Promise.allSettled(items.flatMap((item) => branches.map((branch) => branch(item))));

  const fragments: F[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
    fragments.push(outcome.value);
  }
  return fragments;
}

/**
 * Group fragments by key and fold them onto the record with the same key.
 * Records keep their order; fragments without a record are dropped.
 */
export function fanIn<R, F>(
  records: readonly R[],
  fragments: readonly F[],
  key: { record: (record: R) => string; fragment: (fragment: F) => string },
  merge: (record: R, fragment: F) => R
): R[] {
  const grouped = new Map<string, F[]>();
  for (const fragment of fragments) {
    const fragmentKey = key.fragment(fragment);
    const group = grouped.get(fragmentKey);
    if (group) {
      group.push(fragment);
    } else {
      grouped.set(fragmentKey, [fragment]);
    }
  }

  return records.map((record) => (grouped.get(key.record(record)) ?? []).reduce(merge, record));
}
