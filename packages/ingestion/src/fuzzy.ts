/**
 * Fuzzy subset validation
 *
 * Gate for model-extracted snippets: a snippet is accepted only when nearly all
 * of its characters can be found, in order and close together, in the source text.
 */

import pino from 'pino';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/** Characters allowed between matching blocks of one run */
export const BIGGEST_ALLOWED_GAP = 100;
/** Share of the snippet that must be covered by one run */
export const SIMILARITY_THRESHOLD = 0.9;

export interface MatchingBlock {
  /** start in a */
  a: number;
  /** start in b */
  b: number;
  size: number;
}

export interface SubsetOptions {
  maxGap?: number;
  threshold?: number;
}

function clean(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const char = b.charAt(j);
    const list = positions.get(char);
    if (list) {
      list.push(j);
    } else {
      positions.set(char, [j]);
    }
  }
  return positions;
}

function findLongestMatch(
  a: string,
  b: string,
  positions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchingBlock {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;
  let lengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a.charAt(i)) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (lengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    lengths = next;
  }

  while (bestI > alo && bestJ > blo && a.charAt(bestI - 1) === b.charAt(bestJ - 1)) {
    bestI--;
    bestJ--;
    bestSize++;
  }
  while (bestI + bestSize < ahi && bestJ + bestSize < bhi && a.charAt(bestI + bestSize) === b.charAt(bestJ + bestSize)) {
    bestSize++;
  }

  return { a: bestI, b: bestJ, size: bestSize };
}

/**
 * Maximal matching blocks between a and b, ordered by position, adjacent blocks
 * collapsed, terminated by a zero-size block at (a.length, b.length)
 */
export function getMatchingBlocks(a: string, b: string): MatchingBlock[] {
  const positions = indexPositions(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  const found: MatchingBlock[] = [];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const block = findLongestMatch(a, b, positions, alo, ahi, blo, bhi);
    if (block.size > 0) {
      found.push(block);
      if (alo < block.a && blo < block.b) {
        queue.push([alo, block.a, blo, block.b]);
      }
      if (block.a + block.size < ahi && block.b + block.size < bhi) {
        queue.push([block.a + block.size, ahi, block.b + block.size, bhi]);
      }
    }
  }

  found.sort((x, y) => x.a - y.a || x.b - y.b || x.size - y.size);

  const collapsed: MatchingBlock[] = [];
  let current: MatchingBlock = { a: 0, b: 0, size: 0 };
  for (const block of found) {
    if (current.a + current.size === block.a && current.b + current.size === block.b) {
      current = { ...current, size: current.size + block.size };
    } else {
      if (current.size > 0) collapsed.push(current);
      current = block;
    }
  }
  if (current.size > 0) collapsed.push(current);
  collapsed.push({ a: a.length, b: b.length, size: 0 });

  return collapsed;
}

/**
 * Longest span of text covered by one run of nearby matching blocks, relative to
 * the cleaned subset length. The span includes the text inside tolerated gaps,
 * so the ratio can exceed 1.
 */
export function subsetSimilarity(text: string, subset: string, maxGap = BIGGEST_ALLOWED_GAP): number {
  const textClean = clean(text);
  const subsetClean = clean(subset);
  if (subsetClean.length === 0) {
    return 0;
  }

  let best = 0;
  let runStart = -1;
  let runEnd = -1;
  for (const block of getMatchingBlocks(textClean, subsetClean)) {
    if (block.size === 0) continue;
    if (runEnd >= 0 && block.a <= runEnd + maxGap) {
      runEnd = Math.max(runEnd, block.a + block.size);
    } else {
      runStart = block.a;
      runEnd = block.a + block.size;
    }
    best = Math.max(best, runEnd - runStart);
  }

  return best / subsetClean.length;
}

/**
 * Whether subset is, allowing small differences, a genuine excerpt of text
 */
export function isValidSubset(text: string, subset: string, options: SubsetOptions = {}): boolean {
  const { maxGap = BIGGEST_ALLOWED_GAP, threshold = SIMILARITY_THRESHOLD } = options;

  if (clean(subset).length === 0) {
    logger.info({ event: 'ingestion.subset.empty' }, 'Cleaned subset is empty');
    return false;
  }

  const ratio = subsetSimilarity(text, subset, maxGap);
  const valid = ratio >= threshold;
  if (!valid) {
    logger.info(
      { event: 'ingestion.subset.rejected', similarity: Number(ratio.toFixed(4)), subsetChars: subset.length },
      'Subset similarity too low'
    );
  }
  return valid;
}
