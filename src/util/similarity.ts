/**
 * Text similarity used to compare a candidate's page with the legitimate page.
 *
 * Ratcliff/Obershelp matching: find the longest common block, then repeat on the text to
 * its left and to its right. The score is 2·M / (|a| + |b|) where M is the total length
 * of the matched blocks.
 *
 * This is a textual heuristic. Shared boilerplate raises the score between unrelated
 * pages, and padding a clone with junk text lowers it.
 */

export interface SimilarityOptions {
  /**
   * When the second text has at least 200 characters, characters making up more than
   * 1% of it cannot start a match (they can still extend one). Defaults to true.
   */
  autojunk?: boolean;
}

interface MatchingBlock {
  aStart: number;
  bStart: number;
  size: number;
}

const AUTOJUNK_MIN_LENGTH = 200;

function indexPositions(b: string, autojunk: boolean): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b[j];
    const list = positions.get(ch);
    if (list) {
      list.push(j);
    } else {
      positions.set(ch, [j]);
    }
  }

  if (autojunk && b.length >= AUTOJUNK_MIN_LENGTH) {
    const popularAbove = Math.floor(b.length / 100) + 1;
    for (const [ch, list] of positions) {
      if (list.length > popularAbove) positions.delete(ch);
    }
  }

  return positions;
}

function findLongestMatch(
  a: string,
  b: string,
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): MatchingBlock {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;

  // runLengths.get(j) = length of the match ending at a[i - 1] and b[j]
  let runLengths = new Map<number, number>();
  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const k = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    runLengths = next;
  }

  // Popular characters never start a match but may extend one
  while (bestI > aLo && bestJ > bLo && a[bestI - 1] === b[bestJ - 1]) {
    bestI--;
    bestJ--;
    bestSize++;
  }
  while (bestI + bestSize < aHi && bestJ + bestSize < bHi && a[bestI + bestSize] === b[bestJ + bestSize]) {
    bestSize++;
  }

  return { aStart: bestI, bStart: bestJ, size: bestSize };
}

/**
 * Total length of the matching blocks between a and b.
 */
export function countMatches(a: string, b: string, options: SimilarityOptions = {}): number {
  const positions = indexPositions(b, options.autojunk ?? true);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  let range = queue.pop();
  while (range) {
    const [aLo, aHi, bLo, bHi] = range;
    const { aStart, bStart, size } = findLongestMatch(a, b, positions, aLo, aHi, bLo, bHi);
    if (size > 0) {
      matched += size;
      if (aLo < aStart && bLo < bStart) {
        queue.push([aLo, aStart, bLo, bStart]);
      }
      if (aStart + size < aHi && bStart + size < bHi) {
        queue.push([aStart + size, aHi, bStart + size, bHi]);
      }
    }
    range = queue.pop();
  }

  return matched;
}

/**
 * Similarity ratio in [0, 1]. Absent or empty text scores 0.
 */
export function similarity(
  a: string | null | undefined,
  b: string | null | undefined,
  options: SimilarityOptions = {}
): number {
  if (!a || !b) return 0;
  if (a === b) return 1;

  // Fixed argument order keeps the score symmetric
  const [first, second] = a < b ? [a, b] : [b, a];
  const matched = countMatches(first, second, options);
  return (2 * matched) / (first.length + second.length);
}
