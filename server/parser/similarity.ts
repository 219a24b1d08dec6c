/**
 * String similarity for fuzzy phrase lookup.
 *
 * Scores use the Ratcliff/Obershelp "gestalt" measure: twice the number of
 * characters in the recursively found longest common blocks, divided by the
 * combined length of both strings. 1.0 means identical, 0.0 nothing shared.
 */

export type SimilarityScorer = (a: string, b: string) => number;

export interface CloseMatch {
  candidate: string;
  score: number;
}

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

function indexCharacters(b: string): Map<string, number[]> {
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
  return positions;
}

// Earliest block in `a` wins ties, then earliest in `b`.
function longestBlock(
  a: string,
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  let runs = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const nextRuns = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const size = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, size);
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    runs = nextRuns;
  }

  return best;
}

export function matchingCharacters(a: string, b: string): number {
  const positions = indexCharacters(b);
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let total = 0;

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const [aLo, aHi, bLo, bHi] = next;
    const block = longestBlock(a, positions, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    total += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      pending.push([aLo, block.aStart, bLo, block.bStart]);
    }
    const aEnd = block.aStart + block.size;
    const bEnd = block.bStart + block.size;
    if (aEnd < aHi && bEnd < bHi) {
      pending.push([aEnd, aHi, bEnd, bHi]);
    }
  }

  return total;
}

export const similarityRatio: SimilarityScorer = (a, b) => {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchingCharacters(a, b)) / length;
};

/**
 * Best candidates scoring at least `threshold`, highest first. Equal scores
 * keep vocabulary order.
 */
export function closeMatches(
  phrase: string,
  vocabulary: Iterable<string>,
  threshold: number,
  limit = 1,
  scorer: SimilarityScorer = similarityRatio,
): CloseMatch[] {
  if (limit <= 0) return [];

  const matches: CloseMatch[] = [];
  for (const candidate of vocabulary) {
    const score = scorer(phrase, candidate);
    if (score >= threshold) {
      matches.push({ candidate, score });
    }
  }

  matches.sort((left, right) => right.score - left.score);
  return matches.slice(0, limit);
}
