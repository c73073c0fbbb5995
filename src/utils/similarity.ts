/**
 * String similarity helpers for approximate name matching.
 *
 * `sequenceRatio` is the Ratcliff/Obershelp "gestalt" score: twice the number
 * of characters in the recursively found longest common blocks, divided by the
 * combined length of both strings. 1 means identical, 0 means nothing shared.
 */

type Block = [aStart: number, bStart: number, size: number];

function indexPositions(chars: string[]): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  chars.forEach((char, index) => {
    const list = positions.get(char);
    if (list) {
      list.push(index);
    } else {
      positions.set(char, [index]);
    }
  });
  return positions;
}

/**
 * Longest block common to a[aLo:aHi] and b[bLo:bHi]. Ties go to the block
 * starting earliest in a, then earliest in b.
 */
function findLongestMatch(
  a: string[],
  bPositions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): Block {
  let bestA = aLo;
  let bestB = bLo;
  let bestSize = 0;
  let runLengths = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const nextRunLengths = new Map<number, number>();
    for (const j of bPositions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const size = (runLengths.get(j - 1) ?? 0) + 1;
      nextRunLengths.set(j, size);
      if (size > bestSize) {
        bestA = i - size + 1;
        bestB = j - size + 1;
        bestSize = size;
      }
    }
    runLengths = nextRunLengths;
  }

  return [bestA, bestB, bestSize];
}

function countMatchingCharacters(a: string[], b: string[]): number {
  const bPositions = indexPositions(b);
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  let range = pending.pop();
  while (range) {
    const [aLo, aHi, bLo, bHi] = range;
    const [i, j, size] = findLongestMatch(a, bPositions, aLo, aHi, bLo, bHi);
    if (size > 0) {
      matched += size;
      if (aLo < i && bLo < j) {
        pending.push([aLo, i, bLo, j]);
      }
      if (i + size < aHi && j + size < bHi) {
        pending.push([i + size, aHi, j + size, bHi]);
      }
    }
    range = pending.pop();
  }

  return matched;
}

export function sequenceRatio(a: string, b: string): number {
  const aChars = Array.from(a);
  const bChars = Array.from(b);
  const total = aChars.length + bChars.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatchingCharacters(aChars, bChars)) / total;
}

/**
 * Best candidate whose similarity to `query` reaches `cutoff`, or undefined.
 * Equal scores resolve to the lexicographically greater candidate.
 */
export function closestMatch(query: string, candidates: Iterable<string>, cutoff: number): string | undefined {
  let best: string | undefined;
  let bestScore = -1;

  for (const candidate of candidates) {
    const score = sequenceRatio(candidate, query);
    if (score < cutoff) continue;
    if (score > bestScore || (score === bestScore && best !== undefined && candidate > best)) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}
