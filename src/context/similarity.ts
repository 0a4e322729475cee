/**
 * Text similarity in the style of a Ratcliff/Obershelp sequence matcher:
 * `2 * M / (|a| + |b|)` where M counts characters in the recursively found
 * longest common blocks. Characters are compared by code point.
 *
 * When `b` has 200 or more characters, characters making up more than 1% of
 * it (plus one) are "popular" and cannot seed a match, though they may still
 * extend one. This keeps long, repetitive texts from dominating the search.
 */

const AUTOJUNK_MIN_LENGTH = 200;

interface Match {
  i: number;
  j: number;
  size: number;
}

function indexB(b: string[]): Map<string, number[]> {
  const b2j = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const indices = b2j.get(ch);
    if (indices) {
      indices.push(j);
    } else {
      b2j.set(ch, [j]);
    }
  });

  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [ch, indices] of Array.from(b2j.entries())) {
      if (indices.length > limit) b2j.delete(ch);
    }
  }
  return b2j;
}

function findLongestMatch(
  a: string[],
  b: string[],
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): Match {
  let besti = alo;
  let bestj = blo;
  let bestSize = 0;
  let j2len = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        besti = i - k + 1;
        bestj = j - k + 1;
        bestSize = k;
      }
    }
    j2len = next;
  }

  // Popular characters were left out of the index; grow the match across them
  while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
    besti--;
    bestj--;
    bestSize++;
  }
  while (besti + bestSize < ahi && bestj + bestSize < bhi && a[besti + bestSize] === b[bestj + bestSize]) {
    bestSize++;
  }

  return { i: besti, j: bestj, size: bestSize };
}

export function matchingCharacters(a: string[], b: string[]): number {
  const b2j = indexB(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (queue.length > 0) {
    const region = queue.pop();
    if (!region) break;
    const [alo, ahi, blo, bhi] = region;
    const { i, j, size } = findLongestMatch(a, b, b2j, alo, ahi, blo, bhi);
    if (size === 0) continue;

    matched += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }

  return matched;
}

export function similarityRatio(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const total = left.length + right.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(left, right)) / total;
}

/** Upper bound on similarityRatio from lengths alone. */
export function maxPossibleRatio(a: string, b: string): number {
  const la = Array.from(a).length;
  const lb = Array.from(b).length;
  if (la + lb === 0) return 1;
  return (2 * Math.min(la, lb)) / (la + lb);
}
