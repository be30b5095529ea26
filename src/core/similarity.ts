/**
 * Character-level scoring behind the driver matcher. Strategies see names
 * after `normalizeNameForMatching`; the matcher owns the exact-match and
 * substring rules, so swapping a strategy never changes match decisions
 * beyond the score itself.
 */
export interface SimilarityStrategy {
  readonly name: SimilarityStrategyName;
  score(a: string, b: string): number;
}

export type SimilarityStrategyName = 'sequence' | 'token-set';

const DIACRITICS: Readonly<Record<string, string>> = {
  á: 'a',
  à: 'a',
  â: 'a',
  ã: 'a',
  ä: 'a',
  é: 'e',
  è: 'e',
  ê: 'e',
  ë: 'e',
  í: 'i',
  ì: 'i',
  î: 'i',
  ï: 'i',
  ó: 'o',
  ò: 'o',
  ô: 'o',
  õ: 'o',
  ö: 'o',
  ú: 'u',
  ù: 'u',
  û: 'u',
  ü: 'u',
  ç: 'c',
  ñ: 'n',
};

const NAME_SUFFIX = /\s+(jr|sr|ii|iii|iv)\.?$/;

export function normalizeNameForMatching(name: string): string {
  const collapsed = name.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
  const withoutSuffix = collapsed.replace(NAME_SUFFIX, '');
  let folded = '';
  for (const ch of withoutSuffix) folded += DIACRITICS[ch] ?? ch;
  return folded.trim();
}

type MatchBlock = { a: number; b: number; size: number };

function longestMatch(
  a: string,
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): MatchBlock {
  let best: MatchBlock = { a: alo, b: blo, size: 0 };
  let j2len = new Map<number, number>();
  for (let i = alo; i < ahi; i += 1) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i] ?? '') ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) best = { a: i - k + 1, b: j - k + 1, size: k };
    }
    j2len = next;
  }
  return best;
}

/** Total characters in the recursive longest-common-block decomposition. */
function matchedCharacters(a: string, b: string): number {
  const b2j = new Map<string, number[]>();
  for (let j = 0; j < b.length; j += 1) {
    const ch = b[j] ?? '';
    const indices = b2j.get(ch) ?? [];
    indices.push(j);
    b2j.set(ch, indices);
  }

  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const block = longestMatch(a, b2j, alo, ahi, blo, bhi);
    if (block.size === 0) continue;
    matched += block.size;
    if (alo < block.a && blo < block.b) queue.push([alo, block.a, blo, block.b]);
    if (block.a + block.size < ahi && block.b + block.size < bhi) {
      queue.push([block.a + block.size, ahi, block.b + block.size, bhi]);
    }
  }
  return matched;
}

// Ratcliff/Obershelp: 2 * matched / total length.
export const sequenceRatio: SimilarityStrategy = {
  name: 'sequence',
  score(a, b) {
    const total = a.length + b.length;
    if (total === 0) return 1;
    return (2 * matchedCharacters(a, b)) / total;
  },
};

// Jaccard over word tokens; ignores word order ("Verstappen Max").
export const tokenSetRatio: SimilarityStrategy = {
  name: 'token-set',
  score(a, b) {
    const left = new Set(a.split(' ').filter(Boolean));
    const right = new Set(b.split(' ').filter(Boolean));
    if (left.size === 0 && right.size === 0) return 1;
    let shared = 0;
    for (const token of left) if (right.has(token)) shared += 1;
    return shared / (left.size + right.size - shared);
  },
};

export const SIMILARITY_STRATEGIES: Readonly<Record<SimilarityStrategyName, SimilarityStrategy>> = {
  sequence: sequenceRatio,
  'token-set': tokenSetRatio,
};

export const SUBSTRING_FLOOR = 0.9;

/**
 * Name similarity in [0, 1]. Equal normalized names score 1; when one name
 * contains the other the score is at least 0.9.
 */
export function calculateSimilarity(
  name1: string,
  name2: string,
  strategy: SimilarityStrategy = sequenceRatio,
): number {
  const a = normalizeNameForMatching(name1);
  const b = normalizeNameForMatching(name2);
  if (a === b) return 1;
  const score = strategy.score(a, b);
  if (a.includes(b) || b.includes(a)) return Math.max(score, SUBSTRING_FLOOR);
  return score;
}
