/**
 * String similarity scores on a 0–100 scale.
 *
 * `ratio` is the normalized indel similarity: 2·LCS / (|a| + |b|). The token
 * variants compare whitespace-separated tokens after sorting, so word order
 * and (for the set variant) extra words do not count against a match.
 */

// ============================================
// Core similarity
// ============================================

const longestCommonSubsequence = (a: string, b: string): number => {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i += 1) {
    for (let j = 1; j <= b.length; j += 1) {
      current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
};

export const ratio = (a: string, b: string): number => {
  const total = a.length + b.length;
  if (total === 0) {
    return 100;
  }

  return (200 * longestCommonSubsequence(a, b)) / total;
};

/**
 * Best `ratio` of the shorter string against every window of the longer one
 * with the same length. Scores 100 when the shorter string occurs verbatim.
 */
export const partialRatio = (a: string, b: string): number => {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];

  if (shorter.length === 0) {
    return longer.length === 0 ? 100 : 0;
  }

  if (longer.includes(shorter)) {
    return 100;
  }

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start += 1) {
    const score = ratio(shorter, longer.slice(start, start + shorter.length));
    if (score > best) {
      best = score;
    }
  }

  return best;
};

// ============================================
// Token based similarity
// ============================================

const tokenize = (input: string): string[] =>
  input
    .toLowerCase()
    .split(/\s+/u)
    .filter((token) => token.length > 0);

export const tokenSortRatio = (a: string, b: string): number =>
  ratio(tokenize(a).sort().join(' '), tokenize(b).sort().join(' '));

export const tokenSetRatio = (a: string, b: string): number => {
  const left = new Set(tokenize(a));
  const right = new Set(tokenize(b));

  const intersection = [...left].filter((token) => right.has(token)).sort();
  const onlyLeft = [...left].filter((token) => !right.has(token)).sort();
  const onlyRight = [...right].filter((token) => !left.has(token)).sort();

  // One side's tokens are a subset of the other's.
  if (intersection.length > 0 && (onlyLeft.length === 0 || onlyRight.length === 0)) {
    return 100;
  }

  const base = intersection.join(' ');
  const combinedLeft = [base, onlyLeft.join(' ')].filter(Boolean).join(' ');
  const combinedRight = [base, onlyRight.join(' ')].filter(Boolean).join(' ');

  return Math.max(ratio(base, combinedLeft), ratio(base, combinedRight), ratio(combinedLeft, combinedRight));
};

export const bestTokenRatio = (a: string, b: string): number => Math.max(tokenSortRatio(a, b), tokenSetRatio(a, b));
