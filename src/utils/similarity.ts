/**
 * Normalized Indel similarity in [0, 100]: 100 * 2 * LCS / (|a| + |b|).
 * Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (200 * longestCommonSubsequence(a, b)) / total;
}

function longestCommonSubsequence(a: string, b: string): number {
  if (!a || !b) return 0;
  // Single rolling row over the shorter string
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
  let previous = new Array<number>(inner.length + 1).fill(0);
  let current = new Array<number>(inner.length + 1).fill(0);

  for (let i = 1; i <= outer.length; i++) {
    for (let j = 1; j <= inner.length; j++) {
      current[j] =
        outer[i - 1] === inner[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }
  return previous[inner.length];
}
