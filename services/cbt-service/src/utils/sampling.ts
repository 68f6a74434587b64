export type RandomSource = () => number;

/**
 * Uniformly pick min(count, items.length) distinct items (partial Fisher-Yates).
 * The input array is left untouched.
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, random: RandomSource = Math.random): T[] {
  const pool = [...items];
  const take = Math.max(0, Math.min(count, pool.length));

  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, take);
}
