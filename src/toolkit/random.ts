/** Seeded uniform generator (mulberry32) so sampled plots are reproducible. */
export type Random = () => number;

export function createRandom(seed: number = 4357): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Pick an index from a cumulative distribution (last entry is the total). */
export function sampleIndex(cumulative: readonly number[], random: Random): number {
  const total = cumulative[cumulative.length - 1];
  const target = random() * total;
  let lo = 0;
  let hi = cumulative.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (cumulative[mid] > target) hi = mid;
    else lo = mid + 1;
  }
  return lo;
}
