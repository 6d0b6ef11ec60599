/**
 * Seeded random source (mulberry32)
 * @module core/rng
 */

export interface Rng {
  readonly seed: number;
  /** Uniform in [0, 1) */
  next(): number;
  /** Integer in [0, maxExclusive) */
  int(maxExclusive: number): number;
  /** Integer in [min, max], both inclusive */
  between(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
}

/**
 * Create a random source. The same seed always yields the same sequence.
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const int = (maxExclusive: number): number => Math.floor(next() * maxExclusive);

  return {
    seed,
    next,
    int,
    between(min: number, max: number) {
      return min + int(max - min + 1);
    },
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) {
        throw new RangeError('Cannot pick from an empty list');
      }
      return items[int(items.length)];
    },
  };
}
