/**
 * Random draws used by the quantizer and the qualitative searches.
 *
 * Palettes are reproducible only through an explicit source: callers seed
 * one with `createRandomSource(seed)` and pass it down, so no module reads
 * process-wide random state.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  };
}

/**
 * Seeded sources are deterministic; without a seed this falls back to
 * `Math.random`.
 */
export function createRandomSource(seed?: number): RandomSource {
  if (seed === undefined) {
    return { next: () => Math.random() };
  }
  // Fractional seeds would otherwise collapse onto their integer part.
  const normalized = Number.isInteger(seed) ? seed : Math.floor(seed * 0x100000000);
  const next = mulberry32(normalized);
  return { next };
}

export function randomInt(random: RandomSource, maxExclusive: number): number {
  return Math.min(maxExclusive - 1, Math.floor(random.next() * maxExclusive));
}

/**
 * `size` distinct indices from `0..populationSize-1`, in draw order
 * (partial Fisher-Yates).
 */
export function sampleIndices(random: RandomSource, populationSize: number, size: number): number[] {
  if (size > populationSize) {
    throw new RangeError(`Cannot draw ${size} items from ${populationSize} without replacement`);
  }
  const pool = Array.from({ length: populationSize }, (_, i) => i);
  for (let i = 0; i < size; i++) {
    const j = i + randomInt(random, populationSize - i);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, size);
}

export function permutation(random: RandomSource, size: number): number[] {
  return sampleIndices(random, size, size);
}
