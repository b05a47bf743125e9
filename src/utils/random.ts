/**
 * Source of uniformly distributed floats in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

export const defaultRandom: RandomSource = {
  next: () => Math.random()
};

export function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function createSeededRandom(seed: number | string): RandomSource {
  const next = mulberry32(typeof seed === 'string' ? fnv1a32(seed) : seed);
  return { next };
}
