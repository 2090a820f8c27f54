// sim/rng.ts — Seeded PRNG (mulberry32) for reproducible populations

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

export class SeededRng implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export const mathRandom: RandomSource = { next: () => Math.random() };

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

export function pick<T>(rng: RandomSource, items: readonly T[]): T {
  const item = items[Math.floor(rng.next() * items.length)];
  if (item === undefined) {
    throw new RangeError('pick() from an empty list');
  }
  return item;
}
