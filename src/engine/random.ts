import type { RNG } from './types';

const MULBERRY_INCREMENT = 0x6d2b79f5;

/**
 * Seeded mulberry32 generator, for reproducible games. The same seed always
 * yields the same sequence in [0, 1).
 */
export function makeRng(seed: number): RNG {
  let counter = seed >>> 0;
  return () => {
    counter = (counter + MULBERRY_INCREMENT) >>> 0;
    let mixed = Math.imul(counter ^ (counter >>> 15), counter | 1);
    mixed ^= mixed + Math.imul(mixed ^ (mixed >>> 7), mixed | 61);
    return ((mixed ^ (mixed >>> 14)) >>> 0) / 0x100000000;
  };
}

/**
 * Returns a uniformly chosen element of items, or null when it is empty.
 */
export function randomOrNull<T>(items: readonly T[], random: RNG): T | null {
  if (items.length === 0) return null;
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}
