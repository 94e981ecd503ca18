import { ensureNonNullable } from './typeGuards.ts';

/**
 * Returns a float in [0, 1).
 */
export type RandomSource = () => number;

const LCG_MULTIPLIER = 1664525;
const LCG_INCREMENT = 1013904223;
const UINT32_RANGE = 0x100000000;
const ZERO_SEED_STATE = 0x6d2b79f5;

/**
 * `Math.random` when no seed is given, otherwise a deterministic linear congruential generator.
 */
export function createSeededRandom(seed?: number): RandomSource {
  if (seed === undefined) {
    return Math.random;
  }
  /* eslint-disable no-bitwise -- Unsigned 32-bit state arithmetic. */
  let state = (seed >>> 0) || ZERO_SEED_STATE;
  return () => {
    state = (Math.imul(state, LCG_MULTIPLIER) + LCG_INCREMENT) >>> 0;
    return state / UINT32_RANGE;
  };
  /* eslint-enable no-bitwise -- End state arithmetic. */
}

export function randomChoice<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot choose from an empty list');
  }
  return ensureNonNullable(items[randomInt(random, items.length)]);
}

export function randomInt(random: RandomSource, bound: number): number {
  return Math.min(Math.floor(random() * bound), bound - 1);
}

/**
 * Fisher-Yates shuffle into a new array.
 */
export function shuffled<T>(random: RandomSource, items: Iterable<T>): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    const tmp = ensureNonNullable(result[i]);
    result[i] = ensureNonNullable(result[j]);
    result[j] = tmp;
  }
  return result;
}
