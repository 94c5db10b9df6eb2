/**
 * Utility functions for random operations using any number generator
 */

/**
 * Injected randomness capability.
 *
 * Generators take one of these explicitly instead of reaching for a global,
 * so a fixed seed (or a scripted sequence in tests) reproduces a maze exactly.
 */
export interface RandomSource {
  /** Next value in [0, 1) */
  next(): number;
}

/**
 * Random integer between min and max (inclusive)
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Random choice from an array, uniform over its elements
 * @param rng - Random number generator function (returns 0 to 1)
 * @returns A random element, or undefined for an empty array
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}

/**
 * Boolean with given probability
 * @param chance - The probability (0 to 1) of returning true
 */
export function probability(rng: () => number, chance: number): boolean {
  return rng() < chance;
}
