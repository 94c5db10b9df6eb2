/**
 * Seed Utilities
 *
 * Configs accept either a uint32 or a string; both resolve to the uint32 that
 * seeds the PRNG.
 */

import type { MazeSeed } from "@mazegen/contracts";

/**
 * Hash a string to a uint32 seed (DJB2).
 */
export function createSeedFromString(input: string): number {
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return hash;
}

export function resolveSeed(seed: MazeSeed): number {
  return typeof seed === "string" ? createSeedFromString(seed) : seed >>> 0;
}
