/**
 * Seed Creation Utilities
 *
 * A level seed carries one sub-seed per random stream so that, for example,
 * changing how placement consumes randomness never shifts the walk.
 */

import { type LevelSeed, SeededRandom } from "@stampwalk/contracts";

export const SEED_VERSION = "1.0.0";

/**
 * Create a level seed from a numeric value (truncated to uint32).
 */
export function createSeed(input: number): LevelSeed {
  const primary = input >>> 0;
  const rng = new SeededRandom(primary);

  return {
    primary,
    walk: rng.nextUint32(),
    placement: rng.nextUint32(),
    version: SEED_VERSION,
  };
}

/**
 * Create a level seed from a string
 */
export function createSeedFromString(input: string): LevelSeed {
  // DJB2
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return createSeed(hash);
}

/**
 * Check if two seeds will produce identical output
 */
export function seedsAreEquivalent(a: LevelSeed, b: LevelSeed): boolean {
  return (
    a.primary === b.primary && a.walk === b.walk && a.placement === b.placement
  );
}

/**
 * Accept either a ready seed or a bare number.
 */
export function toLevelSeed(seed: number | LevelSeed): LevelSeed {
  return typeof seed === "number" ? createSeed(seed) : seed;
}
