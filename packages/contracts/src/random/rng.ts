/**
 * Anything that yields uniformly distributed numbers in [0, 1).
 *
 * `SeededRandom` satisfies it; tests can pass a scripted object instead.
 */
export interface RandomSource {
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
 * Random choice from an array. Draws exactly one number from `rng`.
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  const index = range(rng, 0, array.length - 1);
  return array[index];
}

/**
 * Adapt a `RandomSource` to the function form the helpers take.
 * Values outside [0, 1) are clamped so a misbehaving source can never
 * index past the end of a choice list.
 */
export function toRandomFn(source: RandomSource): () => number {
  return () => {
    const value = source.next();
    if (!(value >= 0)) return 0;
    return value < 1 ? value : 1 - Number.EPSILON;
  };
}
