import { SeededRandom } from "./seeded-random";

let fallbackStream: SeededRandom | undefined;

/**
 * Unsigned 32-bit entropy for unseeded runs: Web Crypto when the runtime
 * has it, else one process-wide stream seeded from the clock.
 */
export function randomUint32(): number {
  const crypto = globalThis.crypto;
  if (crypto?.getRandomValues) {
    const [value] = crypto.getRandomValues(new Uint32Array(1));
    if (value !== undefined) return value;
  }

  fallbackStream ??= new SeededRandom(Date.now() >>> 0);
  return fallbackStream.nextUint32();
}

/**
 * Random source for a caller that did not ask for reproducibility.
 */
export function createSystemRandom(): SeededRandom {
  return new SeededRandom(randomUint32());
}
