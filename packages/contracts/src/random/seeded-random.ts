import { choice, range, type RandomSource } from "./rng";

/**
 * Reproducible random stream for level generation (xoshiro128++).
 *
 * A level seed holds one uint32 per stream; each stream is a SeededRandom.
 * Generation only ever asks for `next()`, so the walk consumes one 32-bit
 * output per step and a saved state replays an attempt exactly.
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

export type RngState = [number, number, number, number];

const UINT32_RANGE = 0x100000000;
const WARMUP_ROUNDS = 8;

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * Expand a uint32 seed into four state words with SplitMix32.
 */
function expandSeed(seed: number): RngState {
  let z = seed >>> 0;
  const mix = (): number => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = Math.imul(z ^ (z >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };

  const state: RngState = [mix(), mix(), mix(), mix()];
  // All-zero state is a fixed point
  if ((state[0] | state[1] | state[2] | state[3]) === 0) state[0] = 1;
  return state;
}

export class SeededRandom implements RandomSource {
  private s: RngState;

  constructor(seed: number) {
    this.s = expandSeed(seed);
    for (let i = 0; i < WARMUP_ROUNDS; i++) this.nextUint32();
  }

  /**
   * Raw 32-bit output. Sub-seeds are drawn with this.
   */
  nextUint32(): number {
    const [a, b, c, d] = this.s;
    const out = (rotl((a + d) >>> 0, 7) + a) >>> 0;

    const c1 = (c ^ a) >>> 0;
    const d1 = (d ^ b) >>> 0;
    const b1 = (b ^ c1) >>> 0;
    const a1 = (a ^ d1) >>> 0;
    this.s = [a1, b1, (c1 ^ ((b << 9) >>> 0)) >>> 0, rotl(d1, 11)];

    return out;
  }

  /**
   * Next number in [0, 1)
   */
  next(): number {
    return this.nextUint32() / UINT32_RANGE;
  }

  /**
   * Random integer between min and max (inclusive)
   */
  range(min: number, max: number): number {
    return range(() => this.next(), min, max);
  }

  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    return choice(() => this.next(), array);
  }

  getState(): RngState {
    return [...this.s];
  }

  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}
