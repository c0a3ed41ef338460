/**
 * Incremental FNV-1a 64-bit hash over bytes, int32 words and lattice points.
 */

import type { Point } from "../geometry/types";

const OFFSET_BASIS = 0xcbf29ce484222325n;
const PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

export class FNV64Hasher {
  private state = OFFSET_BASIS;

  updateByte(byte: number): this {
    this.state = ((this.state ^ BigInt(byte & 0xff)) * PRIME) & MASK_64;
    return this;
  }

  /**
   * Little-endian two's complement, so negative coordinates hash stably.
   */
  updateInt32(value: number): this {
    let word = value >>> 0;
    for (let i = 0; i < 4; i++) {
      this.updateByte(word & 0xff);
      word >>>= 8;
    }
    return this;
  }

  /**
   * Any safe integer as two little-endian words, low then high, so values
   * 2^32 apart still hash differently.
   */
  updateInt53(value: number): this {
    const high = Math.floor(value / 0x100000000);
    return this.updateInt32(value).updateInt32(high);
  }

  /** Lattice coordinates are unbounded, so each axis takes 64 bits. */
  updatePoint(p: Point): this {
    return this.updateInt53(p.x).updateInt53(p.y);
  }

  /** 16 lowercase hex characters */
  digest(): string {
    return this.state.toString(16).padStart(16, "0");
  }

  reset(): this {
    this.state = OFFSET_BASIS;
    return this;
  }
}

export function createFNV64Hasher(): FNV64Hasher {
  return new FNV64Hasher();
}
