import type { RandomSource } from "@stampwalk/contracts";

/** Draw values that map to each cardinal step */
export const UP = 0;
export const DOWN = 0.25;
export const LEFT = 0.5;
export const RIGHT = 0.75;

/**
 * Replays a fixed list of draws, cycling when it runs out.
 */
export class ScriptedRandom implements RandomSource {
  calls = 0;

  constructor(private readonly values: readonly number[]) {
    if (values.length === 0) {
      throw new Error("ScriptedRandom needs at least one value");
    }
  }

  next(): number {
    const value = this.values[this.calls % this.values.length] ?? 0;
    this.calls++;
    return value;
  }
}

export function keys(points: Iterable<{ x: number; y: number }>): string[] {
  return [...points].map((p) => `${p.x},${p.y}`).sort();
}
