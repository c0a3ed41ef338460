import { LevelError, SeededRandom } from "@stampwalk/contracts";
import { describe, expect, it } from "vitest";
import {
  maxFloorTiles,
  randomCardinal,
  stampFootprint,
  walk,
} from "../src/generators/walk/walker";
import type { Point } from "../src/core/geometry/types";
import { DOWN, keys, LEFT, RIGHT, ScriptedRandom, UP } from "./helpers";

describe("randomCardinal", () => {
  it("maps each quarter of the unit interval to one direction", () => {
    expect(randomCardinal(() => UP)).toEqual({ x: 0, y: 1 });
    expect(randomCardinal(() => DOWN)).toEqual({ x: 0, y: -1 });
    expect(randomCardinal(() => LEFT)).toEqual({ x: -1, y: 0 });
    expect(randomCardinal(() => RIGHT)).toEqual({ x: 1, y: 0 });
    expect(randomCardinal(() => 0.9999)).toEqual({ x: 1, y: 0 });
  });

  it("is roughly uniform", () => {
    const rng = new SeededRandom(2024);
    const counts = new Map<string, number>();
    for (let i = 0; i < 40000; i++) {
      const d = randomCardinal(() => rng.next());
      const key = `${d.x},${d.y}`;
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    expect(counts.size).toBe(4);
    for (const count of counts.values()) {
      expect(count).toBeGreaterThan(9000);
      expect(count).toBeLessThan(11000);
    }
  });
});

describe("stampFootprint", () => {
  it("covers a (2s+1) square around the center", () => {
    expect(stampFootprint({ x: 0, y: 0 }, 0)).toEqual([{ x: 0, y: 0 }]);
    expect(stampFootprint({ x: 3, y: 3 }, 1)).toHaveLength(9);
    expect(stampFootprint({ x: 0, y: 0 }, 3)).toHaveLength(49);
  });
});

describe("maxFloorTiles", () => {
  it("is steps times stamp area", () => {
    expect(maxFloorTiles(200, 1)).toBe(1800);
    expect(maxFloorTiles(10, 0)).toBe(10);
    expect(maxFloorTiles(10, 3)).toBe(490);
  });
});

describe("walk", () => {
  it("single step with stamp 0 marks only the start", () => {
    const floor = walk(
      { walkSteps: 1, stampSize: 0, startPosition: { x: 0, y: 0 } },
      new ScriptedRandom([UP]),
    );
    expect(keys(floor)).toEqual(["0,0"]);
  });

  it("follows the scripted direction", () => {
    const floor = walk(
      { walkSteps: 3, stampSize: 0, startPosition: { x: 0, y: 0 } },
      new ScriptedRandom([RIGHT]),
    );
    expect(keys(floor)).toEqual(["0,0", "1,0", "2,0"]);
  });

  it("stamps the full square at every visited position", () => {
    const start = { x: 5, y: -3 };
    const floor = walk(
      { walkSteps: 1, stampSize: 2, startPosition: start },
      new ScriptedRandom([UP]),
    );

    expect(floor.size).toBe(25);
    for (const cell of stampFootprint(start, 2)) {
      expect(floor.has(cell)).toBe(true);
    }
  });

  it("deduplicates overlapping stamps", () => {
    // Up, down, up, ... oscillates between (0,0) and (0,1)
    const floor = walk(
      { walkSteps: 10, stampSize: 1, startPosition: { x: 0, y: 0 } },
      new ScriptedRandom([UP, DOWN]),
    );

    // x in -1..1, y in -1..2
    expect(floor.size).toBe(12);
    expect(floor.hasXY(-1, 2)).toBe(true);
    expect(floor.hasXY(0, 3)).toBe(false);
  });

  it("draws exactly one random number per step", () => {
    const rng = new ScriptedRandom([UP, RIGHT, DOWN, LEFT]);
    walk({ walkSteps: 37, stampSize: 1, startPosition: { x: 0, y: 0 } }, rng);
    expect(rng.calls).toBe(37);
  });

  it("grows monotonically and only moves by cardinal unit steps", () => {
    const sizes: number[] = [];
    const positions: Point[] = [];

    walk(
      { walkSteps: 300, stampSize: 1, startPosition: { x: 10, y: 10 } },
      new SeededRandom(77),
      (_step, position, floorSize) => {
        positions.push(position);
        sizes.push(floorSize);
      },
    );

    expect(sizes).toHaveLength(300);
    expect(sizes[0]).toBe(9);
    for (let i = 1; i < sizes.length; i++) {
      expect(sizes[i]).toBeGreaterThanOrEqual(sizes[i - 1] ?? 0);
    }

    expect(positions[0]).toEqual({ x: 10, y: 10 });
    for (let i = 1; i < positions.length; i++) {
      const prev = positions[i - 1];
      const cur = positions[i];
      if (!prev || !cur) throw new Error("missing position");
      const dx = Math.abs(cur.x - prev.x);
      const dy = Math.abs(cur.y - prev.y);
      expect(dx + dy).toBe(1);
    }
  });

  it("never exceeds the theoretical maximum", () => {
    for (let seed = 0; seed < 20; seed++) {
      const floor = walk(
        { walkSteps: 50, stampSize: 2, startPosition: { x: 0, y: 0 } },
        new SeededRandom(seed),
      );
      expect(floor.size).toBeLessThanOrEqual(maxFloorTiles(50, 2));
      expect(floor.size).toBeGreaterThanOrEqual(25);
    }
  });

  it("rejects a step count that is not a positive integer", () => {
    const run = (walkSteps: number) => () =>
      walk(
        { walkSteps, stampSize: 1, startPosition: { x: 0, y: 0 } },
        new ScriptedRandom([UP]),
      );

    expect(run(0)).toThrow("Invalid configuration: walkSteps must be positive");
    expect(run(-4)).toThrow(LevelError);
    expect(run(2.5)).toThrow("walkSteps must be an integer");
  });

  it("rejects stamp sizes off the 0-3 range or fractional", () => {
    const run = (stampSize: number) => () =>
      walk(
        { walkSteps: 1, stampSize, startPosition: { x: 0, y: 0 } },
        new ScriptedRandom([UP]),
      );

    expect(run(9)).toThrow("stampSize must be between 0 and 3");
    expect(run(0.5)).toThrow("stampSize must be an integer");
  });

  it("rejects a fractional start position", () => {
    const rng = new ScriptedRandom([UP]);
    try {
      walk({ walkSteps: 1, stampSize: 0, startPosition: { x: 0.5, y: 0 } }, rng);
      expect.unreachable();
    } catch (error) {
      if (!LevelError.isLevelError(error)) throw error;
      expect(error.code).toBe("CONFIG_INVALID");
      expect(error.message).toBe(
        "Invalid configuration: Coordinates must be integers",
      );
    }
    expect(rng.calls).toBe(0);
  });

  it("is reproducible for the same seed", () => {
    const params = { walkSteps: 120, stampSize: 1, startPosition: { x: 0, y: 0 } };
    const a = walk(params, new SeededRandom(9));
    const b = walk(params, new SeededRandom(9));
    expect(keys(a)).toEqual(keys(b));
  });
});
