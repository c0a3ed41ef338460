/**
 * Property-Based Invariant Tests
 *
 * Level invariants checked over many seeds and every stamp size.
 */

import { describe, expect, it } from "vitest";
import { createSeed, generate, maxFloorTiles, validateLevel } from "../../src";

const SEED_COUNT = 200;
const STAMP_SIZES = [0, 1, 2, 3] as const;

interface TestFailure {
  seed: number;
  violations: string[];
}

describe("property: generated levels satisfy their invariants", () => {
  for (const stampSize of STAMP_SIZES) {
    it(`stamp size ${stampSize}`, () => {
      const walkSteps = 120;
      const minFloorTiles = 2 * stampSize + 1;
      const failures: TestFailure[] = [];

      for (let i = 0; i < SEED_COUNT; i++) {
        const result = generate({
          walkSteps,
          stampSize,
          minFloorTiles,
          maxGenerationAttempts: 10,
          seed: createSeed(i),
        });

        if (!result.success) {
          failures.push({ seed: i, violations: [result.error.message] });
          continue;
        }

        const report = validateLevel(result.level, { stampSize, minFloorTiles });
        const violations = report.violations.map((v) => v.message);
        if (result.level.floor.size > maxFloorTiles(walkSteps, stampSize)) {
          violations.push(`floor larger than ${maxFloorTiles(walkSteps, stampSize)}`);
        }
        if (result.attempts !== 1) {
          violations.push(`needed ${result.attempts} attempts`);
        }
        if (violations.length > 0) {
          failures.push({ seed: i, violations });
        }
      }

      expect(failures).toEqual([]);
    });
  }
});

describe("property: determinism is absolute", () => {
  it("same seed always produces identical checksum", () => {
    const mismatches: number[] = [];

    for (let i = 0; i < SEED_COUNT; i++) {
      const config = { walkSteps: 150, seed: createSeed(i), minFloorTiles: 50 };
      const a = generate(config);
      const b = generate(config);

      if (!a.success || !b.success) {
        mismatches.push(i);
      } else if (a.level.checksum !== b.level.checksum) {
        mismatches.push(i);
      }
    }

    expect(mismatches).toEqual([]);
  });
});
