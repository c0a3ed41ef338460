import { describe, expect, it } from "vitest";
import {
  createSeed,
  createSeedFromString,
  SEED_VERSION,
  seedsAreEquivalent,
  toLevelSeed,
} from "../src/seed";

describe("createSeed", () => {
  it("derives sub-seeds deterministically", () => {
    const a = createSeed(12345);
    const b = createSeed(12345);
    expect(a).toEqual(b);
    expect(a.primary).toBe(12345);
    expect(a.version).toBe(SEED_VERSION);
    expect(a.walk).not.toBe(a.placement);
  });

  it("truncates to uint32", () => {
    expect(createSeed(-1).primary).toBe(4294967295);
    expect(createSeed(2 ** 32 + 5).primary).toBe(5);
  });

  it("keeps sub-seeds in uint32 range", () => {
    for (let i = 0; i < 50; i++) {
      const seed = createSeed(i);
      for (const value of [seed.walk, seed.placement]) {
        expect(Number.isInteger(value)).toBe(true);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(0xffffffff);
      }
    }
  });
});

describe("createSeedFromString", () => {
  it("hashes with DJB2", () => {
    expect(createSeedFromString("").primary).toBe(5381);
    // 5381 * 33 + 97
    expect(createSeedFromString("a").primary).toBe(177670);
  });

  it("separates different strings", () => {
    expect(
      seedsAreEquivalent(
        createSeedFromString("cave-a"),
        createSeedFromString("cave-b"),
      ),
    ).toBe(false);
  });
});

describe("toLevelSeed", () => {
  it("passes a ready seed through", () => {
    const seed = createSeed(3);
    expect(toLevelSeed(seed)).toBe(seed);
    expect(seedsAreEquivalent(toLevelSeed(3), seed)).toBe(true);
  });
});
