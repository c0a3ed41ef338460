import { describe, expect, it } from "vitest";
import { parseLevelSeed, parseWalkConfig, WalkConfigSchema } from "../src";

const VALID = {
  walkSteps: 200,
  stampSize: 1,
  minFloorTiles: 100,
  maxGenerationAttempts: 100,
  startPosition: { x: 0, y: 0 },
};

describe("WalkConfigSchema", () => {
  it("accepts a complete config", () => {
    expect(WalkConfigSchema.safeParse(VALID).success).toBe(true);
  });

  it("accepts every stamp size from 0 to 3", () => {
    for (const stampSize of [0, 1, 2, 3]) {
      expect(WalkConfigSchema.safeParse({ ...VALID, stampSize }).success).toBe(
        true,
      );
    }
  });

  it("rejects stamp sizes outside 0-3", () => {
    expect(WalkConfigSchema.safeParse({ ...VALID, stampSize: 4 }).success).toBe(
      false,
    );
    expect(
      WalkConfigSchema.safeParse({ ...VALID, stampSize: -1 }).success,
    ).toBe(false);
  });

  it("rejects non-positive counts", () => {
    expect(WalkConfigSchema.safeParse({ ...VALID, walkSteps: 0 }).success).toBe(
      false,
    );
    expect(
      WalkConfigSchema.safeParse({ ...VALID, minFloorTiles: -5 }).success,
    ).toBe(false);
    expect(
      WalkConfigSchema.safeParse({ ...VALID, maxGenerationAttempts: 0 })
        .success,
    ).toBe(false);
  });

  it("rejects fractional coordinates", () => {
    const res = WalkConfigSchema.safeParse({
      ...VALID,
      startPosition: { x: 0.5, y: 0 },
    });
    expect(res.success).toBe(false);
  });
});

describe("parseWalkConfig", () => {
  it("returns the parsed config", () => {
    const res = parseWalkConfig(VALID);
    expect(res.success).toBe(true);
    expect(res.value).toEqual(VALID);
  });

  it("returns CONFIG_INVALID with the offending field", () => {
    const res = parseWalkConfig({ ...VALID, stampSize: 4 });
    expect(res.success).toBe(false);
    expect(res.error.code).toBe("CONFIG_INVALID");
    expect(res.error.message).toContain("stampSize must be between 0 and 3");
    expect(res.error.message.startsWith("Invalid configuration: ")).toBe(true);
  });

  it("rejects non-object input", () => {
    const res = parseWalkConfig("walkSteps=200");
    expect(res.isErr()).toBe(true);
  });
});

describe("parseLevelSeed", () => {
  it("accepts a well-formed seed", () => {
    const res = parseLevelSeed({
      primary: 1,
      walk: 2,
      placement: 3,
      version: "1.0.0",
    });
    expect(res.success).toBe(true);
  });

  it("rejects a negative sub-seed", () => {
    const res = parseLevelSeed({
      primary: 1,
      walk: -2,
      placement: 3,
      version: "1.0.0",
    });
    expect(res.success).toBe(false);
    expect(res.error.code).toBe("SEED_INVALID");
  });

  it("rejects a malformed version", () => {
    const res = parseLevelSeed({
      primary: 1,
      walk: 2,
      placement: 3,
      version: "one",
    });
    expect(res.success).toBe(false);
  });
});
