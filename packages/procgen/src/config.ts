/**
 * Level Generation Configuration
 *
 * Partial configs are accepted everywhere; `resolveConfig` fills defaults and
 * `validateLevelConfig` reports problems without ever clamping a value.
 */

import {
  type LevelSeed,
  LevelSeedSchema,
  WalkConfigSchema,
} from "@stampwalk/contracts";
import type { Point } from "./core/geometry/types";
import {
  DEFAULT_MAX_GENERATION_ATTEMPTS,
  DEFAULT_MIN_FLOOR_TILES,
  DEFAULT_STAMP_SIZE,
  DEFAULT_WALK_STEPS,
  RECOMMENDED_MAX_GENERATION_ATTEMPTS,
  RECOMMENDED_MIN_FLOOR_TILES,
  RECOMMENDED_WALK_STEPS,
} from "./generators/walk/constants";
import { maxFloorTiles } from "./generators/walk/walker";
import { toLevelSeed } from "./seed";
import {
  toValidationReport,
  type ValidationReport,
  type Violation,
} from "./validation/result-types";

/**
 * Generation configuration.
 * Optional fields have defaults applied by `resolveConfig`.
 */
export interface LevelGenerationConfig {
  /** Number of stamp-then-move iterations per attempt */
  readonly walkSteps?: number;
  /** Stamp radius: 0 = 1x1, 1 = 3x3, 2 = 5x5, 3 = 7x7 */
  readonly stampSize?: number;
  /** Floor cells an attempt needs to be accepted */
  readonly minFloorTiles?: number;
  readonly maxGenerationAttempts?: number;
  readonly startPosition?: Point;
  /** Omit for system entropy */
  readonly seed?: number | LevelSeed;
  /** Record trace events (default false) */
  readonly trace?: boolean;
}

/**
 * Configuration with every default resolved.
 */
export interface ResolvedLevelConfig {
  readonly walkSteps: number;
  readonly stampSize: number;
  readonly minFloorTiles: number;
  readonly maxGenerationAttempts: number;
  readonly startPosition: Point;
  readonly seed: LevelSeed | undefined;
  readonly trace: boolean;
}

export const DEFAULT_LEVEL_CONFIG: Readonly<
  Omit<ResolvedLevelConfig, "seed">
> = Object.freeze({
  walkSteps: DEFAULT_WALK_STEPS,
  stampSize: DEFAULT_STAMP_SIZE,
  minFloorTiles: DEFAULT_MIN_FLOOR_TILES,
  maxGenerationAttempts: DEFAULT_MAX_GENERATION_ATTEMPTS,
  startPosition: Object.freeze({ x: 0, y: 0 }),
  trace: false,
});

export function resolveConfig(
  config: LevelGenerationConfig = {},
): ResolvedLevelConfig {
  const start = config.startPosition ?? DEFAULT_LEVEL_CONFIG.startPosition;
  return Object.freeze({
    walkSteps: config.walkSteps ?? DEFAULT_LEVEL_CONFIG.walkSteps,
    stampSize: config.stampSize ?? DEFAULT_LEVEL_CONFIG.stampSize,
    minFloorTiles: config.minFloorTiles ?? DEFAULT_LEVEL_CONFIG.minFloorTiles,
    maxGenerationAttempts:
      config.maxGenerationAttempts ??
      DEFAULT_LEVEL_CONFIG.maxGenerationAttempts,
    startPosition: Object.freeze({ x: start.x, y: start.y }),
    seed: config.seed === undefined ? undefined : toLevelSeed(config.seed),
    trace: config.trace ?? DEFAULT_LEVEL_CONFIG.trace,
  });
}

function checkRecommendedRange(
  violations: Violation[],
  field: string,
  value: number,
  range: { readonly min: number; readonly max: number },
): void {
  if (value < range.min || value > range.max) {
    violations.push({
      type: `config.${field}`,
      message: `${field} ${value} is outside the recommended range ${range.min}-${range.max}`,
      severity: "warning",
    });
  }
}

/**
 * Validate a resolved configuration.
 *
 * Errors: anything the walk cannot run with (non-positive counts, stamp
 * size outside 0-3, non-integer values, malformed seed).
 * Warnings: values outside the tuned ranges, and a minimum floor size that
 * no walk of this length could ever reach.
 */
export function validateLevelConfig(
  config: ResolvedLevelConfig,
): ValidationReport {
  const violations: Violation[] = [];

  const parsed = WalkConfigSchema.safeParse(config);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      violations.push({
        type: `config.${issue.path.map(String).join(".")}`,
        message: issue.message,
        severity: "error",
      });
    }
  }

  if (config.seed !== undefined) {
    const seed = LevelSeedSchema.safeParse(config.seed);
    if (!seed.success) {
      for (const issue of seed.error.issues) {
        violations.push({
          type: `config.seed.${issue.path.map(String).join(".")}`,
          message: issue.message,
          severity: "error",
        });
      }
    }
  }

  // Range advice only makes sense for values that passed the hard checks
  if (parsed.success) {
    checkRecommendedRange(
      violations,
      "walkSteps",
      config.walkSteps,
      RECOMMENDED_WALK_STEPS,
    );
    checkRecommendedRange(
      violations,
      "minFloorTiles",
      config.minFloorTiles,
      RECOMMENDED_MIN_FLOOR_TILES,
    );
    checkRecommendedRange(
      violations,
      "maxGenerationAttempts",
      config.maxGenerationAttempts,
      RECOMMENDED_MAX_GENERATION_ATTEMPTS,
    );

    const ceiling = maxFloorTiles(config.walkSteps, config.stampSize);
    if (config.minFloorTiles > ceiling) {
      violations.push({
        type: "config.minFloorTiles",
        message: `minFloorTiles ${config.minFloorTiles} exceeds the most floor ${config.walkSteps} steps can produce (${ceiling}); every attempt will fail`,
        severity: "warning",
      });
    }
  }

  return toValidationReport(violations);
}
