/**
 * Generation API
 *
 * High-level entry points for level generation.
 */

import { LevelError } from "@stampwalk/contracts";
import { LevelBuilder } from "./builder/level-builder";
import type {
  GenerationResult,
  Level,
  LevelBuilderOptions,
} from "./builder/types";
import {
  type LevelGenerationConfig,
  resolveConfig,
  validateLevelConfig,
} from "./config";
import type { ValidationReport } from "./validation/result-types";

/**
 * Generate a level.
 *
 * Invalid configuration and setup problems come back as a failed result
 * (never thrown), as does exhaustion of the attempt budget. Errors thrown
 * by a renderer or floor consumer propagate.
 *
 * @example
 * ```typescript
 * const result = generate({ walkSteps: 300, stampSize: 1, seed: 42 });
 *
 * if (result.success) {
 *   console.log(`${result.level.floor.size} floor tiles in ${result.attempts} attempt(s)`);
 * } else if (result.error.isExhausted()) {
 *   // relax minFloorTiles or lengthen the walk
 * }
 * ```
 */
export function generate(
  config: LevelGenerationConfig = {},
  options?: LevelBuilderOptions,
): GenerationResult {
  let builder: LevelBuilder;
  try {
    builder = new LevelBuilder(config, options);
  } catch (error) {
    if (LevelError.isLevelError(error)) {
      return {
        success: false,
        error,
        attempts: 0,
        trace: [],
        durationMs: 0,
      };
    }
    throw error;
  }

  return builder.generate();
}

/**
 * Generate a level, throwing the `LevelError` on any failure.
 */
export function generateOrThrow(
  config: LevelGenerationConfig = {},
  options?: LevelBuilderOptions,
): Level {
  const result = generate(config, options);
  if (!result.success) {
    throw result.error;
  }
  return result.level;
}

/**
 * Validate generation configuration (defaults applied first).
 */
export function validateConfig(config: LevelGenerationConfig): ValidationReport {
  return validateLevelConfig(resolveConfig(config));
}
