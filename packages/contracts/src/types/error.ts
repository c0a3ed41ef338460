/**
 * Error codes for level generation operations.
 */
export type LevelErrorCode =
  | "CONFIG_INVALID"
  | "SETUP_INCOMPLETE"
  | "SEED_INVALID"
  | "GENERATION_EXHAUSTED";

/**
 * Unified error type for level generation.
 *
 * Exhaustion is reported through this type as a value, never as a crash:
 * the builder returns it inside a failed result and callers decide whether
 * to rethrow.
 *
 * @example
 * ```typescript
 * const error = LevelError.configInvalid("stampSize must be between 0 and 3", {
 *   stampSize: 5,
 * });
 * ```
 */
export class LevelError extends Error {
  override readonly name = "LevelError";

  constructor(
    public readonly code: LevelErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LevelError);
    }
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): LevelError {
    return new LevelError("CONFIG_INVALID", message, details);
  }

  static setupIncomplete(
    message: string,
    details?: Record<string, unknown>,
  ): LevelError {
    return new LevelError("SETUP_INCOMPLETE", message, details);
  }

  /**
   * All attempts produced a floor smaller than the configured minimum.
   */
  static exhausted(
    attempts: number,
    details?: Record<string, unknown>,
  ): LevelError {
    return new LevelError(
      "GENERATION_EXHAUSTED",
      `Failed to generate a valid level after ${attempts} attempts. Try increasing walkSteps or decreasing minFloorTiles.`,
      { attempts, ...details },
    );
  }

  static isLevelError(error: unknown): error is LevelError {
    return error instanceof LevelError;
  }

  isExhausted(): boolean {
    return this.code === "GENERATION_EXHAUSTED";
  }

  toJSON(): {
    name: string;
    code: LevelErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
