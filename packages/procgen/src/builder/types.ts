/**
 * Level builder types: consumers, options and results.
 */

import type { LevelError, RandomSource } from "@stampwalk/contracts";
import type { ReadonlyPointSet } from "../core/geometry/point-set";
import type { Bounds, Point } from "../core/geometry/types";
import type { TraceCollector, TraceEvent } from "../trace/types";

// =============================================================================
// CONSUMERS
// =============================================================================

/**
 * Paints a finished level onto whatever visual grid the caller maintains.
 * Invoked once per successful generation, never for a rejected attempt.
 */
export interface LevelRenderer {
  paint(floor: ReadonlyPointSet, walls: ReadonlyPointSet): void;
}

/**
 * Anything that needs spatial data once a level exists: enemy and
 * collectible spawners, navigation setup, etc.
 */
export interface FloorConsumer {
  readonly id: string;
  place(floor: ReadonlyPointSet, startPosition: Point): void;
}

export interface LevelConsumers {
  readonly renderer?: LevelRenderer;
  readonly placers?: readonly FloorConsumer[];
}

// =============================================================================
// OPTIONS
// =============================================================================

export interface LevelBuilderOptions extends LevelConsumers {
  /**
   * Random source for the walk. Overrides the config seed.
   * Not reset between attempts.
   */
  readonly rng?: RandomSource;
  /** Custom trace collector (otherwise one is created from `config.trace`) */
  readonly trace?: TraceCollector;
  /** Refuse to construct without a renderer */
  readonly requireRenderer?: boolean;
  /** Also `console.warn` when a renderer or placer list is missing */
  readonly warnOnMissingConsumers?: boolean;
  /** Called after every attempt, accepted or not */
  readonly onAttempt?: AttemptCallback;
}

export interface AttemptReport {
  /** 1-based attempt number */
  readonly attempt: number;
  readonly floorSize: number;
  readonly accepted: boolean;
  readonly durationMs: number;
}

export type AttemptCallback = (report: AttemptReport) => void;

// =============================================================================
// STATE AND RESULTS
// =============================================================================

export type BuilderState = "idle" | "attempting" | "success" | "exhausted";

/**
 * A finished level: floor, its closing walls and where the player starts.
 */
export interface Level {
  readonly floor: ReadonlyPointSet;
  readonly walls: ReadonlyPointSet;
  readonly startPosition: Point;
  /** Covers floor and walls */
  readonly bounds: Bounds;
  readonly checksum: string;
}

export interface GenerationSuccess {
  readonly success: true;
  readonly level: Level;
  /** Attempts used, including the accepted one */
  readonly attempts: number;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

export interface GenerationFailure {
  readonly success: false;
  /** `GENERATION_EXHAUSTED` or `CONFIG_INVALID` */
  readonly error: LevelError;
  readonly attempts: number;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

/**
 * Discriminated union - use `if (result.success)` to narrow.
 */
export type GenerationResult = GenerationSuccess | GenerationFailure;
