/**
 * Level Builder
 *
 * Retry orchestrator around the random walk. Each attempt walks from the
 * configured start with fresh floor state; the first attempt whose floor
 * reaches `minFloorTiles` gets its walls derived and is published to the
 * consumers. Running out of attempts is a normal outcome reported as a
 * failed result, not an exception.
 *
 * States: idle -> attempting -> success | exhausted
 */

import {
  LevelError,
  type RandomSource,
  SeededRandom,
  createSystemRandom,
} from "@stampwalk/contracts";
import {
  type LevelGenerationConfig,
  type ResolvedLevelConfig,
  resolveConfig,
  validateLevelConfig,
} from "../config";
import { mergeBounds, boundsFromPoints } from "../core/geometry/operations";
import type { PointSet, ReadonlyPointSet } from "../core/geometry/point-set";
import type { Bounds } from "../core/geometry/types";
import { calculateLevelChecksum } from "../core/hash/checksum";
import { deriveWalls } from "../generators/walk/walls";
import { walk } from "../generators/walk/walker";
import { createTraceCollector } from "../trace/collector";
import type { TraceCollector } from "../trace/types";
import { errorMessages, type Violation } from "../validation/result-types";
import type {
  BuilderState,
  GenerationFailure,
  GenerationResult,
  GenerationSuccess,
  Level,
  LevelBuilderOptions,
} from "./types";

const STAGE_BUILD = "builder.generate";
const STAGE_CONFIG = "builder.config";
const STAGE_ATTEMPT = "builder.attempt";
const STAGE_PUBLISH = "builder.publish";

function levelBounds(floor: ReadonlyPointSet, walls: ReadonlyPointSet): Bounds {
  const floorBounds = boundsFromPoints(floor);
  const wallBounds = boundsFromPoints(walls);
  // A walk always stamps at least once, so both sets are non-empty
  if (!floorBounds || !wallBounds) {
    throw new Error("Cannot compute bounds of an empty level");
  }
  return mergeBounds(floorBounds, wallBounds);
}

export class LevelBuilder {
  readonly config: ResolvedLevelConfig;
  private readonly options: LevelBuilderOptions;
  private readonly configWarnings: readonly Violation[];
  private _state: BuilderState = "idle";
  private currentFloor: PointSet | null = null;
  private _level: Level | undefined;

  /**
   * @throws {LevelError} `CONFIG_INVALID` for unusable parameters,
   *   `SETUP_INCOMPLETE` when `requireRenderer` is set without a renderer
   */
  constructor(
    config: LevelGenerationConfig = {},
    options: LevelBuilderOptions = {},
  ) {
    this.config = resolveConfig(config);
    this.options = options;

    const report = validateLevelConfig(this.config);
    if (!report.success) {
      throw LevelError.configInvalid(
        `Invalid configuration: ${errorMessages(report.violations).join("; ")}`,
        { violations: report.violations, config: this.config },
      );
    }
    this.configWarnings = report.violations;

    if (options.requireRenderer && !options.renderer) {
      throw LevelError.setupIncomplete(
        "Level builder setup is incomplete: a renderer is required but none was supplied",
      );
    }
  }

  get state(): BuilderState {
    return this._state;
  }

  /**
   * The level from the last successful run, if any.
   */
  get level(): Level | undefined {
    return this._level;
  }

  /**
   * Floor cells of the attempt in progress (null between attempts).
   */
  get attemptFloorSize(): number | null {
    return this.currentFloor ? this.currentFloor.size : null;
  }

  generate(): GenerationResult {
    const startTime = performance.now();
    const trace = this.options.trace ?? createTraceCollector(this.config.trace);
    const rng = this.createRandomSource();
    const { maxGenerationAttempts, minFloorTiles } = this.config;

    this._state = "attempting";
    this._level = undefined;
    trace.start(STAGE_BUILD);

    for (const warning of this.configWarnings) {
      trace.warning(STAGE_CONFIG, warning.message);
    }

    let largestFloor = 0;

    for (let attempt = 1; attempt <= maxGenerationAttempts; attempt++) {
      this.currentFloor = null;
      const attemptStart = performance.now();

      const floor = walk(this.config, rng);
      this.currentFloor = floor;
      const accepted = floor.size >= minFloorTiles;

      this.options.onAttempt?.({
        attempt,
        floorSize: floor.size,
        accepted,
        durationMs: performance.now() - attemptStart,
      });

      if (accepted) {
        trace.decision(
          STAGE_ATTEMPT,
          `Attempt ${attempt}/${maxGenerationAttempts}`,
          ["accept", "retry"],
          "accept",
          `Level generated successfully after ${attempt} attempt(s). Floor tiles: ${floor.size}`,
        );
        return this.succeed(floor, attempt, trace, startTime);
      }

      largestFloor = Math.max(largestFloor, floor.size);
      trace.decision(
        STAGE_ATTEMPT,
        `Attempt ${attempt}/${maxGenerationAttempts}`,
        ["accept", "retry"],
        "retry",
        `Generated level too small (${floor.size} tiles). Retrying... (Attempt ${attempt}/${maxGenerationAttempts})`,
      );
    }

    return this.exhaust(largestFloor, trace, startTime);
  }

  private createRandomSource(): RandomSource {
    if (this.options.rng) return this.options.rng;
    if (this.config.seed) return new SeededRandom(this.config.seed.walk);
    return createSystemRandom();
  }

  private succeed(
    floor: PointSet,
    attempts: number,
    trace: TraceCollector,
    startTime: number,
  ): GenerationSuccess {
    const walls = deriveWalls(floor);
    const startPosition = this.config.startPosition;
    const level: Level = {
      floor,
      walls,
      startPosition,
      bounds: levelBounds(floor, walls),
      checksum: calculateLevelChecksum(floor, walls, startPosition),
    };

    this.currentFloor = null;
    this._level = level;
    this._state = "success";

    this.publish(level, trace);

    const durationMs = performance.now() - startTime;
    trace.end(STAGE_BUILD, durationMs);

    return {
      success: true,
      level,
      attempts,
      trace: trace.getEvents(),
      durationMs,
    };
  }

  private exhaust(
    largestFloor: number,
    trace: TraceCollector,
    startTime: number,
  ): GenerationFailure {
    const { maxGenerationAttempts, minFloorTiles, walkSteps, stampSize } =
      this.config;

    this.currentFloor = null;
    this._state = "exhausted";

    const error = LevelError.exhausted(maxGenerationAttempts, {
      largestFloor,
      minFloorTiles,
      walkSteps,
      stampSize,
      config: this.config,
    });
    trace.warning(STAGE_BUILD, error.message);

    const durationMs = performance.now() - startTime;
    trace.end(STAGE_BUILD, durationMs);

    return {
      success: false,
      error,
      attempts: maxGenerationAttempts,
      trace: trace.getEvents(),
      durationMs,
    };
  }

  /**
   * Hand the level to consumers. Consumer errors propagate to the caller.
   */
  private publish(level: Level, trace: TraceCollector): void {
    const { renderer, placers } = this.options;

    if (renderer) {
      renderer.paint(level.floor, level.walls);
    } else {
      this.missingConsumer(
        trace,
        "No renderer supplied! The level will not be painted.",
      );
    }

    if (placers && placers.length > 0) {
      for (const placer of placers) {
        placer.place(level.floor, level.startPosition);
        trace.decision(
          STAGE_PUBLISH,
          "Floor consumer",
          placers.map((p) => p.id),
          placer.id,
          `Handed ${level.floor.size} floor tiles to ${placer.id}`,
        );
      }
    } else {
      this.missingConsumer(
        trace,
        "No floor consumers supplied! Nothing will be spawned.",
      );
    }
  }

  private missingConsumer(trace: TraceCollector, message: string): void {
    trace.warning(STAGE_PUBLISH, message);
    if (this.options.warnOnMissingConsumers) {
      console.warn(`[stampwalk] ${message}`);
    }
  }
}

/**
 * @throws {LevelError} see `LevelBuilder` constructor
 */
export function createLevelBuilder(
  config: LevelGenerationConfig = {},
  options: LevelBuilderOptions = {},
): LevelBuilder {
  return new LevelBuilder(config, options);
}
