/**
 * Random walk floor generator.
 *
 * Each iteration stamps a (2s+1)x(2s+1) square of floor around the walker,
 * then moves it one cell in a uniformly random cardinal direction.
 */

import {
  choice,
  LevelError,
  type RandomSource,
  toRandomFn,
  type WalkConfig,
  WalkConfigSchema,
} from "@stampwalk/contracts";
import { addPoints } from "../../core/geometry/operations";
import { PointSet } from "../../core/geometry/point-set";
import { CARDINAL_DIRECTIONS, type Point } from "../../core/geometry/types";

export type WalkParams = Pick<
  WalkConfig,
  "walkSteps" | "stampSize" | "startPosition"
>;

const WalkParamsSchema = WalkConfigSchema.pick({
  walkSteps: true,
  stampSize: true,
  startPosition: true,
});

/**
 * Called after the stamp of each step, before the walker moves.
 */
export type WalkObserver = (
  step: number,
  position: Point,
  floorSize: number,
) => void;

/**
 * Cells covered by one stamp centered on `center`.
 */
export function stampFootprint(center: Point, stampSize: number): Point[] {
  const cells: Point[] = [];
  for (let dx = -stampSize; dx <= stampSize; dx++) {
    for (let dy = -stampSize; dy <= stampSize; dy++) {
      cells.push({ x: center.x + dx, y: center.y + dy });
    }
  }
  return cells;
}

/**
 * Upper bound on floor size: every stamp landing on fresh cells.
 */
export function maxFloorTiles(walkSteps: number, stampSize: number): number {
  const side = 2 * stampSize + 1;
  return walkSteps * side * side;
}

/**
 * One uniformly chosen cardinal unit vector. Consumes exactly one draw.
 */
export function randomCardinal(rng: () => number): Point {
  return choice(rng, CARDINAL_DIRECTIONS);
}

/**
 * Run one walk to completion and return its floor cells.
 *
 * @throws {LevelError} `CONFIG_INVALID` for a non-positive or fractional
 *   step count, a stamp size outside 0-3, or a fractional start
 */
export function walk(
  params: WalkParams,
  source: RandomSource,
  observer?: WalkObserver,
): PointSet {
  const parsed = WalkParamsSchema.safeParse(params);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => issue.message);
    throw LevelError.configInvalid(
      `Invalid configuration: ${problems.join("; ")}`,
      { problems },
    );
  }

  const rng = toRandomFn(source);
  const floor = new PointSet();
  const s = params.stampSize;
  let current: Point = params.startPosition;

  for (let step = 0; step < params.walkSteps; step++) {
    for (let dx = -s; dx <= s; dx++) {
      for (let dy = -s; dy <= s; dy++) {
        floor.addXY(current.x + dx, current.y + dy);
      }
    }

    observer?.(step, current, floor.size);

    current = addPoints(current, randomCardinal(rng));
  }

  return floor;
}
