import type { Level } from "../builder/types";
import type { ResolvedLevelConfig } from "../config";
import type { ReadonlyPointSet } from "../core/geometry/point-set";
import { NEIGHBOR_OFFSETS_8, type Point } from "../core/geometry/types";
import { calculateLevelChecksum } from "../core/hash/checksum";
import { stampFootprint } from "../generators/walk/walker";
import {
  toValidationReport,
  type ValidationReport,
  type Violation,
} from "./result-types";

function hasFloorNeighbor(cell: Point, floor: ReadonlyPointSet): boolean {
  return NEIGHBOR_OFFSETS_8.some((o) => floor.hasXY(cell.x + o.x, cell.y + o.y));
}

function appendWallViolations(
  violations: Violation[],
  floor: ReadonlyPointSet,
  walls: ReadonlyPointSet,
): void {
  for (const wall of walls) {
    if (floor.has(wall)) {
      violations.push({
        type: "invariant.disjoint",
        message: `(${wall.x}, ${wall.y}) is both floor and wall`,
        severity: "error",
      });
    } else if (!hasFloorNeighbor(wall, floor)) {
      violations.push({
        type: "invariant.wall.adjacent",
        message: `Wall at (${wall.x}, ${wall.y}) does not touch any floor tile`,
        severity: "error",
      });
    }
  }
}

function appendClosureViolations(
  violations: Violation[],
  floor: ReadonlyPointSet,
  walls: ReadonlyPointSet,
): void {
  for (const cell of floor) {
    for (const o of NEIGHBOR_OFFSETS_8) {
      const x = cell.x + o.x;
      const y = cell.y + o.y;
      if (!floor.hasXY(x, y) && !walls.hasXY(x, y)) {
        violations.push({
          type: "invariant.closure",
          message: `Floor at (${cell.x}, ${cell.y}) has an open neighbour at (${x}, ${y})`,
          severity: "error",
        });
      }
    }
  }
}

/**
 * Validate a generated level against its structural invariants.
 *
 * Checks:
 * - Floor and walls are disjoint
 * - Every wall touches a floor tile (8-neighbourhood)
 * - Every floor tile is closed in by floor or wall
 * - The start position is floor
 * - Checksum matches recomputed value
 *
 * With a config, also:
 * - The full stamp footprint around the start is floor
 * - Floor size reaches minFloorTiles
 */
export function validateLevel(
  level: Level,
  config?: Pick<ResolvedLevelConfig, "stampSize" | "minFloorTiles">,
): ValidationReport {
  const violations: Violation[] = [];
  const { floor, walls, startPosition } = level;

  appendWallViolations(violations, floor, walls);
  appendClosureViolations(violations, floor, walls);

  if (!floor.has(startPosition)) {
    violations.push({
      type: "invariant.start",
      message: `Start position (${startPosition.x}, ${startPosition.y}) is not a floor tile`,
      severity: "error",
    });
  }

  if (config) {
    const missing = stampFootprint(startPosition, config.stampSize).filter(
      (cell) => !floor.has(cell),
    );
    if (missing.length > 0) {
      violations.push({
        type: "invariant.start.footprint",
        message: `${missing.length} cell(s) of the starting stamp are not floor`,
        severity: "error",
      });
    }

    if (floor.size < config.minFloorTiles) {
      violations.push({
        type: "invariant.size",
        message: `Floor has ${floor.size} tiles, fewer than the required ${config.minFloorTiles}`,
        severity: "error",
      });
    }
  }

  const recomputedChecksum = calculateLevelChecksum(floor, walls, startPosition);
  if (recomputedChecksum !== level.checksum) {
    violations.push({
      type: "invariant.checksum",
      message: `Checksum mismatch: stored ${level.checksum}, computed ${recomputedChecksum}`,
      severity: "error",
    });
  }

  return toValidationReport(violations);
}
