/**
 * Wall derivation.
 */

import { PointSet, type ReadonlyPointSet } from "../../core/geometry/point-set";
import { NEIGHBOR_OFFSETS_8 } from "../../core/geometry/types";

/**
 * Every non-floor cell in the 8-neighbourhood of some floor cell.
 *
 * The result closes the floor: each floor cell's eight neighbours are all
 * floor or wall. Cells two or more steps away from the floor are neither.
 */
export function deriveWalls(floor: ReadonlyPointSet): ReadonlyPointSet {
  const walls = new PointSet();

  for (const cell of floor) {
    for (const offset of NEIGHBOR_OFFSETS_8) {
      const x = cell.x + offset.x;
      const y = cell.y + offset.y;
      if (!floor.hasXY(x, y)) {
        walls.addXY(x, y);
      }
    }
  }

  return walls;
}
