/**
 * Level Checksum Calculator
 *
 * Deterministic fingerprint of a generated level, used to verify that a
 * seed reproduces the same layout across runs and machines.
 *
 * Format: "v{version}:{hash}". Cells are hashed in row-major order so the
 * result does not depend on set insertion order.
 */

import type { ReadonlyPointSet } from "../geometry/point-set";
import type { Point } from "../geometry/types";
import { createFNV64Hasher, type FNV64Hasher } from "./fnv64";

/**
 * Increment when changing what data is hashed or how.
 */
export const CHECKSUM_VERSION = 1;

export function parseChecksum(
  checksum: string,
): { version: number; hash: string } | null {
  const match = checksum.match(/^v(\d+):([0-9a-f]{16})$/);
  if (!match || !match[1] || !match[2]) return null;
  return {
    version: parseInt(match[1], 10),
    hash: match[2],
  };
}

function hashCells(hasher: FNV64Hasher, cells: ReadonlyPointSet): void {
  hasher.updateInt32(cells.size);
  for (const cell of cells.toSortedArray()) {
    hasher.updatePoint(cell);
  }
}

/**
 * Checksum covering floor cells, wall cells and the start coordinate.
 */
export function calculateLevelChecksum(
  floor: ReadonlyPointSet,
  walls: ReadonlyPointSet,
  startPosition: Point,
): string {
  const hasher = createFNV64Hasher();

  hasher.updateInt32(CHECKSUM_VERSION).updatePoint(startPosition);
  hashCells(hasher, floor);
  hashCells(hasher, walls);

  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
