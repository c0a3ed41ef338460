/**
 * Core geometry types for level generation.
 * All types are immutable value objects on an unbounded integer lattice.
 */

import type { Coordinate } from "@stampwalk/contracts";

/**
 * 2D point with integer coordinates
 */
export type Point = Coordinate;

/**
 * Bounding box defined by min/max corners (inclusive)
 */
export interface Bounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

/**
 * Unit steps the walker may take. Order matters: a random draw in
 * [0, 0.25) picks up, [0.25, 0.5) down, [0.5, 0.75) left, [0.75, 1) right.
 */
export const CARDINAL_DIRECTIONS: readonly [Point, Point, Point, Point] = [
  { x: 0, y: 1 }, // Up
  { x: 0, y: -1 }, // Down
  { x: -1, y: 0 }, // Left
  { x: 1, y: 0 }, // Right
];

/**
 * Cardinal plus diagonal offsets, used for wall derivation.
 */
export const NEIGHBOR_OFFSETS_8: readonly Point[] = [
  { x: 0, y: 1 }, // Up
  { x: 0, y: -1 }, // Down
  { x: -1, y: 0 }, // Left
  { x: 1, y: 0 }, // Right
  { x: 1, y: 1 }, // Up-Right
  { x: 1, y: -1 }, // Down-Right
  { x: -1, y: 1 }, // Up-Left
  { x: -1, y: -1 }, // Down-Left
];
