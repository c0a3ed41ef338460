/**
 * Value-keyed set of lattice points.
 *
 * JavaScript `Set` compares objects by identity, so two `{ x: 1, y: 2 }`
 * literals would be distinct members. PointSet keys each point by its
 * coordinates instead, which also keeps the lattice unbounded (no packing
 * into a fixed-width integer).
 */

import { comparePoints } from "./operations";
import type { Point } from "./types";

function keyOf(x: number, y: number): string {
  return `${x},${y}`;
}

/**
 * Read-only view handed to consumers once a set is final.
 */
export interface ReadonlyPointSet extends Iterable<Point> {
  readonly size: number;
  has(p: Point): boolean;
  hasXY(x: number, y: number): boolean;
  /** Points in row-major order (y, then x) */
  toSortedArray(): Point[];
}

export class PointSet implements ReadonlyPointSet {
  private readonly points = new Map<string, Point>();

  constructor(initial?: Iterable<Point>) {
    if (initial) {
      for (const p of initial) {
        this.add(p);
      }
    }
  }

  get size(): number {
    return this.points.size;
  }

  /**
   * Insert a point. Returns true if it was not already present.
   */
  add(p: Point): boolean {
    return this.addXY(p.x, p.y);
  }

  addXY(x: number, y: number): boolean {
    const key = keyOf(x, y);
    if (this.points.has(key)) return false;
    this.points.set(key, { x, y });
    return true;
  }

  has(p: Point): boolean {
    return this.points.has(keyOf(p.x, p.y));
  }

  hasXY(x: number, y: number): boolean {
    return this.points.has(keyOf(x, y));
  }

  clear(): void {
    this.points.clear();
  }

  toSortedArray(): Point[] {
    return [...this.points.values()].sort(comparePoints);
  }

  [Symbol.iterator](): Iterator<Point> {
    return this.points.values();
  }
}
