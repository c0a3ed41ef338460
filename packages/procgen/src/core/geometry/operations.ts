/**
 * Geometry operations - pure functions on points and bounds.
 */

import type { Bounds, Point } from "./types";

export function addPoints(a: Point, b: Point): Point {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

export function chebyshevDistance(a: Point, b: Point): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

/**
 * Row-major ordering (y, then x). Used wherever output must not depend
 * on insertion order.
 */
export function comparePoints(a: Point, b: Point): number {
  return a.y - b.y || a.x - b.x;
}

/**
 * Smallest bounds containing every point, or null for an empty input.
 */
export function boundsFromPoints(points: Iterable<Point>): Bounds | null {
  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;
  let any = false;

  for (const p of points) {
    any = true;
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
  }

  return any ? { minX, minY, maxX, maxY } : null;
}

export function mergeBounds(a: Bounds, b: Bounds): Bounds {
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
  };
}

export function boundsContainPoint(b: Bounds, p: Point): boolean {
  return p.x >= b.minX && p.x <= b.maxX && p.y >= b.minY && p.y <= b.maxY;
}

export function boundsSize(b: Bounds): { width: number; height: number } {
  return { width: b.maxX - b.minX + 1, height: b.maxY - b.minY + 1 };
}
