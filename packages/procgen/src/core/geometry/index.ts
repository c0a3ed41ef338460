/**
 * Geometry module - points, bounds and point sets.
 */

export * from "./operations";
export * from "./point-set";
export * from "./types";
