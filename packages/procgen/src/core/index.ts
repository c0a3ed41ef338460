/**
 * Core module - foundational primitives for level generation.
 */

export * from "./geometry";
export * from "./hash";
