/**
 * stampwalk - random walk level generation
 *
 * Carves a connected floor by stamping squares along a random walk, closes
 * it with walls, and retries until the floor is large enough.
 *
 * @example
 * ```typescript
 * import { generate } from "@stampwalk/procgen";
 *
 * const result = generate({
 *   walkSteps: 200,
 *   stampSize: 1,
 *   minFloorTiles: 100,
 *   seed: 12345,
 * });
 *
 * if (result.success) {
 *   console.log(`Generated level with ${result.level.floor.size} floor tiles`);
 * }
 * ```
 */

// High-level API
export { generate, generateOrThrow, validateConfig } from "./api";
// Builder
export * from "./builder";
// Configuration
export * from "./config";
// Core modules
export * from "./core";
// Generators
export * from "./generators/walk";
// Seeds
export * from "./seed";
// Testing helpers
export * from "./testing";
// Trace
export * from "./trace";
// Validation
export * from "./validation";
