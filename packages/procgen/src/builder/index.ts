/**
 * Level builder module - retry orchestration and consumer publishing.
 */

export { createLevelBuilder, LevelBuilder } from "./level-builder";
export * from "./types";
