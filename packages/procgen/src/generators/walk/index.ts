/**
 * Random Walk Generator module
 */

export * from "./constants";
export { deriveWalls } from "./walls";
export {
  maxFloorTiles,
  randomCardinal,
  stampFootprint,
  walk,
  type WalkObserver,
  type WalkParams,
} from "./walker";
