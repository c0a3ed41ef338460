/**
 * Integer cell on the unbounded level lattice.
 */
export interface Coordinate {
  readonly x: number;
  readonly y: number;
}

/**
 * Parameters for one level generation run.
 */
export type WalkConfig = {
  walkSteps: number;
  stampSize: number;
  minFloorTiles: number;
  maxGenerationAttempts: number;
  startPosition: Coordinate;
};

export interface LevelSeed {
  primary: number;
  walk: number;
  placement: number;
  version: string;
}
