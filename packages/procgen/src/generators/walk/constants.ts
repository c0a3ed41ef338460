/**
 * Random Walk Generator Constants
 */

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_WALK_STEPS = 200;

export const DEFAULT_STAMP_SIZE = 1;

export const DEFAULT_MIN_FLOOR_TILES = 100;

export const DEFAULT_MAX_GENERATION_ATTEMPTS = 100;

// =============================================================================
// RECOMMENDED RANGES (outside these only a warning is raised)
// =============================================================================

export const RECOMMENDED_WALK_STEPS = { min: 50, max: 500 } as const;

export const RECOMMENDED_MIN_FLOOR_TILES = { min: 50, max: 500 } as const;

export const RECOMMENDED_MAX_GENERATION_ATTEMPTS = { min: 10, max: 200 } as const;
