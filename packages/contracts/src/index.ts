export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/seed";
export * from "./schemas/walk-config";
export * from "./types/error";
export * from "./types/level";
export * from "./types/result";
export * from "./utils/parse-config";
