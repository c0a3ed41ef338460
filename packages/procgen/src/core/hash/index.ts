/**
 * Hash utilities module
 *
 * FNV-64 hashing and level checksum calculation.
 */

export * from "./checksum";
export * from "./fnv64";
