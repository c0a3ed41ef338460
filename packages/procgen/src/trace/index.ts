export * from "./collector";
export * from "./types";
