export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-seed";
export * from "./schemas/config";
export * from "./types/error";
export * from "./types/result";
export * from "./utils/config-builder";
