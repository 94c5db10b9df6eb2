/**
 * Hash utilities module
 */

export * from "./checksum";
export * from "./fnv64";
