/**
 * Core module - grid, link graph and supporting data structures.
 */

export * from "./algorithms";
export * from "./data-structures";
export * from "./graph";
export * from "./grid";
export * from "./hash";
