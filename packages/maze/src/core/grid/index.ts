/**
 * Grid module - coordinates, directions and the rectangular lattice.
 */

export { Grid } from "./grid";
export * from "./types";
