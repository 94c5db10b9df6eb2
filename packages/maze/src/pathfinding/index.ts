/**
 * Pathfinding module - BFS distances and path reconstruction.
 */

export { DistanceMap, type FarthestCell } from "./distance-map";
export { distances } from "./distances";
export { longestPath } from "./longest-path";
export { PathMap } from "./path-map";
export { shortestPath } from "./shortest-path";
export type { CellLabels } from "./types";
