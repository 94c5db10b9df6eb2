/**
 * Maze - grid maze generation and solving.
 *
 * @example
 * ```typescript
 * import { cell, generate, solve } from "@mazegen/maze";
 *
 * const maze = generate({ rows: 10, columns: 10, algorithm: "sidewinder", seed: 1234 }).getOrThrow();
 * const path = solve(maze.graph, cell(0, 0), cell(9, 9)).getOrThrow();
 * console.log(`Solution is ${path.steps} links long`);
 * ```
 */

// Core modules
export * from "./core";
// Generators
export * from "./generators";
// Distances and paths
export * from "./pathfinding";
// Invariants and statistics
export * from "./validation";
// High-level API
export * from "./api";
export * from "./seed";
export * from "./testing";
