/**
 * Shortest path reconstruction from BFS distances.
 */

import { MazeError } from "@mazegen/contracts";
import type { LinkGraph } from "../core/graph";
import { type Cell, DIRECTIONS_4 } from "../core/grid";
import type { DistanceMap } from "./distance-map";
import { distances } from "./distances";
import { PathMap } from "./path-map";

/** West, south, east, north: the forward scan order reversed. */
const BACKTRACK_ORDER = [...DIRECTIONS_4].reverse();

function stepBack(
  graph: LinkGraph,
  dist: DistanceMap,
  current: Cell,
  currentDistance: number,
): Cell | undefined {
  for (const direction of BACKTRACK_ORDER) {
    if (!graph.isLinkedToward(current, direction)) continue;
    const candidate = graph.grid.neighbor(current, direction);
    if (candidate && dist.get(candidate) === currentDistance - 1) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * One shortest path from `from` to `to`, each cell labeled with its distance
 * from `from`.
 *
 * Walks back from `to`, always stepping to a linked neighbor one link closer
 * to `from`. In a spanning tree that neighbor is unique; in a graph with
 * cycles the first match in west, south, east, north order wins.
 *
 * @throws {MazeError} UNREACHABLE when `to` cannot be reached from `from`,
 *   including when either cell is outside the grid
 *
 * @example
 * ```typescript
 * const path = shortestPath(graph, cell(0, 0), cell(1, 1));
 * path.cells(); // [(0,0), (1,0), (1,1)]
 * path.steps;   // 2
 * ```
 */
export function shortestPath(graph: LinkGraph, from: Cell, to: Cell): PathMap {
  const dist = distances(graph, from);
  const total = dist.get(to);
  if (total === undefined) {
    throw MazeError.unreachable(from, to);
  }

  const trail: Cell[] = [];
  let current = to;
  for (let remaining = total; remaining > 0; remaining--) {
    trail.push(current);
    const previous = stepBack(graph, dist, current, remaining);
    if (!previous) {
      throw MazeError.unreachable(from, to);
    }
    current = previous;
  }

  return new PathMap(graph.grid, [from, ...trail.reverse()]);
}
