/**
 * Breadth-first distance labeling over linked cells.
 */

import { FastQueue } from "../core/data-structures";
import type { LinkGraph } from "../core/graph";
import type { Cell } from "../core/grid";
import { DistanceMap } from "./distance-map";

/**
 * Distances in links from `source` to every reachable cell.
 *
 * Expands one BFS layer at a time; the map doubles as the visited set, so a
 * cell keeps the first distance it is given. Cells outside the source's
 * component are absent. A source outside the grid gives an empty map.
 *
 * @example
 * ```typescript
 * const dist = distances(graph, cell(0, 0));
 * dist.get(cell(1, 0)); // 3 in a 2x2 maze carved as a U
 * ```
 */
export function distances(graph: LinkGraph, source: Cell): DistanceMap {
  const grid = graph.grid;
  const values = new Map<number, number>();

  if (!grid.contains(source)) {
    return new DistanceMap(grid, source, values);
  }

  values.set(grid.indexOf(source), 0);
  const frontier = FastQueue.from([source]);

  for (let current = frontier.dequeue(); current; current = frontier.dequeue()) {
    const nextDistance = (values.get(grid.indexOf(current)) ?? 0) + 1;

    for (const neighbor of graph.linkedNeighbors(current)) {
      const key = grid.indexOf(neighbor);
      if (values.has(key)) continue;
      values.set(key, nextDistance);
      frontier.enqueue(neighbor);
    }
  }

  return new DistanceMap(grid, source, values);
}
