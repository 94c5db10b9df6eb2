/**
 * Longest shortest path (diameter) of a maze.
 */

import type { LinkGraph } from "../core/graph";
import { distances } from "./distances";
import type { PathMap } from "./path-map";
import { shortestPath } from "./shortest-path";

/**
 * Two BFS passes: the cell farthest from the first cell is one end of a
 * longest path in a tree, and the cell farthest from that end is the other.
 *
 * On a graph with several components the result stays inside the component
 * of cell (0,0).
 */
export function longestPath(graph: LinkGraph): PathMap {
  const origin = graph.grid.cellAt(0);
  const start = distances(graph, origin).max().cell;
  const end = distances(graph, start).max().cell;
  return shortestPath(graph, start, end);
}
