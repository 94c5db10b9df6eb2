import type { LinkGraph } from "../core/graph";
import { longestPath } from "../pathfinding";

/**
 * Shape statistics for a carved maze
 */
export interface MazeStats {
  readonly cells: number;
  readonly links: number;
  readonly deadEnds: number;
  /** Dead ends as a fraction of all cells */
  readonly deadEndRatio: number;
  /** Links along the longest shortest path */
  readonly longestPathLength: number;
}

export function computeStats(graph: LinkGraph): MazeStats {
  const deadEnds = graph.deadEnds().length;
  return {
    cells: graph.size,
    links: graph.linkCount(),
    deadEnds,
    deadEndRatio: deadEnds / graph.size,
    longestPathLength: longestPath(graph).steps,
  };
}
