/**
 * Spanning-tree invariants for a carved maze.
 */

import { UnionFind } from "../core/algorithms";
import type { LinkGraph } from "../core/graph";
import { Direction } from "../core/grid";
import { distances } from "../pathfinding";
import {
  hasErrorViolations,
  type MazeValidationResult,
  type Violation,
} from "./result-types";

/**
 * Validation result for a single check
 */
export interface CheckResult {
  readonly success: boolean;
  readonly violations: Violation[];
}

const PASSED: CheckResult = { success: true, violations: [] };

function failed(type: string, message: string): CheckResult {
  return {
    success: false,
    violations: [{ type, message, severity: "error" }],
  };
}

/**
 * A spanning tree over N cells has exactly N - 1 links.
 */
export function checkLinkCount(graph: LinkGraph): CheckResult {
  const expected = graph.size - 1;
  const actual = graph.linkCount();
  if (actual !== expected) {
    return failed(
      "invariant.link-count",
      `Expected ${expected} links for ${graph.size} cells, found ${actual}`,
    );
  }
  return PASSED;
}

/**
 * Every cell is reachable from the first one.
 */
export function checkConnectivity(graph: LinkGraph): CheckResult {
  const reached = distances(graph, graph.grid.cellAt(0)).size;
  if (reached !== graph.size) {
    return failed(
      "invariant.connectivity",
      `Only ${reached} of ${graph.size} cells are reachable from (0,0)`,
    );
  }
  return PASSED;
}

/**
 * No link closes a loop. Each link is visited once, from its west or north end.
 */
export function checkAcyclic(graph: LinkGraph): CheckResult {
  const grid = graph.grid;
  const sets = new UnionFind(graph.size);
  let cycles = 0;

  for (const current of graph.allCells()) {
    for (const direction of [Direction.EAST, Direction.SOUTH]) {
      if (!graph.isLinkedToward(current, direction)) continue;
      const next = grid.neighbor(current, direction);
      if (next && !sets.union(grid.indexOf(current), grid.indexOf(next))) {
        cycles++;
      }
    }
  }

  if (cycles > 0) {
    return failed(
      "invariant.acyclic",
      `Link set contains ${cycles} cycle-closing link${cycles === 1 ? "" : "s"}`,
    );
  }
  return PASSED;
}

/**
 * Run every spanning-tree check and collect all violations.
 */
export function validateMaze(graph: LinkGraph): MazeValidationResult {
  const violations = [
    checkLinkCount(graph),
    checkConnectivity(graph),
    checkAcyclic(graph),
  ].flatMap((check) => check.violations);

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}
