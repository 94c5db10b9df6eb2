/**
 * Binary-Tree carver
 *
 * Each cell opens a passage either north or east. The top row becomes one
 * long eastward corridor and the last column one long northward corridor.
 */

import { choice, type RandomSource } from "@mazegen/contracts";
import type { LinkGraph } from "../core/graph";
import { Direction } from "../core/grid";
import { assertUnlinked, type MazeGenerator } from "./types";

const CANDIDATE_DIRECTIONS = [Direction.NORTH, Direction.EAST] as const;

/**
 * Link every cell to its north or east neighbor, picked uniformly.
 * The corner with neither (row 0, last column) is skipped.
 */
export function binaryTree(graph: LinkGraph, rng: RandomSource): LinkGraph {
  assertUnlinked(graph, "binary-tree");
  const next = () => rng.next();

  for (const current of graph.allCells()) {
    const target = choice(next, graph.neighborsOf(current, CANDIDATE_DIRECTIONS));
    if (target) {
      graph.link(current, target);
    }
  }

  return graph;
}

export class BinaryTreeGenerator implements MazeGenerator {
  readonly id = "binary-tree";
  readonly name = "Binary Tree";
  readonly description =
    "Links each cell north or east at random; fast, with a strong diagonal bias";

  carve(graph: LinkGraph, rng: RandomSource): LinkGraph {
    return binaryTree(graph, rng);
  }
}

export function createBinaryTreeGenerator(): MazeGenerator {
  return new BinaryTreeGenerator();
}
