import type { RandomSource } from "@mazegen/contracts";
import { type Cell, cell, LinkGraph } from "../src";

/**
 * Replays a fixed list of draws; fails loudly if a carver asks for more.
 */
export class ScriptedRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {}

  get consumed(): number {
    return this.index;
  }

  next(): number {
    const value = this.values[this.index];
    if (value === undefined) {
      throw new Error(`ScriptedRandom exhausted after ${this.index} draws`);
    }
    this.index++;
    return value;
  }
}

/**
 * 2x2 maze shaped like a U: (0,0)-(0,1)-(1,1)-(1,0).
 */
export function uShapedMaze(): LinkGraph {
  return LinkGraph.fromLinks(2, 2, [
    [cell(0, 0), cell(0, 1)],
    [cell(0, 1), cell(1, 1)],
    [cell(1, 1), cell(1, 0)],
  ]);
}

/**
 * 2x3 grid with every adjacent pair linked.
 */
export function ladderMaze(): LinkGraph {
  const graph = LinkGraph.build(2, 3);
  for (const c of graph.allCells()) {
    for (const next of graph.neighborsOf(c, ["east", "south"])) {
      graph.link(c, next);
    }
  }
  return graph;
}

export function sortCells(cells: readonly Cell[]): Cell[] {
  return [...cells].sort((a, b) => a.row - b.row || a.column - b.column);
}
