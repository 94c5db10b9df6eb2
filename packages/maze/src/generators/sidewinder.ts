/**
 * Sidewinder carver
 *
 * Works row by row. Cells are gathered into an eastward run; when the run is
 * closed, one of its members opens north. The top row has no north side and
 * is carved as a single corridor.
 */

import { choice, probability, type RandomSource } from "@mazegen/contracts";
import type { LinkGraph } from "../core/graph";
import { type Cell, Direction } from "../core/grid";
import { assertUnlinked, type MazeGenerator } from "./types";

/** Chance of closing the current run at an interior cell boundary. */
const CLOSE_RUN_CHANCE = 0.5;

export function sidewinder(graph: LinkGraph, rng: RandomSource): LinkGraph {
  assertUnlinked(graph, "sidewinder");
  const next = () => rng.next();
  const grid = graph.grid;

  for (let row = 0; row < graph.rows; row++) {
    let run: Cell[] = [];

    for (let column = 0; column < graph.columns; column++) {
      const current: Cell = { row, column };
      run.push(current);

      const east = grid.neighbor(current, Direction.EAST);
      const hasNorth = grid.neighbor(current, Direction.NORTH) !== undefined;

      if (east === undefined || (hasNorth && probability(next, CLOSE_RUN_CHANCE))) {
        if (hasNorth) {
          const member = choice(next, run);
          const above = member && grid.neighbor(member, Direction.NORTH);
          if (member && above) {
            graph.link(member, above);
          }
        }
        run = [];
      } else {
        graph.link(current, east);
      }
    }
  }

  return graph;
}

export class SidewinderGenerator implements MazeGenerator {
  readonly id = "sidewinder";
  readonly name = "Sidewinder";
  readonly description =
    "Carves eastward runs and links one cell of each run north; open top corridor";

  carve(graph: LinkGraph, rng: RandomSource): LinkGraph {
    return sidewinder(graph, rng);
  }
}

export function createSidewinderGenerator(): MazeGenerator {
  return new SidewinderGenerator();
}
