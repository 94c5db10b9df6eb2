/**
 * Path Map
 *
 * One shortest path, each cell labeled with its distance from the start.
 */

import type { Cell, Grid } from "../core/grid";
import type { CellLabels } from "./types";

export class PathMap implements CellLabels {
  readonly from: Cell;
  readonly to: Cell;
  private readonly path: readonly Cell[];
  private readonly positions = new Map<number, number>();

  /**
   * @param path - Cells from start to end; index equals distance
   */
  constructor(
    private readonly grid: Grid,
    path: readonly [Cell, ...Cell[]],
  ) {
    this.path = path;
    this.from = path[0];
    this.to = path.at(-1) ?? path[0];
    path.forEach((c, distance) => {
      this.positions.set(grid.indexOf(c), distance);
    });
  }

  /**
   * Number of cells on the path, endpoints included.
   */
  get size(): number {
    return this.path.length;
  }

  /**
   * Number of links walked.
   */
  get steps(): number {
    return this.path.length - 1;
  }

  get(c: Cell): number | undefined {
    if (!this.grid.contains(c)) return undefined;
    return this.positions.get(this.grid.indexOf(c));
  }

  has(c: Cell): boolean {
    return this.get(c) !== undefined;
  }

  label(c: Cell): number | undefined {
    return this.get(c);
  }

  /**
   * Cells in walking order, start first.
   */
  cells(): Cell[] {
    return [...this.path];
  }

  entries(): Array<[Cell, number]> {
    return this.path.map((c, distance) => [c, distance]);
  }
}
