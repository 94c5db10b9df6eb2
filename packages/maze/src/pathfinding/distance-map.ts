/**
 * Distance Map
 *
 * Edge-count distances from one source cell, keyed by arena index.
 */

import type { Cell, Grid } from "../core/grid";
import type { CellLabels } from "./types";

export interface FarthestCell {
  readonly cell: Cell;
  readonly distance: number;
}

export class DistanceMap implements CellLabels {
  constructor(
    private readonly grid: Grid,
    readonly source: Cell,
    private readonly values: ReadonlyMap<number, number>,
  ) {}

  /**
   * Number of reached cells (including the source).
   */
  get size(): number {
    return this.values.size;
  }

  get(c: Cell): number | undefined {
    if (!this.grid.contains(c)) return undefined;
    return this.values.get(this.grid.indexOf(c));
  }

  has(c: Cell): boolean {
    return this.get(c) !== undefined;
  }

  label(c: Cell): number | undefined {
    return this.get(c);
  }

  /**
   * Reached cells with their distance, in row-major order.
   */
  entries(): Array<[Cell, number]> {
    return [...this.values.keys()]
      .sort((a, b) => a - b)
      .map((index) => [this.grid.cellAt(index), this.values.get(index) ?? 0]);
  }

  /**
   * Farthest reached cell. Ties go to the cell reached first.
   * An empty map reports the source at distance 0.
   */
  max(): FarthestCell {
    let best: FarthestCell = { cell: this.source, distance: 0 };
    for (const [index, distance] of this.values) {
      if (distance > best.distance) {
        best = { cell: this.grid.cellAt(index), distance };
      }
    }
    return best;
  }
}
