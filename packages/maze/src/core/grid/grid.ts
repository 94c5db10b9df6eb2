/**
 * Fixed-size rectangular coordinate space.
 */

import { MazeError, type RandomSource, range } from "@mazegen/contracts";
import { type Cell, DIRECTION_OFFSETS, type Direction } from "./types";

/**
 * Rectangle of `rows × columns` cells with orthogonal neighbor lookup.
 *
 * Cells map to a flat arena index `row * columns + column`; LinkGraph and the
 * distance maps key their storage by that index.
 *
 * @remarks
 * Immutable. Every query is total: out-of-range cells simply have no
 * neighbors and are never contained.
 */
export class Grid {
  readonly rows: number;
  readonly columns: number;

  constructor(rows: number, columns: number) {
    if (
      !Number.isInteger(rows) ||
      !Number.isInteger(columns) ||
      rows <= 0 ||
      columns <= 0
    ) {
      throw MazeError.configInvalid(
        `Invalid grid dimensions: ${rows}x${columns}`,
        { rows, columns },
      );
    }

    this.rows = rows;
    this.columns = columns;
  }

  /**
   * Total number of cells
   */
  get size(): number {
    return this.rows * this.columns;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(row: number, column: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(column) &&
      row >= 0 &&
      row < this.rows &&
      column >= 0 &&
      column < this.columns
    );
  }

  contains(c: Cell): boolean {
    return this.isInBounds(c.row, c.column);
  }

  // ===========================================================================
  // NEIGHBORS
  // ===========================================================================

  /**
   * Adjacent cell along `direction`, or undefined when it falls outside the
   * grid (or `c` itself does).
   */
  neighbor(c: Cell, direction: Direction): Cell | undefined {
    if (!this.contains(c)) return undefined;
    const offset = DIRECTION_OFFSETS[direction];
    const row = c.row + offset.row;
    const column = c.column + offset.column;
    return this.isInBounds(row, column) ? { row, column } : undefined;
  }

  // ===========================================================================
  // INDEXING
  // ===========================================================================

  /**
   * Arena index of an in-bounds cell. Callers check `contains` first.
   */
  indexOf(c: Cell): number {
    return c.row * this.columns + c.column;
  }

  cellAt(index: number): Cell {
    return {
      row: Math.floor(index / this.columns),
      column: index % this.columns,
    };
  }

  /**
   * Every cell in row-major order.
   * Generators iterate in this order, so it fixes what a seed produces.
   */
  allCells(): Cell[] {
    const cells: Cell[] = [];
    for (let row = 0; row < this.rows; row++) {
      for (let column = 0; column < this.columns; column++) {
        cells.push({ row, column });
      }
    }
    return cells;
  }

  randomCell(rng: RandomSource): Cell {
    return this.cellAt(range(() => rng.next(), 0, this.size - 1));
  }
}
