/**
 * Link graph over a grid: the maze itself.
 */

import { MazeError } from "@mazegen/contracts";
import { Grid } from "../grid/grid";
import {
  type Cell,
  cellEquals,
  DIRECTIONS_4,
  type Direction,
  opposite,
  type Walls,
} from "../grid/types";

const DIRECTION_BITS: Readonly<Record<Direction, number>> = {
  north: 1,
  east: 2,
  south: 4,
  west: 8,
};

function countBits(mask: number): number {
  let count = 0;
  for (let m = mask; m !== 0; m &= m - 1) count++;
  return count;
}

/**
 * Bidirectional links between orthogonally adjacent cells.
 *
 * Storage is one byte per cell in a flat arena (`row * columns + column`),
 * with one bit per direction. A link is a two-index write, so both sides
 * always change together and no caller can observe a half-linked pair.
 *
 * The neighbor set of each cell is implied by the grid and never changes;
 * only the link bits do, and only through {@link LinkGraph.link}.
 *
 * @example
 * ```typescript
 * const graph = LinkGraph.build(2, 2);
 * graph.link(cell(0, 0), cell(0, 1));
 * graph.isLinked(cell(0, 1), cell(0, 0)); // true
 * graph.link(cell(0, 0), cell(1, 1));     // throws MazeError INVALID_LINK
 * ```
 */
export class LinkGraph {
  readonly grid: Grid;
  private readonly masks: Uint8Array;

  private constructor(grid: Grid, masks: Uint8Array) {
    this.grid = grid;
    this.masks = masks;
  }

  /**
   * Unlinked graph over a fresh `rows × columns` grid.
   */
  static build(rows: number, columns: number): LinkGraph {
    return LinkGraph.fromGrid(new Grid(rows, columns));
  }

  static fromGrid(grid: Grid): LinkGraph {
    return new LinkGraph(grid, new Uint8Array(grid.size));
  }

  /**
   * Graph with the given pairs linked. Every pair goes through `link`,
   * so a non-adjacent pair throws INVALID_LINK.
   */
  static fromLinks(
    rows: number,
    columns: number,
    pairs: Iterable<readonly [Cell, Cell]>,
  ): LinkGraph {
    const graph = LinkGraph.build(rows, columns);
    for (const [a, b] of pairs) {
      graph.link(a, b);
    }
    return graph;
  }

  get rows(): number {
    return this.grid.rows;
  }

  get columns(): number {
    return this.grid.columns;
  }

  get size(): number {
    return this.grid.size;
  }

  allCells(): Cell[] {
    return this.grid.allCells();
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * In-bounds neighbors along `directions`, in the caller's order.
   */
  neighborsOf(c: Cell, directions: readonly Direction[]): Cell[] {
    const result: Cell[] = [];
    for (const direction of directions) {
      const next = this.grid.neighbor(c, direction);
      if (next) result.push(next);
    }
    return result;
  }

  isLinkedToward(c: Cell, direction: Direction): boolean {
    if (!this.grid.contains(c)) return false;
    const mask = this.masks[this.grid.indexOf(c)] ?? 0;
    return (mask & DIRECTION_BITS[direction]) !== 0;
  }

  /**
   * False for unlinked pairs, non-neighbors and out-of-range cells alike.
   */
  isLinked(a: Cell, b: Cell): boolean {
    const direction = this.directionBetween(a, b);
    return direction !== undefined && this.isLinkedToward(a, direction);
  }

  /**
   * Linked neighbors in north, east, south, west order.
   */
  linkedNeighbors(c: Cell): Cell[] {
    const result: Cell[] = [];
    for (const direction of DIRECTIONS_4) {
      if (!this.isLinkedToward(c, direction)) continue;
      const next = this.grid.neighbor(c, direction);
      if (next) result.push(next);
    }
    return result;
  }

  degree(c: Cell): number {
    if (!this.grid.contains(c)) return 0;
    return countBits(this.masks[this.grid.indexOf(c)] ?? 0);
  }

  /**
   * Wall presence per side, as a renderer draws it.
   */
  walls(c: Cell): Walls {
    return {
      north: !this.isLinkedToward(c, "north"),
      east: !this.isLinkedToward(c, "east"),
      south: !this.isLinkedToward(c, "south"),
      west: !this.isLinkedToward(c, "west"),
    };
  }

  /**
   * Number of undirected links.
   */
  linkCount(): number {
    let bits = 0;
    for (const mask of this.masks) bits += countBits(mask);
    return bits / 2;
  }

  /**
   * Cells with exactly one link.
   */
  deadEnds(): Cell[] {
    return this.allCells().filter((c) => this.degree(c) === 1);
  }

  /**
   * Copy of the per-cell link bits (north=1, east=2, south=4, west=8).
   */
  linkMasks(): Uint8Array {
    return this.masks.slice();
  }

  // ===========================================================================
  // MUTATION
  // ===========================================================================

  /**
   * Link two neighboring cells in both directions.
   *
   * @throws {MazeError} INVALID_LINK when `b` is not a neighbor of `a`
   */
  link(a: Cell, b: Cell): this {
    const direction = this.directionBetween(a, b);
    if (direction === undefined) {
      throw MazeError.invalidLink(a, b);
    }

    const from = this.grid.indexOf(a);
    const to = this.grid.indexOf(b);
    this.masks[from] = (this.masks[from] ?? 0) | DIRECTION_BITS[direction];
    this.masks[to] = (this.masks[to] ?? 0) | DIRECTION_BITS[opposite(direction)];
    return this;
  }

  clone(): LinkGraph {
    return new LinkGraph(this.grid, this.masks.slice());
  }

  private directionBetween(a: Cell, b: Cell): Direction | undefined {
    for (const direction of DIRECTIONS_4) {
      const next = this.grid.neighbor(a, direction);
      if (next && cellEquals(next, b)) {
        return direction;
      }
    }
    return undefined;
  }
}
