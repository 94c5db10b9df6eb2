/**
 * Grid types for maze generation.
 * Cells are immutable value objects compared structurally.
 */

/**
 * Zero-based (row, column) coordinate.
 */
export interface Cell {
  readonly row: number;
  readonly column: number;
}

/**
 * Orthogonal directions.
 * North decreases the row, east increases the column.
 */
export const Direction = {
  NORTH: "north",
  EAST: "east",
  SOUTH: "south",
  WEST: "west",
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

/**
 * Fixed scan order used wherever directions are enumerated.
 */
export const DIRECTIONS_4: readonly Direction[] = [
  Direction.NORTH,
  Direction.EAST,
  Direction.SOUTH,
  Direction.WEST,
];

/**
 * Row/column offsets per direction
 */
export const DIRECTION_OFFSETS: Readonly<
  Record<Direction, { readonly row: number; readonly column: number }>
> = {
  north: { row: -1, column: 0 },
  east: { row: 0, column: 1 },
  south: { row: 1, column: 0 },
  west: { row: 0, column: -1 },
};

const OPPOSITES: Readonly<Record<Direction, Direction>> = {
  north: Direction.SOUTH,
  east: Direction.WEST,
  south: Direction.NORTH,
  west: Direction.EAST,
};

export function opposite(direction: Direction): Direction {
  return OPPOSITES[direction];
}

export function cell(row: number, column: number): Cell {
  return { row, column };
}

export function cellEquals(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.column === b.column;
}

/**
 * Format as `(row,column)`, matching how MazeError messages print cells.
 */
export function cellToString(c: Cell): string {
  return `(${c.row},${c.column})`;
}

/**
 * Per-direction wall presence for one cell.
 * A wall is either the outer boundary or an unlinked interior edge.
 */
export interface Walls {
  readonly north: boolean;
  readonly east: boolean;
  readonly south: boolean;
  readonly west: boolean;
}
