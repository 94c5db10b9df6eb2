/**
 * Grid unit tests
 */

import { describe, expect, it } from "vitest";
import { MazeError } from "@mazegen/contracts";
import {
  cell,
  cellEquals,
  cellToString,
  DIRECTIONS_4,
  Grid,
  opposite,
} from "../src";

describe("Grid", () => {
  describe("construction", () => {
    it("keeps its dimensions", () => {
      const grid = new Grid(3, 5);
      expect(grid.rows).toBe(3);
      expect(grid.columns).toBe(5);
      expect(grid.size).toBe(15);
    });

    it("rejects non-positive or fractional dimensions", () => {
      for (const [rows, columns] of [
        [0, 3],
        [3, -1],
        [2.5, 2],
      ] as const) {
        expect(() => new Grid(rows, columns)).toThrow(
          `Invalid grid dimensions: ${rows}x${columns}`,
        );
      }
    });
  });

  describe("neighbor", () => {
    const grid = new Grid(3, 3);

    it("returns none past the boundary", () => {
      expect(grid.neighbor(cell(0, 0), "north")).toBeUndefined();
      expect(grid.neighbor(cell(0, 0), "west")).toBeUndefined();
      expect(grid.neighbor(cell(2, 2), "east")).toBeUndefined();
      expect(grid.neighbor(cell(2, 2), "south")).toBeUndefined();
    });

    it("follows north = row - 1, east = column + 1", () => {
      expect(grid.neighbor(cell(0, 0), "east")).toEqual(cell(0, 1));
      expect(grid.neighbor(cell(1, 1), "north")).toEqual(cell(0, 1));
      expect(grid.neighbor(cell(1, 1), "south")).toEqual(cell(2, 1));
      expect(grid.neighbor(cell(1, 1), "west")).toEqual(cell(1, 0));
    });

    it("is undone by the opposite direction", () => {
      for (const c of grid.allCells()) {
        for (const direction of DIRECTIONS_4) {
          const next = grid.neighbor(c, direction);
          if (!next) continue;
          expect(grid.neighbor(next, opposite(direction))).toEqual(c);
        }
      }
    });

    it("has no neighbors for cells outside the grid", () => {
      expect(grid.neighbor(cell(-1, 0), "south")).toBeUndefined();
      expect(grid.neighbor(cell(0, 3), "west")).toBeUndefined();
    });
  });

  describe("allCells", () => {
    it("lists cells in row-major order", () => {
      expect(new Grid(2, 3).allCells()).toEqual([
        cell(0, 0),
        cell(0, 1),
        cell(0, 2),
        cell(1, 0),
        cell(1, 1),
        cell(1, 2),
      ]);
    });
  });

  describe("indexing", () => {
    it("round-trips arena indices", () => {
      const grid = new Grid(4, 7);
      grid.allCells().forEach((c, index) => {
        expect(grid.indexOf(c)).toBe(index);
        expect(grid.cellAt(index)).toEqual(c);
      });
    });

    it("contains only in-range integer coordinates", () => {
      const grid = new Grid(2, 2);
      expect(grid.contains(cell(1, 1))).toBe(true);
      expect(grid.contains(cell(2, 0))).toBe(false);
      expect(grid.contains(cell(0, -1))).toBe(false);
      expect(grid.contains(cell(0.5, 0))).toBe(false);
    });

    it("randomCell draws from the arena", () => {
      const grid = new Grid(2, 3);
      expect(grid.randomCell({ next: () => 0 })).toEqual(cell(0, 0));
      expect(grid.randomCell({ next: () => 0.99 })).toEqual(cell(1, 2));
    });
  });
});

describe("cell helpers", () => {
  it("compares cells by value", () => {
    expect(cellEquals(cell(2, 3), { row: 2, column: 3 })).toBe(true);
    expect(cellEquals(cell(2, 3), cell(3, 2))).toBe(false);
  });

  it("formats cells as error messages print them", () => {
    expect(cellToString(cell(4, 7))).toBe("(4,7)");
    expect(MazeError.unreachable(cell(0, 0), cell(4, 7)).message).toBe(
      `No path from ${cellToString(cell(0, 0))} to ${cellToString(cell(4, 7))}`,
    );
  });
});
