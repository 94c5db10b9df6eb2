import type { Cell } from "../core/grid";

/**
 * Read-only per-cell integer overlay for a renderer.
 * Cells without a label return undefined.
 */
export interface CellLabels {
  label(cell: Cell): number | undefined;
}
