import { z } from "zod";

const UINT32_MAX = 0xffffffff;

/** Largest accepted row or column count. */
export const MAX_DIMENSION = 1000;

export const DEFAULT_ALGORITHM = "binary-tree";

const dimension = (label: string) =>
  z
    .number()
    .int({ error: `${label} must be an integer` })
    .min(1, { error: `${label} must be at least 1` })
    .max(MAX_DIMENSION, { error: `${label} cannot exceed ${MAX_DIMENSION}` });

export const SeedSchema = z.union([
  z
    .number()
    .int({ error: "Numeric seeds must be integers" })
    .min(0, { error: "Numeric seeds must be non-negative" })
    .max(UINT32_MAX, { error: "Numeric seeds must fit in uint32" }),
  z.string().min(1, { error: "String seeds cannot be empty" }),
]);

export const MazeConfigSchema = z.object({
  rows: dimension("Rows"),
  columns: dimension("Columns"),
  algorithm: z
    .string()
    .min(1, { error: "Algorithm cannot be empty" })
    .default(DEFAULT_ALGORITHM),
  seed: SeedSchema,
});

export type MazeSeed = z.infer<typeof SeedSchema>;
export type MazeConfigInput = z.input<typeof MazeConfigSchema>;
export type MazeConfig = z.output<typeof MazeConfigSchema>;
