import type { z } from "zod";
import { randomSeed } from "../random/system-seed";
import {
  DEFAULT_ALGORITHM,
  type MazeConfig,
  MazeConfigSchema,
  type MazeSeed,
} from "../schemas/config";
import { MazeError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

export interface BuildConfigInput {
  readonly rows?: number;
  readonly columns?: number;
  readonly algorithm?: string;
  readonly seed?: MazeSeed;
}

const DEFAULT_ROWS = 10;
const DEFAULT_COLUMNS = 10;

/**
 * Flatten zod issues into one readable line per problem.
 */
export function formatIssues(issues: z.ZodError["issues"]): string[] {
  return issues.map((issue) => {
    const path = issue.path.map(String).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Parse an untrusted config object.
 */
export function parseMazeConfig(input: unknown): Result<MazeConfig, MazeError> {
  const parsed = MazeConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    return Err(
      MazeError.configInvalid(`Invalid configuration: ${issues.join("; ")}`, {
        issues,
      }),
    );
  }
  return Ok(parsed.data);
}

/**
 * Fill in defaults for a partial config, then validate it.
 * A missing seed is drawn from the system CSPRNG.
 */
export function buildMazeConfig(
  input: BuildConfigInput = {},
): Result<MazeConfig, MazeError> {
  return parseMazeConfig({
    rows: input.rows ?? DEFAULT_ROWS,
    columns: input.columns ?? DEFAULT_COLUMNS,
    algorithm: input.algorithm ?? DEFAULT_ALGORITHM,
    seed: input.seed ?? randomSeed(),
  });
}
