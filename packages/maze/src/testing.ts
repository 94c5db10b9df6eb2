/**
 * Testing utilities for maze generation.
 * Kept apart from the validation module because it depends on the generation API.
 */

import type { MazeConfigInput } from "@mazegen/contracts";
import { generate } from "./api";

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly config: MazeConfigInput,
  ) {
    super(
      `Non-deterministic generation detected: produced ${checksums.length} different checksums for the same seed`,
    );
    this.name = "DeterminismViolationError";
  }
}

/**
 * Generate the same config several times and require identical checksums.
 *
 * @throws {DeterminismViolationError} If runs disagree
 *
 * @example
 * ```typescript
 * it("sidewinder is deterministic", () => {
 *   assertDeterministic({ rows: 20, columns: 20, algorithm: "sidewinder", seed: 7 });
 * });
 * ```
 */
export function assertDeterministic(
  config: MazeConfigInput,
  runs: number = 3,
): void {
  const checksums: string[] = [];

  for (let i = 0; i < runs; i++) {
    const result = generate(config, { skipValidation: i > 0 });
    if (!result.success) {
      throw new Error(
        `Generation failed on run ${i + 1}: ${result.error.message}`,
      );
    }
    checksums.push(result.value.checksum);
  }

  const uniqueChecksums = [...new Set(checksums)];
  if (uniqueChecksums.length > 1) {
    throw new DeterminismViolationError(uniqueChecksums, config);
  }
}
