/**
 * Error codes for maze operations.
 */
export type MazeErrorCode =
  | "INVALID_LINK"
  | "UNREACHABLE"
  | "CONFIG_INVALID"
  | "ALGORITHM_NOT_FOUND"
  | "GENERATION_FAILED";

/**
 * A grid coordinate as carried in error details.
 * Structurally identical to the maze package's `Cell`.
 */
export interface CellRef {
  readonly row: number;
  readonly column: number;
}

function formatCell(cell: CellRef): string {
  return `(${cell.row},${cell.column})`;
}

/**
 * Unified error type for all maze operations.
 *
 * @example
 * ```typescript
 * throw MazeError.invalidLink({ row: 0, column: 0 }, { row: 1, column: 1 });
 * // MazeError: Cannot link (0,0) to (1,1): cells are not neighbors
 * ```
 */
export class MazeError extends Error {
  override readonly name = "MazeError";

  constructor(
    public readonly code: MazeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MazeError);
    }
  }

  /**
   * Link requested between two cells that are not registered neighbors.
   */
  static invalidLink(from: CellRef, to: CellRef): MazeError {
    return new MazeError(
      "INVALID_LINK",
      `Cannot link ${formatCell(from)} to ${formatCell(to)}: cells are not neighbors`,
      { from, to },
    );
  }

  /**
   * No linked path exists between the two endpoints.
   */
  static unreachable(from: CellRef, to: CellRef): MazeError {
    return new MazeError(
      "UNREACHABLE",
      `No path from ${formatCell(from)} to ${formatCell(to)}`,
      { from, to },
    );
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("CONFIG_INVALID", message, details);
  }

  static algorithmNotFound(algorithm: string, available: string[]): MazeError {
    return new MazeError(
      "ALGORITHM_NOT_FOUND",
      `Unknown algorithm: ${algorithm}`,
      { algorithm, available },
    );
  }

  static generationFailed(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("GENERATION_FAILED", message, details);
  }

  /**
   * Check if an unknown error is a MazeError.
   */
  static isMazeError(error: unknown): error is MazeError {
    return error instanceof MazeError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: MazeErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
