/**
 * Generation API
 *
 * High-level entry points: validate a config, carve a maze, solve it.
 * Failures come back as `Result` values instead of exceptions.
 */

import { performance } from "node:perf_hooks";
import {
  DEFAULT_ALGORITHM,
  Err,
  MazeError,
  type MazeConfig,
  type MazeConfigInput,
  Ok,
  parseMazeConfig,
  Result,
  SeededRandom,
} from "@mazegen/contracts";
import { LinkGraph } from "./core/graph";
import type { Cell } from "./core/grid";
import { computeChecksum } from "./core/hash";
import {
  createBinaryTreeGenerator,
  createSidewinderGenerator,
  type MazeGenerator,
} from "./generators";
import { type PathMap, shortestPath } from "./pathfinding";
import { resolveSeed } from "./seed";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * Generator registry
 */
const generators = new Map<string, MazeGenerator>([
  ["binary-tree", createBinaryTreeGenerator()],
  ["sidewinder", createSidewinderGenerator()],
]);

/**
 * A carved maze plus what produced it.
 */
export interface MazeArtifact {
  readonly config: MazeConfig;
  /** The uint32 the PRNG was seeded with */
  readonly seed: number;
  readonly graph: LinkGraph;
  readonly checksum: string;
  readonly durationMs: number;
}

/**
 * Per-run figures handed to `onMetrics`.
 */
export interface MazeMetrics {
  readonly algorithm: string;
  readonly cells: number;
  readonly links: number;
  readonly deadEnds: number;
  readonly durationMs: number;
}

export interface GenerateOptions {
  /**
   * Skip config validation before generation.
   * Default: false (validation is performed)
   */
  readonly skipValidation?: boolean;
  /** Called once after a successful carve */
  readonly onMetrics?: (metrics: MazeMetrics) => void;
}

function toMazeError(error: unknown): MazeError {
  if (MazeError.isMazeError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return MazeError.generationFailed(message, { cause: error });
}

function lookupGenerator(algorithm: string): Result<MazeGenerator, MazeError> {
  const generator = generators.get(algorithm);
  if (!generator) {
    return Err(MazeError.algorithmNotFound(algorithm, getAvailableAlgorithms()));
  }
  return Ok(generator);
}

/**
 * Validate an untrusted config: schema first, then the algorithm id against
 * the registry.
 */
export function validateConfig(input: unknown): Result<MazeConfig, MazeError> {
  return parseMazeConfig(input).flatMap((config) =>
    lookupGenerator(config.algorithm).map(() => config),
  );
}

/**
 * Carve a maze with the configured algorithm and seed.
 *
 * @example
 * ```typescript
 * const result = generate({ rows: 8, columns: 12, algorithm: "sidewinder", seed: 42 });
 * if (result.success) {
 *   const { graph, checksum } = result.value;
 * }
 * ```
 */
export function generate(
  config: MazeConfigInput,
  options?: GenerateOptions,
): Result<MazeArtifact, MazeError> {
  const checked: Result<MazeConfig, MazeError> = options?.skipValidation
    ? Ok<MazeConfig, MazeError>({
        rows: config.rows,
        columns: config.columns,
        algorithm: config.algorithm ?? DEFAULT_ALGORITHM,
        seed: config.seed,
      })
    : validateConfig(config);

  return checked.flatMap((valid) =>
    lookupGenerator(valid.algorithm).flatMap((generator) =>
      Result.fromThrowable(() => carve(valid, generator, options), toMazeError),
    ),
  );
}

function carve(
  config: MazeConfig,
  generator: MazeGenerator,
  options?: GenerateOptions,
): MazeArtifact {
  const start = performance.now();
  const seed = resolveSeed(config.seed);
  const graph = generator.carve(
    LinkGraph.build(config.rows, config.columns),
    new SeededRandom(seed),
  );
  const durationMs = performance.now() - start;

  options?.onMetrics?.({
    algorithm: generator.id,
    cells: graph.size,
    links: graph.linkCount(),
    deadEnds: graph.deadEnds().length,
    durationMs,
  });

  return {
    config,
    seed,
    graph,
    checksum: computeChecksum(graph),
    durationMs,
  };
}

/**
 * Shortest path between two cells of a carved maze.
 */
export function solve(
  graph: LinkGraph,
  from: Cell,
  to: Cell,
): Result<PathMap, MazeError> {
  return Result.fromThrowable(() => shortestPath(graph, from, to), toMazeError);
}

/**
 * Get available generator algorithms
 */
export function getAvailableAlgorithms(): string[] {
  return [...generators.keys()];
}

export function getGenerator(algorithm: string): MazeGenerator | undefined {
  return generators.get(algorithm);
}

/**
 * Register a custom generator. Replacing an existing id is allowed but warned
 * about outside production.
 */
export function registerGenerator(generator: MazeGenerator): void {
  if (DEV_MODE && generators.has(generator.id)) {
    console.warn(`registerGenerator: replacing existing generator "${generator.id}"`);
  }
  generators.set(generator.id, generator);
}
