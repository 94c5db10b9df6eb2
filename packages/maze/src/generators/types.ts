/**
 * Generator contract shared by every carving algorithm.
 */

import { MazeError, type RandomSource } from "@mazegen/contracts";
import type { LinkGraph } from "../core/graph";

/**
 * A carving algorithm.
 *
 * `carve` takes an unlinked graph and links it into a spanning tree:
 * `size - 1` links, every cell reachable, no cycles. The graph is mutated in
 * place and returned. Randomness comes only from `rng`, consumed as a single
 * stream in row-major cell order.
 */
export interface MazeGenerator {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  carve(graph: LinkGraph, rng: RandomSource): LinkGraph;
}

/**
 * @throws {MazeError} GENERATION_FAILED when the graph already has links
 */
export function assertUnlinked(graph: LinkGraph, generatorId: string): void {
  const links = graph.linkCount();
  if (links > 0) {
    throw MazeError.generationFailed(
      `${generatorId} requires an unlinked graph, found ${links} links`,
      { generator: generatorId, links },
    );
  }
}
