/**
 * Maze Checksum
 *
 * Deterministic fingerprint of a carved maze, used to confirm that the same
 * config and seed reproduce the same link set.
 *
 * Format: "v{version}:{16 hex chars}".
 */

import type { LinkGraph } from "../graph/link-graph";
import { FNV64Hasher } from "./fnv64";

/**
 * Bump when the hashed data or its layout changes.
 */
export const CHECKSUM_VERSION = 1;

/**
 * Hash the dimensions followed by every cell's link bits in row-major order.
 */
export function computeChecksum(graph: LinkGraph): string {
  const hash = new FNV64Hasher()
    .updateInt32(graph.rows)
    .updateInt32(graph.columns)
    .updateBytes(graph.linkMasks())
    .digest();
  return `v${CHECKSUM_VERSION}:${hash}`;
}
