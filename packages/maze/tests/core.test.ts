/**
 * Queue, union-find and hashing primitives
 */

import { SeededRandom } from "@mazegen/contracts";
import { describe, expect, it } from "vitest";
import {
  binaryTree,
  CHECKSUM_VERSION,
  cell,
  computeChecksum,
  FastQueue,
  FNV64Hasher,
  fnv64Hash,
  LinkGraph,
  UnionFind,
} from "../src";

describe("FastQueue", () => {
  it("dequeues in insertion order", () => {
    const queue = FastQueue.from([1, 2, 3]);
    queue.enqueue(4);
    expect(queue.length).toBe(4);
    expect([queue.dequeue(), queue.dequeue(), queue.dequeue()]).toEqual([
      1, 2, 3,
    ]);
    expect(queue.dequeue()).toBe(4);
    expect(queue.isEmpty).toBe(true);
    expect(queue.dequeue()).toBeUndefined();
  });

  it("keeps order across compaction", () => {
    const queue = new FastQueue<number>();
    for (let i = 0; i < 5000; i++) queue.enqueue(i);
    for (let i = 0; i < 3000; i++) expect(queue.dequeue()).toBe(i);
    queue.enqueue(5000);
    expect(queue.length).toBe(2001);
    expect(queue.dequeue()).toBe(3000);
  });
});

describe("UnionFind", () => {
  it("joins sets and reports repeats", () => {
    const sets = new UnionFind(5);
    expect(sets.count).toBe(5);
    expect(sets.union(0, 1)).toBe(true);
    expect(sets.union(2, 3)).toBe(true);
    expect(sets.connected(0, 2)).toBe(false);
    expect(sets.union(1, 3)).toBe(true);
    expect(sets.connected(0, 2)).toBe(true);
    expect(sets.union(0, 3)).toBe(false);
    expect(sets.count).toBe(2);
  });
});

describe("FNV64", () => {
  it("matches the published FNV-1a vectors", () => {
    expect(fnv64Hash(new Uint8Array())).toBe("cbf29ce484222325");
    expect(fnv64Hash(new Uint8Array([0x61]))).toBe("af63dc4c8601ec8c");
  });

  it("hashes int32 values little-endian", () => {
    const viaInt = new FNV64Hasher().updateInt32(0x04030201).digest();
    expect(viaInt).toBe(fnv64Hash(new Uint8Array([1, 2, 3, 4])));
  });
});

describe("computeChecksum", () => {
  it("is versioned and stable for the same maze", () => {
    const a = binaryTree(LinkGraph.build(6, 6), new SeededRandom(10));
    const b = binaryTree(LinkGraph.build(6, 6), new SeededRandom(10));

    expect(computeChecksum(a)).toMatch(
      new RegExp(`^v${CHECKSUM_VERSION}:[0-9a-f]{16}$`),
    );
    expect(computeChecksum(a)).toBe(computeChecksum(b));
  });

  it("changes with the link set or the shape", () => {
    const empty = LinkGraph.build(2, 3);
    const linked = LinkGraph.build(2, 3).link(cell(0, 0), cell(0, 1));

    expect(computeChecksum(empty)).not.toBe(computeChecksum(linked));
    expect(computeChecksum(LinkGraph.build(2, 3))).not.toBe(
      computeChecksum(LinkGraph.build(3, 2)),
    );
  });
});
