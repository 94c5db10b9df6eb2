/**
 * Generators module - maze carving algorithms.
 *
 * Each generator links an empty grid into a spanning tree.
 */

export {
  BinaryTreeGenerator,
  binaryTree,
  createBinaryTreeGenerator,
} from "./binary-tree";
export {
  createSidewinderGenerator,
  SidewinderGenerator,
  sidewinder,
} from "./sidewinder";
export { assertUnlinked, type MazeGenerator } from "./types";
