export { UnionFind } from "./union-find";
