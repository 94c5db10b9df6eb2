export { computeStats, type MazeStats } from "./compute-stats";
export * from "./result-types";
export {
  type CheckResult,
  checkAcyclic,
  checkConnectivity,
  checkLinkCount,
  validateMaze,
} from "./validate-maze";
