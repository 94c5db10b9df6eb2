/**
 * Graph module - the linked maze graph built on a grid.
 */

export { LinkGraph } from "./link-graph";
