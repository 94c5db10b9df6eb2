export { FastQueue } from "./fast-queue";
