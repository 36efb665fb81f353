export { shortestPath, pathLength, SearchContext } from "./path-finder.js";
export { MinPriorityQueue } from "./priority-queue.js";
