/**
 * Route results - the output of the path finder.
 */

import type { NodeId } from "./graph.js";

/** An ordered path through the road graph */
export interface PathResult {
  /** Node ids from the start node to the goal node, inclusive */
  nodeIds: NodeId[];
  /** Sum of great-circle edge lengths along the path, in miles */
  totalDistanceMiles: number;
}

/** Options for a single shortest-path search */
export interface SearchOptions {
  /**
   * Upper bound on the number of nodes popped from the frontier.
   * Exceeding it ends the search with a `budget-exhausted` NoRoute.
   */
  maxExpansions?: number;
}
