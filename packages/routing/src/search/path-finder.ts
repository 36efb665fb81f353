/**
 * A* shortest-path search over the road graph.
 *
 * Priority of a frontier node is its best known road distance from the
 * start plus the great-circle distance to the goal. Straight-line distance
 * never exceeds road distance, so the heuristic is admissible and
 * consistent, and the first time the goal is popped its path is optimal.
 */

import {
  err,
  ok,
  type Coordinate,
  type NodeId,
  type NoRouteError,
  type PathResult,
  type Result,
  type SearchOptions,
  type UnknownVertexError,
} from "@streetwise/types";
import type { GraphModel } from "../graph/graph-model.js";
import { haversineMiles } from "../graph/geo.js";
import { MinPriorityQueue } from "./priority-queue.js";

interface FrontierEntry {
  id: NodeId;
  /** Road distance from the start when this entry was pushed */
  cost: number;
}

/**
 * Mutable state of one search. A new context is created for every call,
 * so concurrent searches over the same graph share nothing.
 */
export class SearchContext {
  readonly frontier = new MinPriorityQueue<FrontierEntry>();
  readonly bestDistance = new Map<NodeId, number>();
  readonly predecessor = new Map<NodeId, NodeId>();
  expansions = 0;

  constructor(
    readonly startId: NodeId,
    readonly goalId: NodeId,
  ) {}

  /** Walk predecessor links back from the goal. */
  reconstructPath(): NodeId[] {
    const path: NodeId[] = [this.goalId];
    let cursor = this.predecessor.get(this.goalId);
    while (cursor !== undefined) {
      path.push(cursor);
      cursor = this.predecessor.get(cursor);
    }
    return path.reverse();
  }
}

/**
 * Find the shortest road path between two graph nodes.
 *
 * Returns `unknown-vertex` when either id is not in the graph and
 * `no-route` when the goal is unreachable or `maxExpansions` runs out.
 */
export function shortestPath(
  graph: GraphModel,
  startId: NodeId,
  goalId: NodeId,
  options: SearchOptions = {},
): Result<PathResult, UnknownVertexError | NoRouteError> {
  const start = graph.getNode(startId);
  if (!start) return err<UnknownVertexError>({ kind: "unknown-vertex", id: startId });
  const goal = graph.getNode(goalId);
  if (!goal) return err<UnknownVertexError>({ kind: "unknown-vertex", id: goalId });

  if (startId === goalId) {
    return ok({ nodeIds: [startId], totalDistanceMiles: 0 });
  }

  const maxExpansions = options.maxExpansions ?? Infinity;
  const ctx = new SearchContext(startId, goalId);
  const goalCoord = goal.coordinate;

  ctx.bestDistance.set(startId, 0);
  ctx.frontier.push({ id: startId, cost: 0 }, haversineMiles(start.coordinate, goalCoord));

  while (ctx.frontier.size > 0) {
    const popped = ctx.frontier.pop();
    if (!popped) break;
    const { id: currentId, cost } = popped.value;

    // Stale entry: a cheaper path to this node was pushed after it
    if (cost > (ctx.bestDistance.get(currentId) ?? Infinity)) continue;

    if (currentId === goalId) {
      return ok({ nodeIds: ctx.reconstructPath(), totalDistanceMiles: cost });
    }

    if (ctx.expansions >= maxExpansions) {
      return err<NoRouteError>({ kind: "no-route", reason: "budget-exhausted" });
    }
    ctx.expansions++;

    const current = graph.getNode(currentId);
    const neighbors = graph.adjacent(currentId);
    if (!current || !neighbors.ok) continue;

    for (const neighborId of neighbors.value) {
      const neighbor = graph.getNode(neighborId);
      if (!neighbor) continue;

      const candidate = cost + haversineMiles(current.coordinate, neighbor.coordinate);
      if (candidate < (ctx.bestDistance.get(neighborId) ?? Infinity)) {
        ctx.bestDistance.set(neighborId, candidate);
        ctx.predecessor.set(neighborId, currentId);
        ctx.frontier.push(
          { id: neighborId, cost: candidate },
          candidate + heuristic(neighbor.coordinate, goalCoord),
        );
      }
    }
  }

  return err<NoRouteError>({ kind: "no-route", reason: "unreachable" });
}

function heuristic(from: Coordinate, goal: Coordinate): number {
  return haversineMiles(from, goal);
}

/** Sum of great-circle edge lengths along a node path, in miles. */
export function pathLength(
  graph: GraphModel,
  nodeIds: readonly NodeId[],
): Result<number, UnknownVertexError> {
  let total = 0;
  for (let i = 1; i < nodeIds.length; i++) {
    const from = nodeIds[i - 1];
    const to = nodeIds[i];
    if (from === undefined || to === undefined) continue;
    const d = graph.distance(from, to);
    if (!d.ok) return d;
    total += d.value;
  }
  return ok(total);
}
