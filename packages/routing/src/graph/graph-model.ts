/**
 * Road graph built from OSM nodes and ways.
 *
 * Nodes are inserted first, then ways add symmetric edges between each
 * consecutive pair of their node ids. Once all events are in, `finalize()`
 * prunes nodes that no way connected and seals the graph; every query
 * after that point is read-only.
 */

import {
  UNKNOWN_ROAD,
  err,
  ok,
  type Coordinate,
  type EmptyGraphError,
  type GraphNode,
  type NodeId,
  type Result,
  type UnknownVertexError,
} from "@streetwise/types";
import { haversineMiles, initialBearing } from "./geo.js";

/** Thrown when the graph is mutated after `finalize()` */
export class GraphSealedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: graph has already been finalized`);
    this.name = "GraphSealedError";
  }
}

/** Counters collected while building the graph */
export interface GraphBuildStats {
  /** Ways delivered to `addWay` */
  waysProcessed: number;
  /** Ways with fewer than two node ids */
  waysSkipped: number;
  /** Consecutive pairs dropped because an endpoint was unknown */
  pairsSkipped: number;
  /** Nodes removed by `finalize()` for having no edges */
  nodesPruned: number;
}

export class GraphModel {
  private readonly nodes = new Map<NodeId, GraphNode>();
  /** nodeId -> neighbor ids, insertion order */
  private readonly adjacency = new Map<NodeId, NodeId[]>();
  /** from -> to -> name of the way that last created the edge */
  private readonly edgeWays = new Map<NodeId, Map<NodeId, string>>();
  private finalized = false;
  private edgeCount = 0;

  private readonly buildStats: GraphBuildStats = {
    waysProcessed: 0,
    waysSkipped: 0,
    pairsSkipped: 0,
    nodesPruned: 0,
  };

  /** Insert or overwrite the node at `id`. */
  addNode(id: NodeId, lon: number, lat: number, name?: string): void {
    if (this.finalized) throw new GraphSealedError("add node");
    const node: GraphNode = { id, coordinate: { lat, lng: lon } };
    if (name !== undefined) node.name = name;
    this.nodes.set(id, node);
    if (!this.adjacency.has(id)) this.adjacency.set(id, []);
  }

  /**
   * Connect consecutive node ids with bidirectional edges and stamp the
   * way name on every existing endpoint touched. Pairs with an unknown
   * endpoint add no edge, but their known endpoint is still stamped.
   */
  addWay(nodeIds: readonly NodeId[], wayName: string): void {
    if (this.finalized) throw new GraphSealedError("add way");
    this.buildStats.waysProcessed++;
    if (nodeIds.length < 2) {
      this.buildStats.waysSkipped++;
      return;
    }

    const name = wayName === "" ? UNKNOWN_ROAD : wayName;
    for (let i = 1; i < nodeIds.length; i++) {
      const from = nodeIds[i - 1];
      const to = nodeIds[i];
      if (from === undefined || to === undefined) continue;
      const fromNode = this.nodes.get(from);
      const toNode = this.nodes.get(to);
      if (fromNode) fromNode.wayName = name;
      if (toNode) toNode.wayName = name;
      if (!fromNode || !toNode) {
        this.buildStats.pairsSkipped++;
        continue;
      }
      this.addEdge(from, to, name);
      this.addEdge(to, from, name);
    }
  }

  /** Remove every node without edges and seal the graph. */
  finalize(): void {
    if (this.finalized) throw new GraphSealedError("finalize");
    for (const [id, neighbors] of this.adjacency) {
      if (neighbors.length === 0) {
        this.adjacency.delete(id);
        this.nodes.delete(id);
        this.buildStats.nodesPruned++;
      }
    }
    this.finalized = true;
  }

  /** Number of nodes currently in the graph */
  get size(): number {
    return this.nodes.size;
  }

  /** Number of directed edges (each way segment counts twice) */
  get directedEdgeCount(): number {
    return this.edgeCount;
  }

  get stats(): Readonly<GraphBuildStats> {
    return this.buildStats;
  }

  hasNode(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  getNode(id: NodeId): GraphNode | undefined {
    return this.nodes.get(id);
  }

  vertices(): IterableIterator<NodeId> {
    return this.nodes.keys();
  }

  /** Great-circle distance between two nodes in miles. */
  distance(a: NodeId, b: NodeId): Result<number, UnknownVertexError> {
    const from = this.nodes.get(a);
    if (!from) return err(unknownVertex(a));
    const to = this.nodes.get(b);
    if (!to) return err(unknownVertex(b));
    return ok(haversineMiles(from.coordinate, to.coordinate));
  }

  /** Initial bearing from `a` toward `b` in degrees, in (-180, 180]. */
  bearing(a: NodeId, b: NodeId): Result<number, UnknownVertexError> {
    const from = this.nodes.get(a);
    if (!from) return err(unknownVertex(a));
    const to = this.nodes.get(b);
    if (!to) return err(unknownVertex(b));
    return ok(initialBearing(from.coordinate, to.coordinate));
  }

  /**
   * Node closest to the given point by great-circle distance.
   * Equidistant candidates resolve to the lowest id.
   *
   * @throws RangeError if either coordinate is not a finite number
   */
  nearestNode(lon: number, lat: number): Result<NodeId, EmptyGraphError> {
    if (!Number.isFinite(lon) || !Number.isFinite(lat)) {
      throw new RangeError(`nearestNode needs finite coordinates, got (${lon}, ${lat})`);
    }
    const point: Coordinate = { lat, lng: lon };
    let bestId: NodeId | undefined;
    let bestDistance = Infinity;

    for (const [id, node] of this.nodes) {
      const d = haversineMiles(point, node.coordinate);
      if (d < bestDistance || (d === bestDistance && bestId !== undefined && id < bestId)) {
        bestDistance = d;
        bestId = id;
      }
    }

    return bestId === undefined ? err<EmptyGraphError>({ kind: "empty-graph" }) : ok(bestId);
  }

  /** Neighbor ids in insertion order; duplicates appear if a way revisits a node. */
  adjacent(id: NodeId): Result<readonly NodeId[], UnknownVertexError> {
    const neighbors = this.adjacency.get(id);
    return neighbors ? ok(neighbors) : err(unknownVertex(id));
  }

  /** Name of the last way stamped on the node, or the unknown-road sentinel. */
  wayName(id: NodeId): Result<string, UnknownVertexError> {
    const node = this.nodes.get(id);
    if (!node) return err(unknownVertex(id));
    return ok(node.wayName ?? UNKNOWN_ROAD);
  }

  /** Name of the way that last created the edge `from -> to`, if that edge exists. */
  edgeWayName(from: NodeId, to: NodeId): string | undefined {
    return this.edgeWays.get(from)?.get(to);
  }

  private addEdge(from: NodeId, to: NodeId, name: string): void {
    const neighbors = this.adjacency.get(from);
    if (!neighbors) return;
    neighbors.push(to);
    this.edgeCount++;

    let ways = this.edgeWays.get(from);
    if (!ways) {
      ways = new Map();
      this.edgeWays.set(from, ways);
    }
    ways.set(to, name);
  }
}

function unknownVertex(id: NodeId): UnknownVertexError {
  return { kind: "unknown-vertex", id };
}
