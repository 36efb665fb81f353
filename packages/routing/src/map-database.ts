/**
 * Map database: the road graph plus the place-name indexes, with the
 * query surface used by front ends.
 *
 * Built once through `MapDatabaseBuilder`, which receives ingestion
 * events in document order. `build()` finalizes the graph and hands back
 * a read-only `MapDatabase`.
 */

import type {
  DirectionStep,
  EmptyGraphError,
  IngestionSink,
  LocationRecord,
  NodeEvent,
  NoRouteError,
  PathResult,
  Result,
  SearchOptions,
  UnknownVertexError,
  WayEvent,
} from "@streetwise/types";
import { GraphModel, type GraphBuildStats } from "./graph/graph-model.js";
import { NameIndex } from "./names/name-index.js";
import { PrefixIndex } from "./names/prefix-index.js";
import { shortestPath } from "./search/path-finder.js";
import { buildDirections, type DirectionsOptions } from "./directions/directions.js";

/** Size summary of a built map */
export interface MapStats {
  nodes: number;
  directedEdges: number;
  locations: number;
  autocompleteKeys: number;
  build: GraphBuildStats;
}

export class MapDatabaseBuilder implements IngestionSink {
  private readonly graph = new GraphModel();
  private readonly names = new NameIndex();
  private readonly prefixes = new PrefixIndex();
  private built = false;

  node(event: NodeEvent): void {
    this.assertOpen();
    this.graph.addNode(event.id, event.lon, event.lat, event.name);
    if (event.name !== undefined) {
      this.names.add({ id: event.id, lon: event.lon, lat: event.lat, name: event.name });
      this.prefixes.insert(event.name);
    }
  }

  way(event: WayEvent): void {
    this.assertOpen();
    this.graph.addWay(event.nodeIds, event.name);
  }

  /** Finalize the graph and return the read-only database. Callable once. */
  build(): MapDatabase {
    this.assertOpen();
    this.built = true;
    this.graph.finalize();
    return new MapDatabase(this.graph, this.names, this.prefixes);
  }

  private assertOpen(): void {
    if (this.built) throw new Error("MapDatabaseBuilder has already been built");
  }
}

export class MapDatabase {
  constructor(
    readonly graph: GraphModel,
    private readonly names: NameIndex,
    private readonly prefixes: PrefixIndex,
  ) {}

  /**
   * Shortest path between the nodes nearest to two coordinates.
   */
  route(
    startLon: number,
    startLat: number,
    endLon: number,
    endLat: number,
    options: SearchOptions = {},
  ): Result<PathResult, EmptyGraphError | NoRouteError | UnknownVertexError> {
    const start = this.graph.nearestNode(startLon, startLat);
    if (!start.ok) return start;
    const end = this.graph.nearestNode(endLon, endLat);
    if (!end.ok) return end;
    return shortestPath(this.graph, start.value, end.value, options);
  }

  /** Turn-by-turn steps for a node path. */
  directions(
    path: readonly number[],
    options: DirectionsOptions = {},
  ): Result<DirectionStep[], UnknownVertexError> {
    return buildDirections(this.graph, path, options);
  }

  /** Display names starting with the given prefix, sorted. */
  autocomplete(prefix: string): string[] {
    return [...this.prefixes.prefixSearch(prefix)].sort((a, b) => a.localeCompare(b));
  }

  /** Every place whose canonical name matches `name` exactly. */
  locate(name: string): LocationRecord[] {
    return [...this.names.lookup(name)];
  }

  stats(): MapStats {
    return {
      nodes: this.graph.size,
      directedEdges: this.graph.directedEdgeCount,
      locations: this.names.size,
      autocompleteKeys: this.prefixes.size,
      build: { ...this.graph.stats },
    };
  }
}
