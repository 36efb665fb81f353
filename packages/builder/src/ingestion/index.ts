/**
 * Data ingestion module.
 *
 * Streams OSM elements into a `MapDatabaseBuilder` as node and way
 * events and returns the built database.
 *
 * Pipeline:
 * OSM PBF / Overpass API -> OsmNode/OsmWay stream -> MapDatabaseBuilder -> MapDatabase
 */

import type { BoundingBox } from "@streetwise/types";
import { MapDatabaseBuilder, type MapDatabase, type MapStats } from "@streetwise/routing";
import { parseOsmPbf } from "./osm/parser.js";
import { extractName, extractWayName } from "./osm/tag-extractors.js";
import { isRoutableHighway, type OsmElement } from "./osm/types.js";
import { fetchOverpassData, type OverpassOptions } from "./overpass/query.js";
import { parseOverpassResponse } from "./overpass/parser.js";

/** Counts gathered while streaming elements into the builder */
export interface IngestionStats {
  nodesRead: number;
  waysRead: number;
  /** Ways dropped for a non-routable highway tag or fewer than two refs */
  waysSkipped: number;
  ingestionTimeMs: number;
  map: MapStats;
}

export interface IngestionResult {
  database: MapDatabase;
  stats: IngestionStats;
}

/**
 * Deliver OSM elements to a builder in stream order and build it.
 *
 * Nodes become node events carrying their `name` tag, if any. Routable
 * ways become way events named by `extractWayName`. A way arriving
 * before its nodes loses those segments, as the graph drops pairs with
 * unknown endpoints.
 */
export async function ingestOsm(
  elements: AsyncIterable<OsmElement> | Iterable<OsmElement>,
  builder: MapDatabaseBuilder = new MapDatabaseBuilder()
): Promise<IngestionResult> {
  const startTime = Date.now();
  let nodesRead = 0;
  let waysRead = 0;
  let waysSkipped = 0;

  for await (const element of elements) {
    if (element.type === "node") {
      nodesRead++;
      const name = extractName(element.tags);
      builder.node(
        name === undefined
          ? { id: element.id, lon: element.lon, lat: element.lat }
          : { id: element.id, lon: element.lon, lat: element.lat, name }
      );
      continue;
    }

    waysRead++;
    if (element.refs.length < 2 || !isRoutableHighway(element.tags?.["highway"])) {
      waysSkipped++;
      continue;
    }
    builder.way({ nodeIds: element.refs, name: extractWayName(element.tags) });
  }

  const database = builder.build();
  const stats: IngestionStats = {
    nodesRead,
    waysRead,
    waysSkipped,
    ingestionTimeMs: Date.now() - startTime,
    map: database.stats(),
  };

  console.log(
    `[ingest] ${stats.map.nodes} nodes, ${stats.map.directedEdges} directed edges, ` +
      `${stats.map.locations} named places in ${stats.ingestionTimeMs}ms ` +
      `(${waysSkipped} ways skipped, ${stats.map.build.nodesPruned} nodes pruned)`
  );
  return { database, stats };
}

/**
 * Build a map database from a local `.osm.pbf` extract.
 */
export async function loadMapFromPbf(pbfPath: string): Promise<IngestionResult> {
  console.log(`[ingest] Reading ${pbfPath}`);
  return ingestOsm(parseOsmPbf(pbfPath));
}

/**
 * Build a map database for a bounding box from the Overpass API.
 *
 * The fetched area is every cache tile the box intersects, so the map
 * covers `bbox` and may extend beyond it.
 */
export async function loadMapFromOverpass(
  bbox: BoundingBox,
  options?: OverpassOptions
): Promise<IngestionResult> {
  const { data } = await fetchOverpassData(bbox, options);
  return ingestOsm(parseOverpassResponse(data));
}
