/**
 * Overpass API query construction and execution.
 *
 * Generates Overpass QL for routable roads and named places, and fetches
 * results via the overpass-ts client through the tile cache.
 */

import type { BoundingBox } from "@streetwise/types";
import { overpassJson } from "overpass-ts";
import type { OverpassJson, OverpassOptions as OverpassTsOptions } from "overpass-ts";
import { ROUTABLE_HIGHWAYS } from "../osm/types.js";
import { OverpassTileCache } from "./cache.js";

/** Result from fetchOverpassData, includes the area that was fetched */
export interface OverpassResult {
  /** Responses of every tile merged, each element once */
  data: OverpassJson;
  /** Union of the tiles queried; contains the requested box */
  fetchedBbox: BoundingBox;
  /** True when every tile came from the cache */
  fromCache: boolean;
}

/** Options for Overpass API requests */
export interface OverpassOptions {
  /** Overpass API endpoint URL */
  endpoint?: string;
  /** Query timeout in seconds (default: 90) */
  timeout?: number;
  userAgent?: string;
  /** Skip the cache read but still write the fresh response */
  force?: boolean;
  /** Override the cache directory (default: ~/.streetwise/overpass-cache/) */
  cacheDir?: string;
  /** Tile edge in degrees */
  tileSize?: number;
  /** Disable caching entirely */
  noCache?: boolean;
}

export const DEFAULT_OVERPASS_ENDPOINT = "https://overpass-api.de/api/interpreter";
const DEFAULT_TIMEOUT = 90;

/**
 * Build an Overpass QL query for a bbox.
 *
 * Fetches routable highway ways and every node carrying a `name` tag.
 * `out body geom;` inlines way geometry so the way nodes need no
 * second query.
 */
export function buildOverpassQuery(bbox: BoundingBox, timeout: number = DEFAULT_TIMEOUT): string {
  // Overpass bbox order: south, west, north, east
  const bboxStr = `${bbox.minLat},${bbox.minLng},${bbox.maxLat},${bbox.maxLng}`;
  const highwayRegex = `^(${ROUTABLE_HIGHWAYS.join("|")})$`;

  return `[out:json][timeout:${timeout}];
(
  way["highway"~"${highwayRegex}"](${bboxStr});
  node["name"](${bboxStr});
);
out body geom;`;
}

/**
 * Merge tile responses, keeping the first copy of each element.
 * Ways crossing a tile border come back from both tiles.
 */
export function mergeOverpassResponses(first: OverpassJson, rest: readonly OverpassJson[]): OverpassJson {
  const seen = new Set<string>();
  const elements: OverpassJson["elements"] = [];
  for (const response of [first, ...rest]) {
    for (const element of response.elements) {
      const key = `${element.type}/${element.id}`;
      if (seen.has(key)) continue;
      seen.add(key);
      elements.push(element);
    }
  }
  return { ...first, elements };
}

function unionBbox(boxes: readonly BoundingBox[]): BoundingBox {
  return {
    minLat: Math.min(...boxes.map((b) => b.minLat)),
    maxLat: Math.max(...boxes.map((b) => b.maxLat)),
    minLng: Math.min(...boxes.map((b) => b.minLng)),
    maxLng: Math.max(...boxes.map((b) => b.maxLng)),
  };
}

/**
 * Fetch map data from the Overpass API for a bounding box.
 *
 * The request is widened to every cache tile it intersects. Tiles are
 * fetched one after another and their responses merged, so nearby
 * requests share cache entries.
 */
export async function fetchOverpassData(
  bbox: BoundingBox,
  options: OverpassOptions = {}
): Promise<OverpassResult> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const cache = new OverpassTileCache(options.cacheDir, options.tileSize);
  const tiles = cache.tilesFor(bbox);

  const overpassOpts: Partial<OverpassTsOptions> = {
    endpoint: options.endpoint ?? DEFAULT_OVERPASS_ENDPOINT,
  };
  if (options.userAgent) {
    overpassOpts.userAgent = options.userAgent;
  }

  const responses: OverpassJson[] = [];
  let fromCache = true;
  for (const { tile, bbox: tileBox } of tiles) {
    if (!options.noCache && !options.force) {
      const cached = cache.read(tile, timeout);
      if (cached) {
        console.log(`[overpass] Cache hit for tile ${tile.row},${tile.col}`);
        responses.push(cached);
        continue;
      }
    }

    console.log(`[overpass] Fetching tile ${tile.row},${tile.col} from ${overpassOpts.endpoint}`);
    const data = await overpassJson(buildOverpassQuery(tileBox, timeout), overpassOpts);
    fromCache = false;
    if (!options.noCache) {
      cache.write(tile, timeout, data);
    }
    responses.push(data);
  }

  const [first, ...rest] = responses;
  if (!first) throw new Error(`No Overpass tiles cover ${JSON.stringify(bbox)}`);
  return {
    data: mergeOverpassResponses(first, rest),
    fetchedBbox: unionBbox(tiles.map((t) => t.bbox)),
    fromCache,
  };
}
