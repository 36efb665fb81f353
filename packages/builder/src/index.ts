/**
 * @streetwise/builder
 *
 * Loads OpenStreetMap data into a map database.
 *
 * Sources:
 * 1. A local OSM PBF extract, streamed in two passes
 * 2. The Overpass API for a bounding box, cached on disk by tile
 */

// Ingestion
export {
  ingestOsm,
  loadMapFromPbf,
  loadMapFromOverpass,
  type IngestionResult,
  type IngestionStats,
} from "./ingestion/index.js";

// OSM parsing
export {
  parseOsmPbf,
  extractName,
  extractWayName,
  type OsmNode,
  type OsmWay,
  type OsmElement,
  type OsmTags,
  type RoutableHighway,
  ROUTABLE_HIGHWAYS,
  isRoutableHighway,
} from "./ingestion/osm/index.js";

// Overpass API
export {
  buildOverpassQuery,
  fetchOverpassData,
  parseOverpassResponse,
  DEFAULT_OVERPASS_ENDPOINT,
  OverpassTileCache,
  DEFAULT_TILE_SIZE,
  defaultCacheDir,
  tileBbox,
  tileCacheKey,
  tileForPoint,
  type OverpassOptions,
  type OverpassResult,
  type TileCoord,
} from "./ingestion/overpass/index.js";
