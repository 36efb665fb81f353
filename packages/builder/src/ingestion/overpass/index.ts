export {
  buildOverpassQuery,
  fetchOverpassData,
  mergeOverpassResponses,
  DEFAULT_OVERPASS_ENDPOINT,
  type OverpassOptions,
  type OverpassResult,
} from "./query.js";
export { parseOverpassResponse } from "./parser.js";
export {
  DEFAULT_TILE_SIZE,
  OverpassTileCache,
  defaultCacheDir,
  tileBbox,
  tileCacheKey,
  tileForPoint,
  type TileCoord,
} from "./cache.js";
