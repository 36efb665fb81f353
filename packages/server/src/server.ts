import { loadMapFromOverpass, loadMapFromPbf } from "@streetwise/builder";
import { MapDatabaseBuilder, type MapDatabase } from "@streetwise/routing";
import { createApp } from "./app.js";
import { loadRasterConfig, loadServerConfig } from "./config.js";

const config = loadServerConfig();
const raster = loadRasterConfig();

/**
 * A local extract wins; otherwise the raster root box is fetched from
 * Overpass when an endpoint is configured.
 */
async function loadMap(): Promise<MapDatabase> {
  if (config.MAP_PBF_PATH !== undefined) {
    const { database } = await loadMapFromPbf(config.MAP_PBF_PATH);
    return database;
  }
  if (config.OVERPASS_ENDPOINT !== undefined) {
    const { database } = await loadMapFromOverpass(
      { minLat: raster.rootLrLat, maxLat: raster.rootUlLat, minLng: raster.rootUlLon, maxLng: raster.rootLrLon },
      { endpoint: config.OVERPASS_ENDPOINT },
    );
    return database;
  }
  console.warn("[server] Neither MAP_PBF_PATH nor OVERPASS_ENDPOINT is set; serving an empty map");
  return new MapDatabaseBuilder().build();
}

const map = await loadMap();
const app = createApp(map, {
  raster,
  ...(config.MAX_ROUTE_EXPANSIONS === undefined ? {} : { maxRouteExpansions: config.MAX_ROUTE_EXPANSIONS }),
});

app.listen(config.PORT, () => {
  console.log(`\n[server] Streetwise API running at http://localhost:${config.PORT}\n`);
});
