import express from "express";
import cors from "cors";
import type { MapDatabase } from "@streetwise/routing";
import { loadRasterConfig, type RasterConfig } from "./config.js";
import { DirectionsController } from "./controllers/directions.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { RasterController } from "./controllers/raster.controller.js";
import { RouteController } from "./controllers/route.controller.js";
import { SearchController } from "./controllers/search.controller.js";
import { errorHandler } from "./middleware/error-handler.js";
import { registerRoutes, type Controllers } from "./routes.js";
import { MapService } from "./services/map.service.js";
import { RasterService } from "./services/raster.service.js";

export interface AppOptions {
  /** Defaults to configs/raster.json */
  raster?: RasterConfig;
  maxRouteExpansions?: number;
}

export function createControllers(map: MapDatabase, options: AppOptions = {}): Controllers {
  const maps = new MapService(
    map,
    options.maxRouteExpansions === undefined ? {} : { maxRouteExpansions: options.maxRouteExpansions },
  );
  const raster = new RasterService(options.raster ?? loadRasterConfig());
  return {
    health: new HealthController(maps),
    route: new RouteController(maps),
    directions: new DirectionsController(maps),
    search: new SearchController(maps),
    raster: new RasterController(raster),
  };
}

export function createApp(map: MapDatabase, options: AppOptions = {}): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  registerRoutes(app, createControllers(map, options));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
