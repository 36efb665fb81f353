import type { Express, Request, RequestHandler } from "express";
import type { DirectionsController } from "./controllers/directions.controller.js";
import type { HealthController } from "./controllers/health.controller.js";
import type { RasterController } from "./controllers/raster.controller.js";
import type { RouteController } from "./controllers/route.controller.js";
import type { SearchController } from "./controllers/search.controller.js";

export interface Controllers {
  health: HealthController;
  route: RouteController;
  directions: DirectionsController;
  search: SearchController;
  raster: RasterController;
}

/** Respond with the handler's return value as JSON; anything thrown goes to the error handler. */
function json(handler: (req: Request) => unknown): RequestHandler {
  return (req, res, next) => {
    try {
      res.json(handler(req));
    } catch (err) {
      next(err);
    }
  };
}

export function registerRoutes(app: Express, controllers: Controllers): void {
  app.get("/health", json(() => controllers.health.getHealth()));
  app.get("/route", json((req) => controllers.route.getRoute(req.query)));
  app.post("/directions/parse", json((req) => controllers.directions.parse(req.body)));
  app.get("/search", json((req) => controllers.search.search(req.query)));
  app.get("/raster", json((req) => controllers.raster.getRaster(req.query)));
}
