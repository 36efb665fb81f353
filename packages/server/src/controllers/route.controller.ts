import { parseRequest, routeQuerySchema } from "../models/requests.js";
import type { RouteResponse } from "../models/responses.js";
import type { MapService } from "../services/map.service.js";

export class RouteController {
  constructor(private readonly maps: MapService) {}

  /** Shortest route between two points, with directions */
  getRoute(query: unknown): RouteResponse {
    return this.maps.route(parseRequest(routeQuerySchema, query));
  }
}
