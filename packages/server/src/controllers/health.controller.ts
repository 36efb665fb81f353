import type { HealthResponse } from "../models/responses.js";
import type { MapService } from "../services/map.service.js";

export class HealthController {
  constructor(private readonly maps: MapService) {}

  /** Health check with map statistics */
  getHealth(): HealthResponse {
    return {
      status: "ok",
      uptime: process.uptime(),
      map: this.maps.stats(),
    };
  }
}
