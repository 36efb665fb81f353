import { parseDirectionsBodySchema, parseRequest } from "../models/requests.js";
import type { ParseDirectionsResponse } from "../models/responses.js";
import type { MapService } from "../services/map.service.js";

export class DirectionsController {
  constructor(private readonly maps: MapService) {}

  /** Turn formatted direction sentences back into steps */
  parse(body: unknown): ParseDirectionsResponse {
    const { lines } = parseRequest(parseDirectionsBodySchema, body);
    return { steps: this.maps.parseDirections(lines) };
  }
}
