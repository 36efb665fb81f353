import { parseRequest, rasterQuerySchema } from "../models/requests.js";
import type { RasterResponse } from "../models/responses.js";
import type { RasterService } from "../services/raster.service.js";

export class RasterController {
  constructor(private readonly raster: RasterService) {}

  getRaster(query: unknown): RasterResponse {
    return this.raster.getMapRaster(parseRequest(rasterQuerySchema, query));
  }
}
