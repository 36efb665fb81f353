import { parseRequest, searchQuerySchema } from "../models/requests.js";
import type { SearchResponse } from "../models/responses.js";
import type { MapService } from "../services/map.service.js";

export class SearchController {
  constructor(private readonly maps: MapService) {}

  /** Autocomplete by prefix, or exact locations with `full=true` */
  search(query: unknown): SearchResponse {
    const { term, full } = parseRequest(searchQuerySchema, query);
    return this.maps.search(term, full);
  }
}
