import type { MapDatabase, MapStats } from "@streetwise/routing";
import { formatDirection, parseDirection } from "@streetwise/routing";
import type { DirectionStep, SearchOptions } from "@streetwise/types";
import { httpErrorFor } from "../middleware/error-handler.js";
import type { RouteQuery } from "../models/requests.js";
import type { RouteResponse, SearchResponse } from "../models/responses.js";

export interface MapServiceOptions {
  /** Expansion bound applied to every route search */
  maxRouteExpansions?: number;
}

/**
 * Query front for a loaded map. Failed queries surface as `HttpError`s
 * with the status the API reports for them.
 */
export class MapService {
  constructor(
    private readonly map: MapDatabase,
    private readonly options: MapServiceOptions = {},
  ) {}

  route(query: RouteQuery): RouteResponse {
    const searchOptions: SearchOptions = {};
    if (this.options.maxRouteExpansions !== undefined) {
      searchOptions.maxExpansions = this.options.maxRouteExpansions;
    }

    const path = this.map.route(query.start_lon, query.start_lat, query.end_lon, query.end_lat, searchOptions);
    if (!path.ok) throw httpErrorFor(path.error);

    const directions = this.map.directions(path.value.nodeIds);
    if (!directions.ok) throw httpErrorFor(directions.error);

    console.log(
      `[route] ${path.value.nodeIds.length} nodes, ${path.value.totalDistanceMiles.toFixed(3)} miles, ` +
        `${directions.value.length} steps`,
    );
    return {
      nodeIds: path.value.nodeIds,
      totalDistanceMiles: path.value.totalDistanceMiles,
      directions: directions.value,
      text: directions.value.map(formatDirection),
    };
  }

  search(term: string, full: boolean): SearchResponse {
    return full ? { locations: this.map.locate(term) } : { names: this.map.autocomplete(term) };
  }

  /** Parse formatted direction lines; the first bad line fails the whole request. */
  parseDirections(lines: readonly string[]): DirectionStep[] {
    const steps: DirectionStep[] = [];
    for (const line of lines) {
      const parsed = parseDirection(line);
      if (!parsed.ok) throw httpErrorFor(parsed.error);
      steps.push(parsed.value);
    }
    return steps;
  }

  stats(): MapStats {
    return this.map.stats();
  }
}
