import type { DirectionStep, LocationRecord } from "@streetwise/types";
import type { MapStats } from "@streetwise/routing";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  map: MapStats;
}

export interface RouteResponse {
  nodeIds: number[];
  totalDistanceMiles: number;
  directions: DirectionStep[];
  /** One formatted sentence per step */
  text: string[];
}

export interface ParseDirectionsResponse {
  steps: DirectionStep[];
}

export type SearchResponse = { names: string[] } | { locations: LocationRecord[] };

export interface RasterResponse {
  /** Tile file names, rows north to south, columns west to east */
  renderGrid: string[][];
  rasterUlLon: number;
  rasterUlLat: number;
  rasterLrLon: number;
  rasterLrLat: number;
  depth: number;
  querySuccess: boolean;
}
