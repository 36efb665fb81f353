/**
 * Tile selection for the map view.
 *
 * The tile set is a quadtree over a fixed root box: depth d splits the
 * root into 2^d × 2^d tiles of `tileSize` pixels each. A query picks the
 * coarsest depth fine enough for its viewport, then every tile at that
 * depth that intersects the query box.
 */

import type { RasterConfig } from "../config.js";
import type { RasterQuery } from "../models/requests.js";
import type { RasterResponse } from "../models/responses.js";

const FAILED: RasterResponse = {
  renderGrid: [],
  rasterUlLon: 0,
  rasterUlLat: 0,
  rasterLrLon: 0,
  rasterLrLat: 0,
  depth: 0,
  querySuccess: false,
};

export class RasterService {
  constructor(private readonly config: RasterConfig) {}

  /** Longitude spanned by one pixel of a tile at `depth` */
  lonDppAt(depth: number): number {
    const { rootLrLon, rootUlLon, tileSize } = this.config;
    return (rootLrLon - rootUlLon) / (tileSize * 2 ** depth);
  }

  /** Coarsest depth whose lonDPP does not exceed `lonDpp`; the deepest level otherwise */
  depthFor(lonDpp: number): number {
    for (let depth = 0; depth <= this.config.maxDepth; depth++) {
      if (this.lonDppAt(depth) <= lonDpp) return depth;
    }
    return this.config.maxDepth;
  }

  getMapRaster(query: RasterQuery): RasterResponse {
    const { rootUlLon, rootUlLat, rootLrLon, rootLrLat } = this.config;
    const inverted = query.ullon >= query.lrlon || query.ullat <= query.lrlat;
    const outside =
      query.lrlon <= rootUlLon ||
      query.ullon >= rootLrLon ||
      query.lrlat >= rootUlLat ||
      query.ullat <= rootLrLat;
    if (inverted || outside) return { ...FAILED, renderGrid: [] };

    const depth = this.depthFor((query.lrlon - query.ullon) / query.w);
    const tilesPerSide = 2 ** depth;
    const tileWidth = (rootLrLon - rootUlLon) / tilesPerSide;
    const tileHeight = (rootUlLat - rootLrLat) / tilesPerSide;
    const clamp = (i: number) => Math.min(Math.max(i, 0), tilesPerSide - 1);

    // The lower-right edge is exclusive so a box ending on a tile border
    // does not pull in the next tile.
    const x0 = clamp(Math.floor((query.ullon - rootUlLon) / tileWidth));
    const x1 = Math.max(x0, clamp(Math.ceil((query.lrlon - rootUlLon) / tileWidth) - 1));
    const y0 = clamp(Math.floor((rootUlLat - query.ullat) / tileHeight));
    const y1 = Math.max(y0, clamp(Math.ceil((rootUlLat - query.lrlat) / tileHeight) - 1));

    const renderGrid: string[][] = [];
    for (let y = y0; y <= y1; y++) {
      const row: string[] = [];
      for (let x = x0; x <= x1; x++) row.push(`d${depth}_x${x}_y${y}.png`);
      renderGrid.push(row);
    }

    return {
      renderGrid,
      rasterUlLon: rootUlLon + x0 * tileWidth,
      rasterUlLat: rootUlLat - y0 * tileHeight,
      rasterLrLon: rootUlLon + (x1 + 1) * tileWidth,
      rasterLrLat: rootUlLat - (y1 + 1) * tileHeight,
      depth,
      querySuccess: true,
    };
  }
}
