/**
 * Disk cache for Overpass API responses.
 *
 * The world is cut into square tiles on a fixed degree grid. A request is
 * widened to every tile it intersects, and each tile's response is stored
 * under a hash of its grid position, so repeated loads of the same area are
 * served from disk.
 *
 * Default location: ~/.streetwise/overpass-cache/
 */

import { createHash } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { BoundingBox } from "@streetwise/types";
import type { OverpassJson } from "overpass-ts";

/** Tile edge in degrees; 0.1° is about 7 miles north-south */
export const DEFAULT_TILE_SIZE = 0.1;

/** Absorbs float error when a box edge sits on a grid line (37.8 / 0.1 = 377.99999999999994) */
const GRID_EPSILON = 1e-9;

/** Grid position of a tile */
export interface TileCoord {
  row: number;
  col: number;
}

export function defaultCacheDir(): string {
  return join(homedir(), ".streetwise", "overpass-cache");
}

export function tileForPoint(lat: number, lng: number, tileSize: number = DEFAULT_TILE_SIZE): TileCoord {
  return { row: Math.floor(lat / tileSize), col: Math.floor(lng / tileSize) };
}

/**
 * Bounding box of a tile, rounded to 1e-8° so that 858 * 0.05 reads as
 * 42.9 rather than 42.900000000000006.
 */
export function tileBbox(tile: TileCoord, tileSize: number = DEFAULT_TILE_SIZE): BoundingBox {
  const round = (v: number) => Math.round(v * 1e8) / 1e8;
  return {
    minLat: round(tile.row * tileSize),
    maxLat: round((tile.row + 1) * tileSize),
    minLng: round(tile.col * tileSize),
    maxLng: round((tile.col + 1) * tileSize),
  };
}

/** 16 hex characters of sha256 over the tile position, size and query timeout */
export function tileCacheKey(tile: TileCoord, tileSize: number, timeout: number): string {
  return createHash("sha256")
    .update(`${tile.row}|${tile.col}|${tileSize}|${timeout}`)
    .digest("hex")
    .slice(0, 16);
}

function isOverpassJson(value: unknown): value is OverpassJson {
  return typeof value === "object" && value !== null && "elements" in value && Array.isArray(value.elements);
}

export class OverpassTileCache {
  constructor(
    readonly dir: string = defaultCacheDir(),
    readonly tileSize: number = DEFAULT_TILE_SIZE,
  ) {}

  /**
   * Every tile intersecting `bbox`, row-major from south-west, each with
   * its own box. A box edge lying on a tile border does not pull in the
   * tile beyond it.
   */
  tilesFor(bbox: BoundingBox): { tile: TileCoord; bbox: BoundingBox }[] {
    const size = this.tileSize;
    const firstRow = Math.floor(bbox.minLat / size + GRID_EPSILON);
    const lastRow = Math.max(firstRow, Math.ceil(bbox.maxLat / size - GRID_EPSILON) - 1);
    const firstCol = Math.floor(bbox.minLng / size + GRID_EPSILON);
    const lastCol = Math.max(firstCol, Math.ceil(bbox.maxLng / size - GRID_EPSILON) - 1);

    const tiles: { tile: TileCoord; bbox: BoundingBox }[] = [];
    for (let row = firstRow; row <= lastRow; row++) {
      for (let col = firstCol; col <= lastCol; col++) {
        const tile = { row, col };
        tiles.push({ tile, bbox: tileBbox(tile, size) });
      }
    }
    return tiles;
  }

  pathFor(tile: TileCoord, timeout: number): string {
    return join(this.dir, `${tileCacheKey(tile, this.tileSize, timeout)}.json`);
  }

  /**
   * Cached response for a tile. Missing, empty and unreadable entries
   * are all misses.
   */
  read(tile: TileCoord, timeout: number): OverpassJson | undefined {
    const file = this.pathFor(tile, timeout);
    if (!existsSync(file) || statSync(file).size === 0) return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(file, "utf-8"));
    } catch (error) {
      console.warn(`[overpass] Ignoring unreadable cache entry ${file}: ${String(error)}`);
      return undefined;
    }
    return isOverpassJson(parsed) ? parsed : undefined;
  }

  write(tile: TileCoord, timeout: number, response: OverpassJson): void {
    mkdirSync(this.dir, { recursive: true });
    writeFileSync(this.pathFor(tile, timeout), JSON.stringify(response));
  }
}
