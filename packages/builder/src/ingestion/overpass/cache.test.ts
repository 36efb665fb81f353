import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { OverpassJson } from "overpass-ts";
import {
  DEFAULT_TILE_SIZE,
  OverpassTileCache,
  tileBbox,
  tileCacheKey,
  tileForPoint,
} from "./cache.js";

const S = DEFAULT_TILE_SIZE;

function makeResponse(elements: OverpassJson["elements"]): OverpassJson {
  return {
    version: 0.6,
    generator: "test",
    osm3s: { timestamp_osm_base: "2024-01-01T00:00:00Z", copyright: "test" },
    elements,
  };
}

describe("tileForPoint", () => {
  it("maps a point to its grid cell", () => {
    expect(tileForPoint(37.87, -122.26)).toEqual({
      row: Math.floor(37.87 / S),
      col: Math.floor(-122.26 / S),
    });
  });

  it("respects a custom tile size", () => {
    expect(tileForPoint(37.87, -122.26, 0.5)).toEqual({ row: 75, col: -245 });
  });
});

describe("tileBbox", () => {
  it("spans exactly one tile and contains its point", () => {
    const bbox = tileBbox(tileForPoint(37.87, -122.26));
    expect(bbox.maxLat - bbox.minLat).toBeCloseTo(S);
    expect(bbox.maxLng - bbox.minLng).toBeCloseTo(S);
    expect(bbox.minLat).toBeLessThanOrEqual(37.87);
    expect(bbox.maxLat).toBeGreaterThan(37.87);
    expect(bbox.minLng).toBeLessThanOrEqual(-122.26);
    expect(bbox.maxLng).toBeGreaterThan(-122.26);
  });

  it("rounds away floating-point noise", () => {
    expect(tileBbox({ row: 858, col: 0 }, 0.05).minLat).toBe(42.9);
  });
});

describe("tileCacheKey", () => {
  const tile = { row: 378, col: -1223 };

  it("is a 16-character hex string", () => {
    expect(tileCacheKey(tile, S, 90)).toMatch(/^[0-9a-f]{16}$/);
  });

  it("changes with position, size and timeout", () => {
    const base = tileCacheKey(tile, S, 90);
    expect(tileCacheKey({ row: 379, col: -1223 }, S, 90)).not.toBe(base);
    expect(tileCacheKey(tile, 0.2, 90)).not.toBe(base);
    expect(tileCacheKey(tile, S, 120)).not.toBe(base);
    expect(tileCacheKey(tile, S, 90)).toBe(base);
  });
});

describe("OverpassTileCache", () => {
  const tile = { row: 378, col: -1223 };
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "streetwise-overpass-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("covers a small box with the single tile under it", () => {
    const cache = new OverpassTileCache(dir);
    expect(cache.tilesFor({ minLat: 37.86, maxLat: 37.88, minLng: -122.27, maxLng: -122.25 })).toEqual([
      { tile: { row: 378, col: -1223 }, bbox: { minLat: 37.8, maxLat: 37.9, minLng: -122.3, maxLng: -122.2 } },
    ]);
  });

  it("covers every tile a box straddles", () => {
    const cache = new OverpassTileCache(dir);
    const tiles = cache.tilesFor({ minLat: 37.75, maxLat: 37.85, minLng: -122.45, maxLng: -122.35 });

    expect(tiles.map((t) => t.tile)).toEqual([
      { row: 377, col: -1225 },
      { row: 377, col: -1224 },
      { row: 378, col: -1225 },
      { row: 378, col: -1224 },
    ]);
  });

  it("does not take in tiles beyond a box edge on a grid line", () => {
    const cache = new OverpassTileCache(dir);
    const tiles = cache.tilesFor({ minLat: 37.8, maxLat: 37.9, minLng: -122.3, maxLng: -122.2 });

    expect(tiles.map((t) => t.tile)).toEqual([{ row: 378, col: -1223 }]);
  });

  it("round-trips a response", () => {
    const cache = new OverpassTileCache(dir);
    const response = makeResponse([{ type: "node", id: 1, lat: 37.87, lon: -122.26 }]);
    cache.write(tile, 90, response);

    expect(cache.read(tile, 90)).toEqual(response);
    expect(cache.read(tile, 120)).toBeUndefined();
  });

  it("creates nested directories on write", () => {
    const cache = new OverpassTileCache(join(dir, "a", "b"));
    cache.write(tile, 90, makeResponse([]));
    expect(cache.read(tile, 90)?.elements).toEqual([]);
  });

  it("treats empty, corrupt and foreign files as misses", () => {
    const cache = new OverpassTileCache(dir);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    writeFileSync(cache.pathFor(tile, 90), "");
    expect(cache.read(tile, 90)).toBeUndefined();

    writeFileSync(cache.pathFor(tile, 90), "{not valid json");
    expect(cache.read(tile, 90)).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);

    writeFileSync(cache.pathFor(tile, 90), JSON.stringify({ hello: "world" }));
    expect(cache.read(tile, 90)).toBeUndefined();
  });

  it("names files by cache key", () => {
    const cache = new OverpassTileCache("/tmp/streetwise-test");
    expect(cache.pathFor(tile, 90)).toBe(join("/tmp/streetwise-test", `${tileCacheKey(tile, S, 90)}.json`));
  });
});
