import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MapDatabaseBuilder, type MapDatabase } from "@streetwise/routing";
import { createControllers } from "./app.js";
import { DEFAULT_RASTER_CONFIG } from "./config.js";
import { HttpError, ValidationError } from "./middleware/error-handler.js";

function buildCorner(): MapDatabase {
  const builder = new MapDatabaseBuilder();
  builder.node({ id: 1, lon: -122.27, lat: 37.875 });
  builder.node({ id: 2, lon: -122.265, lat: 37.875, name: "Hearst Corner" });
  builder.node({ id: 3, lon: -122.265, lat: 37.88 });
  builder.node({ id: 4, lon: -122.262, lat: 37.876, name: "Brewed Awakening" });
  builder.node({ id: 5, lon: -122.2, lat: 37.8 });
  builder.node({ id: 6, lon: -122.199, lat: 37.8 });
  builder.way({ nodeIds: [1, 2], name: "Hearst Ave" });
  builder.way({ nodeIds: [2, 3], name: "Euclid Ave" });
  builder.way({ nodeIds: [5, 6], name: "Island Rd" });
  return builder.build();
}

/** Capture what a controller throws, for asserting on its type and fields */
function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

describe("controllers", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("route", () => {
    it("returns the path with structured and text directions", () => {
      const { route } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      const result = route.getRoute({
        start_lon: "-122.27",
        start_lat: "37.875",
        end_lon: "-122.265",
        end_lat: "37.88",
      });

      expect(result.nodeIds).toEqual([1, 2, 3]);
      expect(result.directions.map((s) => [s.turnKind, s.roadName])).toEqual([
        ["start", "Hearst Ave"],
        ["left", "Euclid Ave"],
      ]);
      expect(result.text).toHaveLength(2);
      expect(result.text[0]).toMatch(/^Start on Hearst Ave and continue for \d+\.\d{3} miles\.$/);
      expect(result.text[1]).toMatch(/^Turn left on Euclid Ave and continue for \d+\.\d{3} miles\.$/);
    });

    it("rejects missing or malformed coordinates", () => {
      const { route } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      const err = thrownBy(() => route.getRoute({ start_lon: "east", start_lat: "37.875", end_lon: "-122.265" }));

      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.issues.map((i) => i.path.join("."))).toEqual(["start_lon", "end_lat"]);
    });

    it("rejects blank coordinates instead of reading them as zero", () => {
      const { route } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      const err = thrownBy(() =>
        route.getRoute({ start_lon: "", start_lat: "37.875", end_lon: "-122.265", end_lat: "  " }),
      );

      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.issues.map((i) => [i.path.join("."), i.message])).toEqual([
        ["start_lon", "Required"],
        ["end_lat", "Required"],
      ]);
    });

    it("reports disconnected points as 404", () => {
      const { route } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      const err = thrownBy(() =>
        route.getRoute({ start_lon: "-122.27", start_lat: "37.875", end_lon: "-122.2", end_lat: "37.8" }),
      );

      expect(err).toBeInstanceOf(HttpError);
      expect(err instanceof HttpError && err.status).toBe(404);
    });

    it("reports an empty map as 503", () => {
      const { route } = createControllers(new MapDatabaseBuilder().build(), { raster: DEFAULT_RASTER_CONFIG });
      const err = thrownBy(() => route.getRoute({ start_lon: "0", start_lat: "0", end_lon: "1", end_lat: "1" }));

      expect(err instanceof HttpError && err.status).toBe(503);
    });

    it("applies the configured expansion bound", () => {
      const { route } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG, maxRouteExpansions: 1 });
      const err = thrownBy(() =>
        route.getRoute({ start_lon: "-122.27", start_lat: "37.875", end_lon: "-122.265", end_lat: "37.88" }),
      );

      expect(err instanceof HttpError && err.message).toBe("Route search gave up before reaching the destination");
    });
  });

  describe("search", () => {
    it("autocompletes names by prefix", () => {
      const { search } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      expect(search.search({ term: "h" })).toEqual({ names: ["Hearst Corner"] });
      expect(search.search({ term: "" })).toEqual({ names: ["Brewed Awakening", "Hearst Corner"] });
    });

    it("returns location records with full=true", () => {
      const { search } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      expect(search.search({ term: "brewed awakening", full: "true" })).toEqual({
        locations: [{ id: 4, lon: -122.262, lat: 37.876, name: "Brewed Awakening" }],
      });
    });

    it("requires a term", () => {
      const { search } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      expect(thrownBy(() => search.search({}))).toBeInstanceOf(ValidationError);
    });
  });

  describe("directions", () => {
    it("parses every line", () => {
      const { directions } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      expect(
        directions.parse({
          lines: [
            "Start on Hearst Ave and continue for 0.274 miles.",
            "Turn left on Euclid Ave and continue for 0.345 miles.",
          ],
        }),
      ).toEqual({
        steps: [
          { turnKind: "start", roadName: "Hearst Ave", distanceMiles: 0.274 },
          { turnKind: "left", roadName: "Euclid Ave", distanceMiles: 0.345 },
        ],
      });
    });

    it("fails on the first bad line with 422", () => {
      const { directions } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      const err = thrownBy(() =>
        directions.parse({ lines: ["Start on Hearst Ave and continue for 0.274 miles.", "Go somewhere"] }),
      );

      expect(err).toBeInstanceOf(HttpError);
      if (!(err instanceof HttpError)) return;
      expect(err.status).toBe(422);
      expect(err.message).toBe('Cannot parse direction "Go somewhere": unrecognized maneuver phrase');
    });

    it("rejects an empty line list", () => {
      const { directions } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      expect(thrownBy(() => directions.parse({ lines: [] }))).toBeInstanceOf(ValidationError);
    });
  });

  describe("raster", () => {
    it("validates and answers tile queries", () => {
      const { raster } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      const result = raster.getRaster({
        ullon: String(DEFAULT_RASTER_CONFIG.rootUlLon),
        ullat: String(DEFAULT_RASTER_CONFIG.rootUlLat),
        lrlon: String(DEFAULT_RASTER_CONFIG.rootLrLon),
        lrlat: String(DEFAULT_RASTER_CONFIG.rootLrLat),
        w: "256",
        h: "256",
      });

      expect(result.querySuccess).toBe(true);
      expect(result.renderGrid).toEqual([["d0_x0_y0.png"]]);
    });

    it("rejects a zero-width viewport", () => {
      const { raster } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      expect(
        thrownBy(() => raster.getRaster({ ullon: "0", ullat: "1", lrlon: "1", lrlat: "0", w: "0", h: "256" })),
      ).toBeInstanceOf(ValidationError);
    });
  });

  describe("health", () => {
    it("reports map statistics", () => {
      const { health } = createControllers(buildCorner(), { raster: DEFAULT_RASTER_CONFIG });
      const result = health.getHealth();

      expect(result.status).toBe("ok");
      expect(result.uptime).toBeGreaterThanOrEqual(0);
      expect(result.map).toMatchObject({ nodes: 5, directedEdges: 6, locations: 2 });
    });
  });
});
