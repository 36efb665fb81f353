import { describe, it, expect } from "vitest";
import type { OverpassJson } from "overpass-ts";
import { parseOverpassResponse } from "./parser.js";

/** Collect all elements from an async generator */
async function collectAll<T>(gen: AsyncGenerator<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of gen) {
    items.push(item);
  }
  return items;
}

function makeOverpassResponse(elements: OverpassJson["elements"]): OverpassJson {
  return {
    version: 0.6,
    generator: "test",
    osm3s: {
      timestamp_osm_base: "2024-01-01T00:00:00Z",
      copyright: "test",
    },
    elements,
  };
}

describe("parseOverpassResponse", () => {
  it("converts named nodes", async () => {
    const response = makeOverpassResponse([
      { type: "node", id: 123, lat: 37.87, lon: -122.26, tags: { name: "Top Dog", amenity: "fast_food" } },
    ]);

    expect(await collectAll(parseOverpassResponse(response))).toEqual([
      { type: "node", id: 123, lat: 37.87, lon: -122.26, tags: { name: "Top Dog", amenity: "fast_food" } },
    ]);
  });

  it("synthesizes way nodes from geometry and yields every node before any way", async () => {
    const response = makeOverpassResponse([
      {
        type: "way",
        id: 100,
        nodes: [1, 2],
        tags: { highway: "residential", name: "Hearst Ave" },
        geometry: [
          { lat: 37.875, lon: -122.27 },
          { lat: 37.875, lon: -122.265 },
        ],
      },
      {
        type: "way",
        id: 200,
        nodes: [2, 3],
        tags: { highway: "secondary", name: "Euclid Ave" },
        geometry: [
          { lat: 37.875, lon: -122.265 },
          { lat: 37.88, lon: -122.265 },
        ],
      },
    ]);

    expect(await collectAll(parseOverpassResponse(response))).toEqual([
      { type: "node", id: 1, lat: 37.875, lon: -122.27 },
      { type: "node", id: 2, lat: 37.875, lon: -122.265 },
      { type: "node", id: 3, lat: 37.88, lon: -122.265 },
      { type: "way", id: 100, refs: [1, 2], tags: { highway: "residential", name: "Hearst Ave" } },
      { type: "way", id: 200, refs: [2, 3], tags: { highway: "secondary", name: "Euclid Ave" } },
    ]);
  });

  it("keeps the explicit version of a node that a way also carries", async () => {
    const response = makeOverpassResponse([
      { type: "node", id: 2, lat: 37.875, lon: -122.265, tags: { name: "Hearst Corner" } },
      {
        type: "way",
        id: 100,
        nodes: [1, 2],
        tags: { highway: "residential" },
        geometry: [
          { lat: 37.875, lon: -122.27 },
          { lat: 37.875, lon: -122.265 },
        ],
      },
    ]);

    const nodes = (await collectAll(parseOverpassResponse(response))).filter((e) => e.type === "node");
    expect(nodes).toEqual([
      { type: "node", id: 2, lat: 37.875, lon: -122.265, tags: { name: "Hearst Corner" } },
      { type: "node", id: 1, lat: 37.875, lon: -122.27 },
    ]);
  });

  it("skips ways that are not routable", async () => {
    const response = makeOverpassResponse([
      {
        type: "way",
        id: 100,
        nodes: [1, 2],
        tags: { highway: "footway" },
        geometry: [
          { lat: 37.875, lon: -122.27 },
          { lat: 37.875, lon: -122.265 },
        ],
      },
    ]);

    expect(await collectAll(parseOverpassResponse(response))).toEqual([]);
  });

  it("yields ways without geometry", async () => {
    const response = makeOverpassResponse([
      { type: "way", id: 100, nodes: [1, 2], tags: { highway: "residential" } },
    ]);

    expect(await collectAll(parseOverpassResponse(response))).toEqual([
      { type: "way", id: 100, refs: [1, 2], tags: { highway: "residential" } },
    ]);
  });

  it("handles an empty response", async () => {
    expect(await collectAll(parseOverpassResponse(makeOverpassResponse([])))).toEqual([]);
  });
});
