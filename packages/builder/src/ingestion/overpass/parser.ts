/**
 * Overpass JSON response parser.
 *
 * Converts Overpass API response elements into OsmNode/OsmWay elements
 * consumed by `ingestOsm()`.
 *
 * With `out body geom;`, Overpass returns ways carrying both `nodes[]`
 * (OSM node ids) and a parallel `geometry[]` of inline coordinates, so
 * way nodes can be synthesized without a separate node query.
 */

import type { OverpassJson, OverpassNode, OverpassWay } from "overpass-ts";
import type { OsmNode, OsmWay } from "../osm/types.js";
import { isRoutableHighway } from "../osm/types.js";

type OverpassElement = OverpassJson["elements"][number];

function isOverpassNode(element: OverpassElement): element is OverpassNode {
  return element.type === "node";
}

function isOverpassWay(element: OverpassElement): element is OverpassWay {
  return element.type === "way";
}

/**
 * Parse an Overpass JSON response into OsmNode and OsmWay elements.
 *
 * Yields, in order:
 * 1. OsmNodes from explicit node elements (named places)
 * 2. OsmNodes synthesized from way geometry, each id once
 * 3. OsmWays for routable highways
 */
export async function* parseOverpassResponse(
  response: OverpassJson
): AsyncGenerator<OsmNode | OsmWay> {
  const yieldedNodeIds = new Set<number>();

  for (const element of response.elements) {
    if (!isOverpassNode(element)) continue;
    const node: OsmNode = { type: "node", id: element.id, lat: element.lat, lon: element.lon };
    if (element.tags) node.tags = element.tags;
    yield node;
    yieldedNodeIds.add(element.id);
  }

  const wayNodes: OsmNode[] = [];
  const ways: OsmWay[] = [];
  for (const element of response.elements) {
    if (!isOverpassWay(element)) continue;
    if (!isRoutableHighway(element.tags?.["highway"])) continue;

    const geometry = element.geometry ?? [];
    element.nodes.forEach((nodeId, i) => {
      if (yieldedNodeIds.has(nodeId)) return;
      const point = geometry[i];
      if (!point) return;
      wayNodes.push({ type: "node", id: nodeId, lat: point.lat, lon: point.lon });
      yieldedNodeIds.add(nodeId);
    });

    const way: OsmWay = { type: "way", id: element.id, refs: [...element.nodes] };
    if (element.tags) way.tags = element.tags;
    ways.push(way);
  }

  yield* wayNodes;
  yield* ways;
}
