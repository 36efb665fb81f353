/**
 * OSM PBF file parser.
 *
 * Wraps osm-pbf-parser-node to stream OSM elements from a PBF file,
 * keeping routable highways, the nodes they reference and any named node.
 */

import { createOSMStream } from "osm-pbf-parser-node";
import type { OsmNode, OsmTags, OsmWay } from "./types.js";
import { isRoutableHighway } from "./types.js";
import { extractName } from "./tag-extractors.js";

/**
 * Raw item from osm-pbf-parser-node, narrowed from what the stream yields.
 */
interface RawOsmItem {
  type: string;
  id?: number;
  lat?: number;
  lon?: number;
  refs?: number[];
  tags?: OsmTags;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readTags(value: unknown): OsmTags | undefined {
  if (!isRecord(value)) return undefined;
  const tags: OsmTags = {};
  for (const [key, tag] of Object.entries(value)) {
    if (typeof tag === "string") tags[key] = tag;
  }
  return tags;
}

function readRefs(value: unknown): number[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const refs: number[] = [];
  for (const ref of value) {
    if (typeof ref === "number") refs.push(ref);
  }
  return refs;
}

/** Narrow a stream item; the header and anything unrecognized come back typed but empty. */
export function toRawItem(value: unknown): RawOsmItem {
  if (!isRecord(value) || typeof value["type"] !== "string") return { type: "unknown" };
  const item: RawOsmItem = { type: value["type"] };
  const id = value["id"];
  const lat = value["lat"];
  const lon = value["lon"];
  if (typeof id === "number") item.id = id;
  if (typeof lat === "number") item.lat = lat;
  if (typeof lon === "number") item.lon = lon;
  const refs = readRefs(value["refs"]);
  if (refs) item.refs = refs;
  const tags = readTags(value["tags"]);
  if (tags) item.tags = tags;
  return item;
}

/**
 * Parse an OSM PBF file and yield nodes, then ways.
 *
 * Two passes over the file:
 * 1. First pass: collect routable ways and the node ids they reference
 * 2. Second pass: yield referenced or named nodes in document order
 *
 * The collected ways are yielded last, so every node event precedes
 * every way event.
 */
export async function* parseOsmPbf(pbfPath: string): AsyncGenerator<OsmNode | OsmWay> {
  const referencedNodeIds = new Set<number>();
  const ways: OsmWay[] = [];

  for await (const rawItem of createOSMStream(pbfPath, { withTags: true })) {
    const item = toRawItem(rawItem);
    if (item.type !== "way" || item.id === undefined || !item.refs) continue;
    if (!isRoutableHighway(item.tags?.["highway"])) continue;

    const way: OsmWay = { type: "way", id: item.id, refs: item.refs };
    if (item.tags) way.tags = item.tags;
    ways.push(way);
    for (const nodeId of way.refs) referencedNodeIds.add(nodeId);
  }

  for await (const rawItem of createOSMStream(pbfPath, { withTags: true })) {
    const item = toRawItem(rawItem);
    if (item.type !== "node" || item.id === undefined) continue;
    if (item.lat === undefined || item.lon === undefined) continue;
    if (!referencedNodeIds.has(item.id) && extractName(item.tags) === undefined) continue;

    const node: OsmNode = { type: "node", id: item.id, lat: item.lat, lon: item.lon };
    if (item.tags) node.tags = item.tags;
    yield node;
  }

  for (const way of ways) {
    yield way;
  }
}
