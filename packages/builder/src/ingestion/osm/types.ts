/**
 * OSM-specific types for parsing PBF and Overpass data.
 *
 * These represent raw OSM elements before they become ingestion events.
 */

/** OSM tags as key-value pairs */
export type OsmTags = Record<string, string>;

/** A node from OSM - a point location */
export interface OsmNode {
  type: "node";
  id: number;
  lat: number;
  lon: number;
  tags?: OsmTags;
}

/** A way from OSM - an ordered list of node ids */
export interface OsmWay {
  type: "way";
  id: number;
  refs: number[];
  tags?: OsmTags;
}

export type OsmElement = OsmNode | OsmWay;

/**
 * Highway tag values that carry vehicle traffic and take part in routing.
 */
export const ROUTABLE_HIGHWAYS = [
  "motorway",
  "trunk",
  "primary",
  "secondary",
  "tertiary",
  "unclassified",
  "residential",
  "living_street",
  "motorway_link",
  "trunk_link",
  "primary_link",
  "secondary_link",
  "tertiary_link",
] as const;

export type RoutableHighway = (typeof ROUTABLE_HIGHWAYS)[number];

const ROUTABLE_SET: ReadonlySet<string> = new Set(ROUTABLE_HIGHWAYS);

/**
 * Check if a highway tag value is one we route over.
 */
export function isRoutableHighway(highway: string | undefined): highway is RoutableHighway {
  if (!highway) return false;
  return ROUTABLE_SET.has(highway);
}
