/**
 * Road network representation built from OSM data.
 *
 * Nodes are OSM points; edges are implied by the ways that pass through
 * them. Each node carries the name of the last way that touched it.
 */

/** OSM node id. OSM ids stay well below 2^53, so a plain number holds them. */
export type NodeId = number;

/** Geographic coordinate (WGS84) */
export interface Coordinate {
  lat: number;
  lng: number;
}

/** A node in the road graph */
export interface GraphNode {
  id: NodeId;
  coordinate: Coordinate;
  /** Display name from the OSM `name` tag, if any */
  name?: string;
  /** Name of the most recently ingested way touching this node */
  wayName?: string;
}

/** Way name used when a way has no name of its own */
export const UNKNOWN_ROAD = "unknown road";
