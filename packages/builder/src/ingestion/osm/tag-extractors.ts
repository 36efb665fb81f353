/**
 * Read names out of OSM tags.
 */

import type { OsmTags } from "./types.js";

/**
 * Display name of a node, if it has one worth indexing.
 *
 * @returns the trimmed `name` tag, or undefined when absent or blank
 */
export function extractName(tags: OsmTags | undefined): string | undefined {
  const name = tags?.["name"]?.trim();
  return name ? name : undefined;
}

/**
 * Road name for a way. Falls back to the route reference ("I 80") and
 * then to the empty string, which the graph stores as the unknown-road
 * sentinel.
 */
export function extractWayName(tags: OsmTags | undefined): string {
  return extractName(tags) ?? tags?.["ref"]?.trim() ?? "";
}
