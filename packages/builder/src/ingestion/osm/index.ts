/**
 * OSM element types and PBF parsing.
 */

export { parseOsmPbf } from "./parser.js";
export { extractName, extractWayName } from "./tag-extractors.js";
export {
  type OsmNode,
  type OsmWay,
  type OsmElement,
  type OsmTags,
  type RoutableHighway,
  ROUTABLE_HIGHWAYS,
  isRoutableHighway,
} from "./types.js";
