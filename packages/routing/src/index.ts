/**
 * @streetwise/routing
 *
 * Road graph, shortest-path search and place-name indexes.
 *
 * Key concepts:
 * - GraphModel: nodes and symmetric edges built from OSM ways
 * - PathFinder: A* over great-circle edge lengths
 * - Directions: turn-by-turn steps from a node path, and their text form
 * - PrefixIndex / NameIndex: autocomplete and exact lookup of place names
 *
 * Pipeline:
 * 1. Stream node/way events into a MapDatabaseBuilder
 * 2. build() -> read-only MapDatabase
 * 3. route() -> node path -> directions()
 * 4. autocomplete() / locate() for place names
 */

export * from "./graph/index.js";
export * from "./search/index.js";
export * from "./directions/index.js";
export * from "./names/index.js";
export { MapDatabase, MapDatabaseBuilder, type MapStats } from "./map-database.js";
