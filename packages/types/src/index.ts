/**
 * @streetwise/types
 *
 * Shared domain types for the Streetwise routing engine.
 *
 * - Graph: road network nodes built from OSM points and ways
 * - Ingestion: node/way events streamed into the build phase
 * - Location: named places for autocomplete and exact lookup
 * - Directions: turn-by-turn steps derived from a route
 * - Result: recoverable query errors returned as values
 */

export * from "./graph.js";
export * from "./geo.js";
export * from "./ingestion.js";
export * from "./location.js";
export * from "./directions.js";
export * from "./route.js";
export * from "./result.js";
