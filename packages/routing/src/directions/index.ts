export { buildDirections, classifyTurn, type DirectionsOptions } from "./directions.js";
export { formatDirection, parseDirection, TURN_PHRASES } from "./format.js";
