export { GraphModel, GraphSealedError, type GraphBuildStats } from "./graph-model.js";
export { EARTH_RADIUS_MILES, haversineMiles, initialBearing, normalizeAngle } from "./geo.js";
