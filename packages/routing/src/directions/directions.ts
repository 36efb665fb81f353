/**
 * Turn-by-turn directions from a node path.
 *
 * The path is walked segment by segment. Each segment belongs to the road
 * of the way that created its edge; consecutive segments on the same road
 * accumulate into one step, and a change of road starts a new step whose
 * maneuver is classified from the change of heading at the junction.
 */

import {
  UNKNOWN_ROAD,
  err,
  ok,
  type DirectionStep,
  type GraphNode,
  type NodeId,
  type Result,
  type TurnKind,
  type UnknownVertexError,
} from "@streetwise/types";
import type { GraphModel } from "../graph/graph-model.js";
import { haversineMiles, initialBearing, normalizeAngle } from "../graph/geo.js";

export interface DirectionsOptions {
  /**
   * What the turn bins are applied to.
   * - "heading-change" (default): bearing of the new segment minus the
   *   bearing of the segment before it
   * - "absolute": the compass bearing of the new segment itself
   */
  turnReference?: "heading-change" | "absolute";
}

/**
 * Classify an angle in degrees into a maneuver.
 *
 * | angle          | maneuver     |
 * |----------------|--------------|
 * | [-15, 15]      | straight     |
 * | (15, 30]       | slight-right |
 * | [-30, -15)     | slight-left  |
 * | (30, 100]      | right        |
 * | [-100, -30)    | left         |
 * | (100, 180]     | sharp-right  |
 * | [-180, -100)   | sharp-left   |
 */
export function classifyTurn(angle: number): TurnKind {
  if (angle >= -15 && angle <= 15) return "straight";
  if (angle > 15 && angle <= 30) return "slight-right";
  if (angle < -15 && angle >= -30) return "slight-left";
  if (angle > 30 && angle <= 100) return "right";
  if (angle < -30 && angle >= -100) return "left";
  if (angle > 100) return "sharp-right";
  return "sharp-left";
}

/**
 * Build directions for a path of at least one node.
 *
 * The first step is always `start`, carrying the distance travelled on
 * the first road (zero for a single-node path). Other zero-length steps
 * are dropped unless they are the final step.
 */
export function buildDirections(
  graph: GraphModel,
  path: readonly NodeId[],
  options: DirectionsOptions = {},
): Result<DirectionStep[], UnknownVertexError> {
  const turnReference = options.turnReference ?? "heading-change";

  const nodes: GraphNode[] = [];
  for (const id of path) {
    const node = graph.getNode(id);
    if (!node) return err<UnknownVertexError>({ kind: "unknown-vertex", id });
    nodes.push(node);
  }

  const first = nodes[0];
  if (!first) return ok([]);

  const second = nodes[1];
  const startRoad = second
    ? segmentRoad(graph, first.id, second.id)
    : (first.wayName ?? UNKNOWN_ROAD);

  const steps: DirectionStep[] = [];
  let active: DirectionStep = { turnKind: "start", roadName: startRoad, distanceMiles: 0 };
  let previousHeading: number | undefined;

  for (let i = 1; i < nodes.length; i++) {
    const prev = nodes[i - 1];
    const node = nodes[i];
    if (!prev || !node) continue;

    const heading = initialBearing(prev.coordinate, node.coordinate);
    const length = haversineMiles(prev.coordinate, node.coordinate);
    const road = segmentRoad(graph, prev.id, node.id);

    if (road !== active.roadName) {
      if (active.distanceMiles > 0 || active.turnKind === "start") steps.push(active);
      const angle =
        turnReference === "absolute"
          ? heading
          : previousHeading === undefined
            ? 0
            : normalizeAngle(heading - previousHeading);
      active = { turnKind: classifyTurn(angle), roadName: road, distanceMiles: length };
    } else {
      active.distanceMiles += length;
    }

    previousHeading = heading;
  }

  steps.push(active);
  return ok(steps);
}

/**
 * Road a segment belongs to: the way that created the edge, or the way
 * name stamped on the arrival node when the two are not directly joined.
 */
function segmentRoad(graph: GraphModel, from: NodeId, to: NodeId): string {
  const edgeWay = graph.edgeWayName(from, to);
  if (edgeWay !== undefined) return edgeWay;
  const nodeWay = graph.wayName(to);
  return nodeWay.ok ? nodeWay.value : UNKNOWN_ROAD;
}
