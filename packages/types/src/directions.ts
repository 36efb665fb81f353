/**
 * Turn-by-turn directions.
 */

/** Maneuver at the start of a direction step */
export type TurnKind =
  | "start"
  | "straight"
  | "slight-left"
  | "slight-right"
  | "left"
  | "right"
  | "sharp-left"
  | "sharp-right";

/** Every turn kind, in display order */
export const TURN_KINDS: readonly TurnKind[] = [
  "start",
  "straight",
  "slight-left",
  "slight-right",
  "left",
  "right",
  "sharp-left",
  "sharp-right",
];

/** One instruction: make a maneuver onto a road and follow it for a distance */
export interface DirectionStep {
  turnKind: TurnKind;
  roadName: string;
  distanceMiles: number;
}
