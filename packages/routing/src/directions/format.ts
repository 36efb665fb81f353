/**
 * Text form of a direction step:
 *
 *   "<Phrase> on <RoadName> and continue for <miles, 3 decimals> miles."
 *
 * The parser is a small hand-written tokenizer over that fixed grammar:
 * phrase from a closed set, road name span, unsigned decimal, suffix.
 * Each stage reports its own failure reason.
 */

import {
  TURN_KINDS,
  err,
  ok,
  type DirectionStep,
  type ParseFailureError,
  type Result,
  type TurnKind,
} from "@streetwise/types";

export const TURN_PHRASES: Readonly<Record<TurnKind, string>> = {
  start: "Start",
  straight: "Go straight",
  "slight-left": "Slight left",
  "slight-right": "Slight right",
  left: "Turn left",
  right: "Turn right",
  "sharp-left": "Sharp left",
  "sharp-right": "Sharp right",
};

const ON = " on ";
const CONTINUE = " and continue for ";
const SUFFIX = " miles.";

/** Render a step as a single line of text. */
export function formatDirection(step: DirectionStep): string {
  return `${TURN_PHRASES[step.turnKind]}${ON}${step.roadName}${CONTINUE}${step.distanceMiles.toFixed(3)}${SUFFIX}`;
}

/** Parse a line produced by `formatDirection`. Phrase matching is case-sensitive. */
export function parseDirection(text: string): Result<DirectionStep, ParseFailureError> {
  const fail = (reason: string) =>
    err<ParseFailureError>({ kind: "parse-failure", input: text, reason });

  // 1. Phrase
  let turnKind: TurnKind | undefined;
  let rest = "";
  for (const kind of TURN_KINDS) {
    const phrase = TURN_PHRASES[kind];
    if (text.startsWith(phrase + ON)) {
      turnKind = kind;
      rest = text.slice(phrase.length + ON.length);
      break;
    }
  }
  if (turnKind === undefined) return fail("unrecognized maneuver phrase");

  // 2. Suffix
  if (!rest.endsWith(SUFFIX)) return fail(`missing "${SUFFIX.trim()}" suffix`);
  rest = rest.slice(0, rest.length - SUFFIX.length);

  // 3. Road name: everything up to the last continuation marker
  const marker = rest.lastIndexOf(CONTINUE);
  if (marker < 0) return fail(`missing "${CONTINUE.trim()}"`);
  const roadName = rest.slice(0, marker);
  if (roadName.length === 0) return fail("empty road name");

  // 4. Distance literal
  const literal = rest.slice(marker + CONTINUE.length);
  if (!isUnsignedDecimal(literal)) return fail(`distance "${literal}" is not a number`);

  return ok({ turnKind, roadName, distanceMiles: Number(literal) });
}

/** Digits, optionally followed by a dot and more digits. */
function isUnsignedDecimal(literal: string): boolean {
  let digits = 0;
  let seenDot = false;
  let digitsAfterDot = 0;
  for (const ch of literal) {
    if (ch >= "0" && ch <= "9") {
      digits++;
      if (seenDot) digitsAfterDot++;
    } else if (ch === "." && !seenDot) {
      seenDot = true;
    } else {
      return false;
    }
  }
  return digits > 0 && (!seenDot || digitsAfterDot > 0) && literal[0] !== ".";
}
