/**
 * Recoverable query errors, returned as values rather than thrown.
 */

import type { NodeId } from "./graph.js";

/** A query referenced a node id that is not in the graph */
export interface UnknownVertexError {
  kind: "unknown-vertex";
  id: NodeId;
}

/** A nearest-node query ran against a graph with no nodes */
export interface EmptyGraphError {
  kind: "empty-graph";
}

/** Start and goal are not connected, or the search ran out of budget */
export interface NoRouteError {
  kind: "no-route";
  reason: "unreachable" | "budget-exhausted";
}

/** Direction text did not match the direction grammar */
export interface ParseFailureError {
  kind: "parse-failure";
  input: string;
  reason: string;
}

export type QueryError =
  | UnknownVertexError
  | EmptyGraphError
  | NoRouteError
  | ParseFailureError;

export type Result<T, E = QueryError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/** Human-readable description of a query error */
export function describeQueryError(error: QueryError): string {
  switch (error.kind) {
    case "unknown-vertex":
      return `Unknown vertex ${error.id}`;
    case "empty-graph":
      return "The map has no routable nodes";
    case "no-route":
      return error.reason === "budget-exhausted"
        ? "Route search gave up before reaching the destination"
        : "No route connects the start and destination";
    case "parse-failure":
      return `Cannot parse direction "${error.input}": ${error.reason}`;
  }
}
