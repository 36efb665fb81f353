/**
 * Events delivered by an ingestion collaborator during the build phase.
 *
 * Producers must deliver events in document order: a way's nodes arrive
 * before the way itself.
 */

import type { NodeId } from "./graph.js";

/** A point, optionally named */
export interface NodeEvent {
  id: NodeId;
  lon: number;
  lat: number;
  name?: string;
}

/** An ordered run of nodes forming a road */
export interface WayEvent {
  nodeIds: NodeId[];
  /** Empty string when the way is unnamed */
  name: string;
}

/** Receiver of ingestion events */
export interface IngestionSink {
  node(event: NodeEvent): void;
  way(event: WayEvent): void;
}
