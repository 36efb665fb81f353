/**
 * Named places, kept for exact lookup after an autocomplete selection.
 */

import type { NodeId } from "./graph.js";

export interface LocationRecord {
  id: NodeId;
  lon: number;
  lat: number;
  name: string;
}
