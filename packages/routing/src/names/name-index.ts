/**
 * Exact lookup of named places by canonical name.
 */

import type { LocationRecord } from "@streetwise/types";
import { canonicalize, hasLetters } from "./canonicalize.js";

export class NameIndex {
  private readonly byName = new Map<string, LocationRecord[]>();
  private recordCount = 0;

  get size(): number {
    return this.recordCount;
  }

  /** Append a record under the canonical form of its name. */
  add(record: LocationRecord): void {
    const key = canonicalize(record.name);
    if (!hasLetters(key)) return;
    const records = this.byName.get(key);
    if (records) {
      records.push(record);
    } else {
      this.byName.set(key, [record]);
    }
    this.recordCount++;
  }

  /** Records whose canonical name equals the canonical form of `name`, in insertion order. */
  lookup(name: string): readonly LocationRecord[] {
    return this.byName.get(canonicalize(name)) ?? [];
  }
}
