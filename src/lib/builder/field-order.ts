/**
 * First-seen field ordering across flattened rows
 */

import type { FlatRecord } from "../../types/data-model.js";

export class FieldOrderTracker {
  private readonly seen = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    for (const field of initial) {
      this.seen.add(field);
    }
  }

  /**
   * Record any keys of the row not seen before, in the row's order
   */
  observe(row: FlatRecord): void {
    this.observeKeys(row.keys());
  }

  observeKeys(keys: Iterable<string>): void {
    for (const key of keys) {
      this.seen.add(key);
    }
  }

  has(field: string): boolean {
    return this.seen.has(field);
  }

  fields(): string[] {
    return [...this.seen];
  }

  get size(): number {
    return this.seen.size;
  }
}
