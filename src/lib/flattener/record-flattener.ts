/**
 * Record flattening - nested data record to flat row
 */

import type {
  FlatRecord,
  NestedRecord,
  NestedValue,
  ScalarValue,
} from "../../types/data-model.js";
import { renderList } from "./list-renderer.js";
import { DEFAULT_SEPARATOR, type FlattenOptions } from "./types.js";

export function isNestedRecord(
  value: NestedValue | undefined,
): value is NestedRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Join a child key onto its parent path
 */
export function joinKey(parentKey: string, key: string, separator: string): string {
  return parentKey ? `${parentKey}${separator}${key}` : key;
}

/**
 * Flatten a nested record into a single-level row
 *
 * @example
 * flattenRecord({ key_1: 1, key_2: { key_3: 2, key_4: { key_5: 3, key_6: ['10', '11'] } } })
 * // Map {
 * //   'key_1' => 1,
 * //   'key_2__key_3' => 2,
 * //   'key_2__key_4__key_5' => 3,
 * //   'key_2__key_4__key_6' => "['10', '11']"
 * // }
 */
export function flattenRecord(
  record: NestedRecord | null | undefined,
  options: FlattenOptions = {},
): FlatRecord {
  const items: FlatRecord = new Map();
  collectRecord(record, "", options.separator ?? DEFAULT_SEPARATOR, items);
  return items;
}

function collectRecord(
  record: NestedRecord | null | undefined,
  parentKey: string,
  separator: string,
  items: FlatRecord,
): void {
  if (!record) {
    return;
  }

  for (const [key, value] of Object.entries(record)) {
    const newKey = joinKey(parentKey, key, separator);

    if (isNestedRecord(value)) {
      collectRecord(value, newKey, separator, items);
    } else if (Array.isArray(value)) {
      items.set(newKey, renderList(value));
    } else {
      items.set(newKey, value);
    }
  }
}

/**
 * Plain-object view of a flat row, for JSON output
 */
export function flatRecordToObject(row: FlatRecord): Record<string, ScalarValue> {
  return Object.fromEntries(row);
}
