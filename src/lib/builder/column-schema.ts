/**
 * Column schema construction from a flattened schema and a column order
 */

import type {
  ColumnSchema,
  FlatSchema,
  FlatRecord,
  ScalarValue,
} from "../../types/data-model.js";
import { MissingFieldError } from "../../utils/errors.js";
import { resolveColumn } from "../resolver/type-resolver.js";

/**
 * Build the ordered column schema. Column order is exactly `fieldsOrdered`;
 * the flattened schema's own order plays no part.
 *
 * @throws MissingFieldError when a requested field is not in the flattened schema
 * @throws UnsupportedTypeError when a field's type cannot be resolved
 *
 * @example
 * buildColumnSchema(
 *   new Map([['key_1', ['null', 'integer']], ['key_2__key_3', ['null', 'string']]]),
 *   ['key_2__key_3', 'key_1'],
 * );
 * // [
 * //   { name: 'key_2__key_3', type: 'string', nullable: true },
 * //   { name: 'key_1', type: 'int64', nullable: true }
 * // ]
 */
export function buildColumnSchema(
  flatSchema: FlatSchema | null | undefined,
  fieldsOrdered: Iterable<string>,
): ColumnSchema {
  const declared: FlatSchema = flatSchema ?? new Map();
  const columns: ColumnSchema = [];

  for (const fieldName of fieldsOrdered) {
    if (!declared.has(fieldName)) {
      throw new MissingFieldError(fieldName);
    }
    columns.push(resolveColumn(fieldName, declared.get(fieldName)));
  }

  return columns;
}

export function columnNames(schema: ColumnSchema): string[] {
  return schema.map((column) => column.name);
}

/**
 * Values of a flat row in column order; absent columns become null
 */
export function alignRecord(
  schema: ColumnSchema,
  row: FlatRecord,
): ScalarValue[] {
  return schema.map((column) => row.get(column.name) ?? null);
}
