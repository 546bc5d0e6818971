/**
 * Declared JSON Schema types → concrete column storage types
 */

import type {
  DeclaredTypes,
  ResolvedColumn,
  ResolvedType,
  StorageType,
} from "../../types/data-model.js";
import { UnsupportedTypeError } from "../../utils/errors.js";
import { toTypeTokens } from "../flattener/schema-flattener.js";

const NULL_TOKEN = "NULL";

/**
 * Upper-cased type token → storage type. The empty token stands for an untyped field.
 */
export const FIELD_TYPE_TO_STORAGE: Readonly<Record<string, StorageType>> = {
  BOOLEAN: "boolean",
  STRING: "string",
  ARRAY: "string",
  "": "string",
  INTEGER: "int64",
  NUMBER: "float64",
};

/**
 * When a union still has several concrete tokens after dropping NULL,
 * the earliest token in this list wins
 */
export const TYPE_PRIORITY: readonly string[] = [
  "STRING",
  "ARRAY",
  "NUMBER",
  "INTEGER",
  "BOOLEAN",
];

function isSupportedToken(token: string): boolean {
  return Object.prototype.hasOwnProperty.call(FIELD_TYPE_TO_STORAGE, token);
}

function pickToken(tokens: Set<string>): string {
  if (tokens.size === 0) {
    return "";
  }
  if (tokens.size === 1) {
    const [only] = tokens;
    return only ?? "";
  }
  return TYPE_PRIORITY.find((token) => tokens.has(token)) ?? "";
}

/**
 * Resolve a field's declared types to one storage type plus nullability
 *
 * @throws UnsupportedTypeError when a token has no storage type
 *
 * @example
 * resolveField('x', ['null', 'integer']); // { type: 'int64', nullable: true }
 * resolveField('x', 'string');            // { type: 'string', nullable: false }
 * resolveField('x', []);                  // { type: 'string', nullable: false }
 */
export function resolveField(
  fieldName: string,
  declaredTypes: DeclaredTypes,
): ResolvedType {
  const tokens = new Set(
    toTypeTokens(declaredTypes).map((token) => String(token).toUpperCase()),
  );

  const nullable = tokens.delete(NULL_TOKEN);

  for (const token of tokens) {
    if (!isSupportedToken(token)) {
      throw new UnsupportedTypeError(fieldName, declaredTypes);
    }
  }

  const type = FIELD_TYPE_TO_STORAGE[pickToken(tokens)];
  if (type === undefined) {
    throw new UnsupportedTypeError(fieldName, declaredTypes);
  }

  return { type, nullable };
}

export function resolveColumn(
  fieldName: string,
  declaredTypes: DeclaredTypes,
): ResolvedColumn {
  return { name: fieldName, ...resolveField(fieldName, declaredTypes) };
}
