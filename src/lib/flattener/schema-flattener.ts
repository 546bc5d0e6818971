/**
 * Schema flattening - nested JSON Schema properties to flat declared types
 */

import type {
  DeclaredTypes,
  FieldDeclaration,
  FlatSchema,
  SchemaNode,
} from "../../types/data-model.js";
import { logger as defaultLogger, type FlattenLogger } from "../../utils/logger.js";
import { joinKey } from "./record-flattener.js";
import { DEFAULT_SEPARATOR, type FlattenOptions } from "./types.js";

/**
 * Normalize a declared type to a list of tokens
 */
export function toTypeTokens(declared: DeclaredTypes): string[] {
  if (typeof declared === "string") {
    return [declared];
  }
  return Array.isArray(declared) ? declared : [];
}

export function declaresObject(declared: DeclaredTypes): boolean {
  return toTypeTokens(declared).some(
    (token) => String(token).toLowerCase() === "object",
  );
}

function hasTypeKey(declaration: FieldDeclaration): boolean {
  return (
    typeof declaration === "object" &&
    declaration !== null &&
    Object.prototype.hasOwnProperty.call(declaration, "type")
  );
}

/**
 * Flatten nested schema properties into flattened key → raw declared type.
 * Object nodes contribute no column of their own, only their leaves.
 *
 * @example
 * flattenSchema({
 *   key_1: { type: ['null', 'integer'] },
 *   key_2: {
 *     type: ['null', 'object'],
 *     properties: {
 *       key_3: { type: ['null', 'string'] },
 *       key_4: { type: ['null', 'array'], items: { type: 'string' } },
 *     },
 *   },
 * })
 * // Map {
 * //   'key_1' => ['null', 'integer'],
 * //   'key_2__key_3' => ['null', 'string'],
 * //   'key_2__key_4' => ['null', 'array']
 * // }
 */
export function flattenSchema(
  node: SchemaNode | null | undefined,
  options: FlattenOptions = {},
): FlatSchema {
  const items: FlatSchema = new Map();
  collectSchema(
    node,
    "",
    options.separator ?? DEFAULT_SEPARATOR,
    options.logger ?? defaultLogger,
    items,
  );
  return items;
}

function collectSchema(
  node: SchemaNode | null | undefined,
  parentKey: string,
  separator: string,
  logger: FlattenLogger,
  items: FlatSchema,
): void {
  if (!node) {
    return;
  }

  for (const [key, declaration] of Object.entries(node)) {
    const newKey = joinKey(parentKey, key, separator);
    const typed = hasTypeKey(declaration);

    if (!typed) {
      logger.warn(`Schema field ${key} has no type declaration`, {
        field: key,
        declaration,
      });
    }

    const declared = typed ? declaration.type ?? null : null;

    if (declaresObject(declared)) {
      collectSchema(declaration.properties, newKey, separator, logger, items);
    } else {
      items.set(newKey, declared);
    }
  }
}
