/**
 * Core data model types for flatcol
 * Nested records and schema declarations go in, flat rows and typed columns come out
 */

/**
 * ScalarValue - A leaf value that is stored as-is in a flat row
 */
export type ScalarValue = string | number | boolean | null;

/**
 * NestedValue - Anything that can appear in a nested record
 */
export type NestedValue = ScalarValue | NestedValue[] | NestedRecord;

/**
 * NestedRecord - A tree-shaped data record, e.g. one parsed JSON line
 */
export interface NestedRecord {
  [key: string]: NestedValue;
}

/**
 * FlatRecord - Flattened row; lists are already rendered to text.
 * A Map keeps insertion order even for integer-like keys.
 */
export type FlatRecord = Map<string, ScalarValue>;

/**
 * DeclaredTypes - Raw `type` of a schema declaration: one token, a union of tokens, or nothing
 */
export type DeclaredTypes = string | string[] | null | undefined;

/**
 * FieldDeclaration - One entry of a JSON Schema `properties` mapping
 */
export interface FieldDeclaration {
  type?: string | string[] | null;
  properties?: SchemaNode;
  items?: FieldDeclaration;
  [keyword: string]: unknown;
}

/**
 * SchemaNode - Nested mapping from field name to declaration
 */
export type SchemaNode = Record<string, FieldDeclaration>;

/**
 * FlatSchema - Flattened key to raw declared type, in traversal order
 */
export type FlatSchema = Map<string, string | string[] | null>;

/**
 * StorageType - The closed set of concrete column types
 */
export type StorageType = "boolean" | "string" | "int64" | "float64";

export interface ResolvedType {
  type: StorageType;
  nullable: boolean;
}

/**
 * ResolvedColumn - One column of the final schema
 */
export interface ResolvedColumn extends ResolvedType {
  name: string;
}

/**
 * ColumnSchema - Ordered columns, order given by the caller
 */
export type ColumnSchema = ResolvedColumn[];
