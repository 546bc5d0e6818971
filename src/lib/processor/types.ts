/**
 * Processor module types
 */

import type {
  ColumnSchema,
  ScalarValue,
} from "../../types/data-model.js";
import type { FlattenOptions } from "../flattener/types.js";

export type ProcessorOptions = FlattenOptions;

export interface FlatRecordOutput {
  type: "RECORD";
  stream: string;
  record: Record<string, ScalarValue>;
}

export interface ColumnSchemaOutput {
  type: "SCHEMA";
  stream: string;
  columns: ColumnSchema;
  keyProperties: string[];
  recordCount: number;
}

export interface StateOutput {
  type: "STATE";
  value: unknown;
}

export type ProcessorOutput = FlatRecordOutput | ColumnSchemaOutput | StateOutput;

export interface ProcessorResult {
  streams: ColumnSchemaOutput[];
  records: FlatRecordOutput[];
  state: unknown;
}
