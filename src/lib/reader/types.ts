/**
 * Reader module types - line-delimited stream messages
 */

import type { NestedRecord, SchemaNode } from "../../types/data-model.js";

/**
 * Root JSON Schema of a stream; its `properties` are what gets flattened
 */
export interface StreamSchema {
  type?: string | string[];
  properties?: SchemaNode;
  [keyword: string]: unknown;
}

export interface SchemaMessage {
  type: "SCHEMA";
  stream: string;
  schema: StreamSchema;
  key_properties?: string[];
}

export interface RecordMessage {
  type: "RECORD";
  stream: string;
  record: NestedRecord;
  time_extracted?: string;
}

export interface StateMessage {
  type: "STATE";
  value: unknown;
}

export type StreamMessage = SchemaMessage | RecordMessage | StateMessage;
