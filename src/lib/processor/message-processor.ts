/**
 * Message processor - flattens a run of SCHEMA / RECORD / STATE messages
 * into flat records and one column schema per stream
 */

import type { FlatRecord, FlatSchema } from "../../types/data-model.js";
import { ProtocolError } from "../../utils/errors.js";
import { logger as defaultLogger, type FlattenLogger } from "../../utils/logger.js";
import { buildColumnSchema } from "../builder/column-schema.js";
import { FieldOrderTracker } from "../builder/field-order.js";
import {
  flatRecordToObject,
  flattenRecord,
} from "../flattener/record-flattener.js";
import { flattenSchema } from "../flattener/schema-flattener.js";
import { DEFAULT_SEPARATOR } from "../flattener/types.js";
import type {
  RecordMessage,
  SchemaMessage,
  StreamMessage,
} from "../reader/types.js";
import type {
  ColumnSchemaOutput,
  FlatRecordOutput,
  ProcessorOptions,
  ProcessorOutput,
  ProcessorResult,
} from "./types.js";

interface StreamState {
  flatSchema: FlatSchema;
  keyProperties: string[];
  fieldOrder: FieldOrderTracker;
  recordCount: number;
}

export class MessageProcessor {
  private readonly separator: string;
  private readonly logger: FlattenLogger;

  constructor(options: ProcessorOptions = {}) {
    this.separator = options.separator ?? DEFAULT_SEPARATOR;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Yield a flat record per RECORD message as it arrives, then one column
   * schema per stream (first-seen stream order), then the last STATE if any.
   *
   * Columns follow the first-seen order of flattened record keys. A stream
   * without records falls back to the flattened schema's own order.
   * A repeated SCHEMA for a stream replaces its declared types.
   *
   * @throws ProtocolError for a RECORD whose stream has no SCHEMA yet
   * @throws MissingFieldError for record keys the schema does not declare
   * @throws UnsupportedTypeError for declared types without a storage type
   */
  async *process(
    messages: AsyncIterable<StreamMessage> | Iterable<StreamMessage>,
  ): AsyncIterableIterator<ProcessorOutput> {
    const streams = new Map<string, StreamState>();
    let lastState: { value: unknown } | null = null;

    for await (const message of messages) {
      switch (message.type) {
        case "SCHEMA":
          this.applySchema(streams, message);
          break;
        case "RECORD":
          yield this.flattenMessage(streams, message);
          break;
        case "STATE":
          lastState = { value: message.value };
          break;
      }
    }

    for (const [stream, state] of streams) {
      yield this.summarize(stream, state);
    }

    if (lastState) {
      yield { type: "STATE", value: lastState.value };
    }

    this.logger.info?.("Message processing complete", {
      streams: streams.size,
    });
  }

  private applySchema(
    streams: Map<string, StreamState>,
    message: SchemaMessage,
  ): void {
    const flatSchema = flattenSchema(message.schema.properties, {
      separator: this.separator,
      logger: this.logger,
    });
    const existing = streams.get(message.stream);

    if (existing) {
      existing.flatSchema = flatSchema;
      existing.keyProperties = message.key_properties ?? [];
    } else {
      streams.set(message.stream, {
        flatSchema,
        keyProperties: message.key_properties ?? [],
        fieldOrder: new FieldOrderTracker(),
        recordCount: 0,
      });
    }

    this.logger.debug?.("Schema flattened", {
      stream: message.stream,
      fields: flatSchema.size,
    });
  }

  private flattenMessage(
    streams: Map<string, StreamState>,
    message: RecordMessage,
  ): FlatRecordOutput {
    const state = streams.get(message.stream);
    if (!state) {
      throw new ProtocolError(
        `Record for stream ${message.stream} arrived before its schema`,
        { stream: message.stream },
      );
    }

    const row = flattenRecord(message.record, { separator: this.separator });
    state.fieldOrder.observeKeys(this.columnKeys(state.flatSchema, row));
    state.recordCount += 1;

    return {
      type: "RECORD",
      stream: message.stream,
      record: flatRecordToObject(row),
    };
  }

  /**
   * Keys of the row that name columns. A null in place of a declared object
   * flattens to the object's own key, which has columns only under it.
   */
  private *columnKeys(flatSchema: FlatSchema, row: FlatRecord): Iterable<string> {
    for (const [key, value] of row) {
      if (value === null && !flatSchema.has(key) && this.hasDescendants(flatSchema, key)) {
        continue;
      }
      yield key;
    }
  }

  private hasDescendants(flatSchema: FlatSchema, key: string): boolean {
    const prefix = key + this.separator;
    for (const field of flatSchema.keys()) {
      if (field.startsWith(prefix)) {
        return true;
      }
    }
    return false;
  }

  private summarize(stream: string, state: StreamState): ColumnSchemaOutput {
    const fields =
      state.fieldOrder.size > 0
        ? state.fieldOrder.fields()
        : [...state.flatSchema.keys()];

    return {
      type: "SCHEMA",
      stream,
      columns: buildColumnSchema(state.flatSchema, fields),
      keyProperties: state.keyProperties,
      recordCount: state.recordCount,
    };
  }
}

/**
 * Run a processor over all messages and collect its output
 */
export async function processMessages(
  messages: AsyncIterable<StreamMessage> | Iterable<StreamMessage>,
  options: ProcessorOptions = {},
): Promise<ProcessorResult> {
  const result: ProcessorResult = { streams: [], records: [], state: null };

  for await (const output of new MessageProcessor(options).process(messages)) {
    switch (output.type) {
      case "RECORD":
        result.records.push(output);
        break;
      case "SCHEMA":
        result.streams.push(output);
        break;
      case "STATE":
        result.state = output.value;
        break;
    }
  }

  return result;
}
