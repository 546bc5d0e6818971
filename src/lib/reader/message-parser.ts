/**
 * Message validation using Ajv
 */

import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";
import { ProtocolError } from "../../utils/errors.js";
import type { StreamMessage } from "./types.js";

export const MESSAGE_SCHEMA: SchemaObject = {
  type: "object",
  required: ["type"],
  discriminator: { propertyName: "type" },
  oneOf: [
    {
      properties: {
        type: { const: "SCHEMA" },
        stream: { type: "string", minLength: 1 },
        schema: { type: "object" },
        key_properties: { type: "array", items: { type: "string" } },
      },
      required: ["type", "stream", "schema"],
    },
    {
      properties: {
        type: { const: "RECORD" },
        stream: { type: "string", minLength: 1 },
        record: { type: "object" },
        time_extracted: { type: "string" },
      },
      required: ["type", "stream", "record"],
    },
    {
      properties: {
        type: { const: "STATE" },
        value: {},
      },
      required: ["type", "value"],
    },
  ],
};

export interface MessageViolation {
  path: string;
  message: string;
}

function toViolations(errors: ErrorObject[] | null | undefined): MessageViolation[] {
  return (errors ?? []).map((error) => ({
    path: error.instancePath || error.schemaPath,
    message: `${error.message ?? "invalid"} (keyword: ${error.keyword})`,
  }));
}

export class MessageParser {
  private readonly validateFn: ValidateFunction<StreamMessage>;

  constructor() {
    const ajv = new Ajv({
      discriminator: true,
      allErrors: true,
    });
    this.validateFn = ajv.compile<StreamMessage>(MESSAGE_SCHEMA);
  }

  isMessage(value: unknown): value is StreamMessage {
    return this.validateFn(value);
  }

  /**
   * @throws ProtocolError with the schema violations as details
   */
  parse(value: unknown): StreamMessage {
    if (this.isMessage(value)) {
      return value;
    }
    throw new ProtocolError("Invalid stream message", {
      violations: toViolations(this.validateFn.errors),
    });
  }
}

let sharedParser: MessageParser | null = null;

/**
 * Validate one parsed line against the message schema
 */
export function parseMessage(value: unknown): StreamMessage {
  sharedParser ??= new MessageParser();
  return sharedParser.parse(value);
}
