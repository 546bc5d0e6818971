/**
 * Schema CLI command - flatten a JSON Schema file into an ordered column schema
 */

import { Command } from "commander";
import { buildColumnSchema } from "../../lib/builder/column-schema.js";
import { declaresObject, flattenSchema } from "../../lib/flattener/schema-flattener.js";
import type {
  ColumnSchema,
  FieldDeclaration,
  SchemaNode,
} from "../../types/data-model.js";
import { ConfigError, toFlatcolError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { resolveRunConfig } from "../config/resolve.js";
import type { GlobalOptions, SchemaCommandOptions } from "../config/types.js";
import { exitCodeFor, loadJSONFile, writeOutput } from "../output.js";

export interface SchemaResponse {
  status: "success";
  phase: "schema";
  separator: string;
  columns: ColumnSchema;
}

function isFieldDeclaration(value: unknown): value is FieldDeclaration {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSchemaNode(value: unknown): value is SchemaNode {
  return isFieldDeclaration(value) && Object.values(value).every(isFieldDeclaration);
}

/**
 * A root that declares type "object", or has no type but a `properties` mapping,
 * contributes its `properties`; any other mapping is the properties mapping itself.
 */
export function schemaNodeFromDocument(document: unknown): SchemaNode {
  if (isFieldDeclaration(document)) {
    const objectRoot =
      declaresObject(document.type) ||
      (document.type === undefined && isSchemaNode(document.properties));

    if (objectRoot) {
      const properties = document.properties ?? {};
      if (isSchemaNode(properties)) {
        return properties;
      }
    } else if (isSchemaNode(document)) {
      return document;
    }
  }
  throw new ConfigError("Schema document must be an object schema or a properties mapping");
}

export function parseFieldOrder(order: string | undefined): string[] | undefined {
  if (order === undefined) {
    return undefined;
  }
  return order
    .split(",")
    .map((field) => field.trim())
    .filter((field) => field.length > 0);
}

/**
 * Load, flatten and build; no process handling
 */
export async function runSchemaCommand(
  options: SchemaCommandOptions,
  globals: GlobalOptions = {},
): Promise<SchemaResponse> {
  const { flatten, file } = resolveRunConfig({ ...options, logLevel: globals.logLevel });

  const document = await loadJSONFile(options.schema, "Schema");
  const flatSchema = flattenSchema(schemaNodeFromDocument(document), {
    separator: flatten.separator,
  });

  const order =
    parseFieldOrder(options.order) ?? file.schema?.order ?? [...flatSchema.keys()];

  logger.info("Building column schema", {
    fields: flatSchema.size,
    columns: order.length,
  });

  const response: SchemaResponse = {
    status: "success",
    phase: "schema",
    separator: flatten.separator,
    columns: buildColumnSchema(flatSchema, order),
  };

  await writeOutput(JSON.stringify(response, null, 2) + "\n", options.outputPath);
  return response;
}

export function createSchemaCommand(): Command {
  return new Command("schema")
    .description("Flatten a JSON Schema into an ordered, typed column schema")
    .requiredOption("--schema <path>", "Path to a JSON Schema file")
    .option(
      "--order <fields>",
      "Comma-separated flattened field names (default: schema order)",
    )
    .option("--separator <sep>", "Separator joining nested field names")
    .option("--output-path <path>", "Path for the column schema JSON (default: stdout)")
    .option("--config <path>", "Config file (.json, .yaml, .yml)")
    .action(async (options: SchemaCommandOptions, command: Command) => {
      try {
        await runSchemaCommand(options, command.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        const flatcolError = toFlatcolError(error);
        console.error(JSON.stringify(flatcolError.toResponse("schema"), null, 2));
        process.exitCode = exitCodeFor(flatcolError);
      }
    });
}
