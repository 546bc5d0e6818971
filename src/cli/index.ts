#!/usr/bin/env node

/**
 * flatcol CLI - flatten nested JSON records and schemas into typed columns
 */

import { Command } from "commander";
import { createSchemaCommand } from "./commands/schema.js";
import { createFlattenCommand } from "./commands/flatten.js";
import { logger } from "../utils/logger.js";

const pkg = {
  name: "flatcol",
  version: "0.1.0",
  description: "Flatten nested JSON records and schemas into typed columnar layouts",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug");

  program.addCommand(createSchemaCommand());
  program.addCommand(createFlattenCommand());

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
