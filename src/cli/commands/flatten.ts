/**
 * Flatten CLI command - stream messages in, flat records and column schemas out as NDJSON
 */

import { Command } from "commander";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { createOutputWriter } from "../../lib/emitter/output-writer.js";
import { MessageProcessor } from "../../lib/processor/message-processor.js";
import { readMessages } from "../../lib/reader/line-reader.js";
import { toFlatcolError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { resolveRunConfig } from "../config/resolve.js";
import type { FlattenCommandOptions, GlobalOptions } from "../config/types.js";
import { exitCodeFor, openOutput } from "../output.js";

/**
 * Read, flatten and write; no process handling
 */
export async function runFlattenCommand(
  options: FlattenCommandOptions,
  globals: GlobalOptions = {},
): Promise<void> {
  const { flatten } = resolveRunConfig({ ...options, logLevel: globals.logLevel });

  logger.info("Flattening messages", {
    input: options.inputPath,
    separator: flatten.separator,
  });

  const processor = new MessageProcessor({ separator: flatten.separator });
  const output = await openOutput(options.outputPath);
  const writer = createOutputWriter();

  await pipeline(
    Readable.from(processor.process(readMessages(options.inputPath))),
    writer,
    output,
    { end: output !== process.stdout },
  );

  logger.info("Flatten complete", {
    records: writer.counts.RECORD,
    streams: writer.counts.SCHEMA,
  });
}

export function createFlattenCommand(): Command {
  return new Command("flatten")
    .description(
      "Flatten SCHEMA/RECORD/STATE messages into flat records and per-stream column schemas",
    )
    .requiredOption(
      "--input-path <path>",
      'Path to a line-delimited message file (or "stdin")',
    )
    .option("--output-path <path>", "Path for NDJSON output (default: stdout)")
    .option("--separator <sep>", "Separator joining nested field names")
    .option("--config <path>", "Config file (.json, .yaml, .yml)")
    .action(async (options: FlattenCommandOptions, command: Command) => {
      try {
        await runFlattenCommand(options, command.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        const flatcolError = toFlatcolError(error);
        console.error(JSON.stringify(flatcolError.toResponse("flatten"), null, 2));
        process.exitCode = exitCodeFor(flatcolError);
      }
    });
}
