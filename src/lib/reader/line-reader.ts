/**
 * Line-delimited JSON input reader
 */

import { createReadStream } from "fs";
import * as readline from "readline";
import type { Readable } from "stream";
import {
  ErrorCode,
  FileIOError,
  FlatcolError,
} from "../../utils/errors.js";
import { parseMessage } from "./message-parser.js";
import type { StreamMessage } from "./types.js";

export type LineSource = string | Readable;

function openSource(source: LineSource): Readable {
  if (typeof source !== "string") {
    return source;
  }
  return source === "stdin" || source === "-"
    ? process.stdin
    : createReadStream(source, { encoding: "utf8" });
}

/**
 * Yield one parsed JSON value per non-empty line of a file, stdin ("stdin" or "-")
 * or a readable stream
 */
export async function* readJsonLines(
  source: LineSource,
): AsyncIterableIterator<unknown> {
  const rl = readline.createInterface({
    input: openSource(source),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  try {
    for await (const line of rl) {
      lineNumber += 1;
      const trimmed = line.trim();
      if (trimmed === "") continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch (err) {
        throw new FlatcolError(
          ErrorCode.INPUT_READ_ERROR,
          `Failed to parse JSON on line ${lineNumber}: ${trimmed.substring(0, 100)}`,
          { line: lineNumber },
          { cause: err },
        );
      }
      yield parsed;
    }
  } catch (err) {
    if (err instanceof FlatcolError) {
      throw err;
    }
    throw new FileIOError(
      `Failed to read input from ${typeof source === "string" ? source : "stream"}`,
      undefined,
      { cause: err },
    );
  } finally {
    rl.close();
  }
}

/**
 * Read and validate stream messages
 */
export async function* readMessages(
  source: LineSource,
): AsyncIterableIterator<StreamMessage> {
  for await (const value of readJsonLines(source)) {
    yield parseMessage(value);
  }
}
