/**
 * Shared CLI output helpers
 */

import { createWriteStream } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import type { Writable } from "stream";
import {
  ErrorCode,
  FileIOError,
  type FlatcolError,
} from "../utils/errors.js";

/**
 * Load JSON file with proper error handling
 */
export async function loadJSONFile(path: string, description: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    const notFound =
      err instanceof Error && "code" in err && err.code === "ENOENT";
    throw new FileIOError(
      notFound
        ? `${description} not found at: ${path}`
        : `Failed to load ${description} from ${path}`,
      { path },
      { cause: err },
    );
  }

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new FileIOError(`${description} at ${path} is not valid JSON`, { path }, {
      cause: err,
    });
  }
}

/**
 * Write text to a file (creating its directory) or to stdout
 */
export async function writeOutput(text: string, outputPath?: string): Promise<void> {
  if (outputPath && outputPath !== "stdout") {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, text, "utf8");
  } else {
    process.stdout.write(text);
  }
}

/**
 * Open a file for streamed output (creating its directory), or stdout
 */
export async function openOutput(outputPath?: string): Promise<Writable> {
  if (outputPath && outputPath !== "stdout") {
    await mkdir(dirname(outputPath), { recursive: true });
    return createWriteStream(outputPath, { encoding: "utf8" });
  }
  return process.stdout;
}

export function exitCodeFor(error: FlatcolError): number {
  switch (error.code) {
    case ErrorCode.CONFIG_ERROR:
      return 2;
    case ErrorCode.UNSUPPORTED_TYPE:
    case ErrorCode.MISSING_FIELD:
      return 3;
    case ErrorCode.FILE_IO_ERROR:
    case ErrorCode.INPUT_READ_ERROR:
    case ErrorCode.PROTOCOL_ERROR:
      return 4;
    default:
      return 1;
  }
}
