/**
 * Processor output writer - one JSON line per flat record, column schema or state
 */

import { Transform, type TransformCallback } from "stream";
import { logger as defaultLogger, type FlattenLogger } from "../../utils/logger.js";
import type { ProcessorOutput } from "../processor/types.js";

export type OutputCounts = Record<ProcessorOutput["type"], number>;

export interface OutputWriterOptions {
  logger?: FlattenLogger;
}

/**
 * Object-mode in, text out. Counts what it wrote per output type and
 * reports the totals when the stream ends.
 */
export class ProcessorOutputWriter extends Transform {
  readonly counts: OutputCounts = { RECORD: 0, SCHEMA: 0, STATE: 0 };
  private readonly logger: FlattenLogger;

  constructor(options: OutputWriterOptions = {}) {
    super({ writableObjectMode: true, readableObjectMode: false });
    this.logger = options.logger ?? defaultLogger;
  }

  _transform(
    chunk: ProcessorOutput,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    let line: string;
    try {
      line = JSON.stringify(chunk) + "\n";
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
      return;
    }
    this.counts[chunk.type] += 1;
    callback(null, line);
  }

  _flush(callback: TransformCallback): void {
    this.logger.debug?.("Output written", { ...this.counts });
    callback();
  }
}

export function createOutputWriter(options: OutputWriterOptions = {}): ProcessorOutputWriter {
  return new ProcessorOutputWriter(options);
}
