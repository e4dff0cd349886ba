/**
 * NDJSON Writer - Transform stream that converts records to NDJSON lines
 */

import { Transform, TransformCallback } from "stream";
import type { Row } from "../../types/data-model.js";
import { projectRow } from "./project.js";

/**
 * Transform stream that converts object-mode records to NDJSON strings
 * Keys follow the given column order so output is stable across runs
 */
export class NDJSONWriter extends Transform {
  constructor(private readonly columns: readonly string[]) {
    super({
      writableObjectMode: true, // Input is records
      readableObjectMode: false, // Output is strings
    });
  }

  _transform(
    chunk: Row,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    try {
      this.push(JSON.stringify(projectRow(chunk, this.columns)) + "\n");
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }
}

/**
 * Create NDJSON writer transform stream
 */
export function createNDJSONWriter(columns: readonly string[]): Transform {
  return new NDJSONWriter(columns);
}
