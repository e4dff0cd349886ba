/**
 * JSON array writer - Transform stream that converts a record stream to a JSON array
 */

import { Transform, TransformCallback } from "stream";
import type { Row } from "../../types/data-model.js";
import { projectRow } from "./project.js";

/**
 * Writes [ at start, comma-separated records, and ] at end
 */
export class JSONWriter extends Transform {
  private isFirstItem = true;

  constructor(private readonly columns: readonly string[]) {
    super({
      writableObjectMode: true,
      readableObjectMode: false,
    });
  }

  _transform(
    chunk: Row,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    try {
      const json = JSON.stringify(projectRow(chunk, this.columns));
      this.push(this.isFirstItem ? "[\n  " + json : ",\n  " + json);
      this.isFirstItem = false;
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }

  _flush(callback: TransformCallback): void {
    // An empty stream still produces a valid (empty) array
    this.push(this.isFirstItem ? "[]\n" : "\n]\n");
    callback();
  }
}

/**
 * Create a JSON array writer transform stream
 */
export function createJSONWriter(columns: readonly string[]): Transform {
  return new JSONWriter(columns);
}
