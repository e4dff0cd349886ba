/**
 * File sink - persists a batch as CSV, JSON or NDJSON
 */

import { createWriteStream } from "fs";
import { writeFile } from "fs/promises";
import { extname } from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import type { RecordBatch } from "../batch/record-batch.js";
import { LoadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { writeAtomically } from "../../utils/atomic-write.js";
import { serializeCsv } from "./csv-writer.js";
import { createJSONWriter } from "./json-writer.js";
import { createNDJSONWriter } from "./ndjson-writer.js";
import type { CsvWriterOptions, OutputFormat, Sink } from "./types.js";

const FORMATS_BY_EXTENSION: Record<string, OutputFormat> = {
  ".csv": "csv",
  ".json": "json",
  ".ndjson": "ndjson",
  ".jsonl": "ndjson",
};

// Binary formats whose readers would choke on the CSV fallback
const UNWRITABLE_EXTENSIONS = new Set([".parquet", ".xlsx", ".xls"]);

/**
 * Output format from the extension; anything unknown is written as CSV
 * @throws LoadError for binary formats the sink cannot produce
 */
export function detectOutputFormat(destinationPath: string): OutputFormat {
  const extension = extname(destinationPath).toLowerCase();
  if (UNWRITABLE_EXTENSIONS.has(extension)) {
    throw new LoadError(
      `Unsupported output format: ${extension}. Write .csv, .json or .ndjson instead`,
      { destinationPath, supported: Object.keys(FORMATS_BY_EXTENSION) },
    );
  }

  const format = FORMATS_BY_EXTENSION[extension];
  if (!format) {
    logger.warn("Unrecognized output extension, writing CSV", { destinationPath });
    return "csv";
  }
  return format;
}

export class FileSink implements Sink {
  constructor(private readonly csvOptions: Partial<CsvWriterOptions> = {}) {}

  async load(batch: RecordBatch, destinationPath: string): Promise<void> {
    const format = detectOutputFormat(destinationPath);
    logger.info("Loading records", { destinationPath, format, records: batch.size });

    try {
      await writeAtomically(destinationPath, (tempPath) =>
        this.writeFormat(batch, tempPath, format),
      );
    } catch (error) {
      throw new LoadError(
        `Failed to write ${destinationPath}: ${error instanceof Error ? error.message : String(error)}`,
        { destinationPath, format },
        { cause: error },
      );
    }

    logger.info("Records loaded", { destinationPath, records: batch.size });
  }

  private async writeFormat(
    batch: RecordBatch,
    tempPath: string,
    format: OutputFormat,
  ): Promise<void> {
    if (format === "csv") {
      await writeFile(tempPath, serializeCsv(batch, this.csvOptions), "utf8");
      return;
    }

    const writer =
      format === "json" ? createJSONWriter(batch.columns) : createNDJSONWriter(batch.columns);
    await pipeline(
      Readable.from(batch.toRows()),
      writer,
      createWriteStream(tempPath, { encoding: "utf8" }),
    );
  }
}
