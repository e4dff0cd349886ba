/**
 * File loader - reads a source file and coerces it onto the declared schema
 */

import { readFile, stat } from "fs/promises";
import { extname } from "path";
import type { RecordSchema } from "../../types/data-model.js";
import type { RecordBatch } from "../batch/record-batch.js";
import { coerceRows } from "../schema/coerce.js";
import { DEFAULT_LISTING_SCHEMA } from "../schema/default-schema.js";
import { ExtractError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { parseCsvTable } from "./csv-reader.js";
import { readXlsxTable } from "./excel-reader.js";
import { readJsonTable, readNdjsonTable } from "./json-reader.js";
import type { Loader, RawTable, SourceFormat } from "./types.js";

const FORMATS_BY_EXTENSION: Record<string, SourceFormat> = {
  ".csv": "csv",
  ".xlsx": "xlsx",
  ".json": "json",
  ".ndjson": "ndjson",
  ".jsonl": "ndjson",
};

/**
 * Source format from the file extension, or null when unsupported
 */
export function detectSourceFormat(sourcePath: string): SourceFormat | null {
  return FORMATS_BY_EXTENSION[extname(sourcePath).toLowerCase()] ?? null;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileLoader implements Loader {
  constructor(private readonly schema: RecordSchema = DEFAULT_LISTING_SCHEMA) {}

  async extract(sourcePath: string): Promise<RecordBatch> {
    logger.info("Extracting records", { sourcePath });

    const format = detectSourceFormat(sourcePath);
    if (extname(sourcePath).toLowerCase() === ".xls") {
      throw new ExtractError(
        `Legacy .xls workbooks are not supported: ${sourcePath}. Save the file as .xlsx and retry`,
        { sourcePath, supported: Object.keys(FORMATS_BY_EXTENSION) },
      );
    }
    if (!format) {
      throw new ExtractError(`Unsupported source format: ${extname(sourcePath) || "(none)"}`, {
        sourcePath,
        supported: Object.keys(FORMATS_BY_EXTENSION),
      });
    }

    try {
      const info = await stat(sourcePath);
      if (!info.isFile()) {
        throw new ExtractError(`Source is not a file: ${sourcePath}`, { sourcePath });
      }

      const table = await this.readTable(sourcePath, format);
      const batch = coerceRows(table.rows, table.headers, this.schema);

      logger.info("Records extracted", {
        records: batch.size,
        columns: batch.columnCount,
        format,
      });
      return batch;
    } catch (error) {
      if (error instanceof ExtractError) {
        throw error;
      }
      if (isMissingFileError(error)) {
        throw new ExtractError(`Source file not found: ${sourcePath}`, { sourcePath }, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ExtractError(`Failed to extract ${sourcePath}: ${message}`, { sourcePath }, {
        cause: error,
      });
    }
  }

  private async readTable(sourcePath: string, format: SourceFormat): Promise<RawTable> {
    switch (format) {
      case "csv":
        return parseCsvTable(await readFile(sourcePath, "utf8"), sourcePath);
      case "xlsx":
        return readXlsxTable(sourcePath);
      case "json":
        return readJsonTable(sourcePath);
      case "ndjson":
        return readNdjsonTable(sourcePath);
    }
  }
}
