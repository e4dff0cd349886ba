/**
 * CSV serialization (papaparse)
 * Nulls become empty cells; columns follow the batch order
 */

import Papa from "papaparse";
import type { CellValue } from "../../types/data-model.js";
import type { RecordBatch } from "../batch/record-batch.js";
import type { CsvWriterOptions } from "./types.js";

export const DEFAULT_CSV_OPTIONS: CsvWriterOptions = {
  bom: true,
  newline: "\n",
};

function toCsvCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  return String(value);
}

export function serializeCsv(
  batch: RecordBatch,
  options: Partial<CsvWriterOptions> = {},
): string {
  const { bom, newline } = { ...DEFAULT_CSV_OPTIONS, ...options };

  const body = Papa.unparse(
    {
      fields: [...batch.columns],
      data: batch.records.map((record) => batch.columns.map((column) => toCsvCell(record[column]))),
    },
    { newline },
  );

  return (bom ? "\uFEFF" : "") + body + newline;
}
