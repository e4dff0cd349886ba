/**
 * CSV source reader (papaparse)
 */

import Papa from "papaparse";
import type { RawTable } from "./types.js";
import type { RawRow } from "../schema/coerce.js";
import { ExtractError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Parse CSV text with a header row; values stay strings until coercion
 */
export function parseCsvTable(content: string, source = "<inline>"): RawTable {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim(),
  });

  const quoteErrors = result.errors.filter((e) => e.type === "Quotes");
  if (quoteErrors.length > 0) {
    const first = quoteErrors[0];
    throw new ExtractError(
      `Malformed CSV in ${source}: ${first ? `${first.message} (row ${first.row ?? "?"})` : "quote error"}`,
      { source, errors: quoteErrors.length },
    );
  }

  const mismatches = result.errors.filter((e) => e.type === "FieldMismatch").length;
  if (mismatches > 0) {
    logger.warn("CSV rows with unexpected field counts", { source, rows: mismatches });
  }

  const headers = (result.meta.fields ?? []).filter((h) => h !== "");
  const rows: RawRow[] = result.data.map((row) => ({ ...row }));

  return { headers, rows };
}
