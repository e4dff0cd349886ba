/**
 * JSON array and NDJSON source readers
 */

import { createReadStream } from "fs";
import { readFile } from "fs/promises";
import * as readline from "readline";
import type { RawTable } from "./types.js";
import type { RawRow } from "../schema/coerce.js";
import { ExtractError } from "../../utils/errors.js";

function isRawRow(value: unknown): value is RawRow {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Headers are the union of object keys in first-seen order
 */
function collectHeaders(rows: readonly RawRow[]): string[] {
  const headers = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      headers.add(key);
    }
  }
  return [...headers];
}

export async function readJsonTable(sourcePath: string): Promise<RawTable> {
  const content = await readFile(sourcePath, "utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ExtractError(`Failed to parse JSON source: ${sourcePath}`, undefined, {
      cause: err,
    });
  }

  if (!Array.isArray(parsed) || !parsed.every(isRawRow)) {
    throw new ExtractError(`JSON source must be an array of objects: ${sourcePath}`, {
      sourcePath,
    });
  }

  return { headers: collectHeaders(parsed), rows: parsed };
}

/**
 * Yields one object per non-empty NDJSON line
 */
async function* streamNDJSONRows(sourcePath: string): AsyncIterableIterator<RawRow> {
  const rl = readline.createInterface({
    input: createReadStream(sourcePath, { encoding: "utf8" }),
    crlfDelay: Infinity, // Handle all line endings
  });

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber++;
    const trimmed = line.trim();
    if (trimmed === "") continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (err) {
      throw new ExtractError(
        `Failed to parse NDJSON line ${lineNumber}: ${trimmed.substring(0, 100)}`,
        { sourcePath, lineNumber },
        { cause: err },
      );
    }
    if (!isRawRow(parsed)) {
      throw new ExtractError(`NDJSON line ${lineNumber} is not an object`, {
        sourcePath,
        lineNumber,
      });
    }
    yield parsed;
  }
}

export async function readNdjsonTable(sourcePath: string): Promise<RawTable> {
  const rows: RawRow[] = [];
  for await (const row of streamNDJSONRows(sourcePath)) {
    rows.push(row);
  }
  return { headers: collectHeaders(rows), rows };
}
