/**
 * XLSX source reader (exceljs)
 * Reads the first worksheet; row 1 holds the headers
 */

import ExcelJS from "exceljs";
import type { CellValue } from "exceljs";
import type { RawTable } from "./types.js";
import type { RawRow } from "../schema/coerce.js";
import { ExtractError } from "../../utils/errors.js";

/**
 * Flatten exceljs cell objects (formulas, rich text, hyperlinks) to plain values
 */
export function cellToRaw(value: CellValue): unknown {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date || typeof value !== "object") {
    return value;
  }
  if ("result" in value) {
    return value.result instanceof Date || typeof value.result !== "object"
      ? value.result
      : null;
  }
  if ("richText" in value) {
    return value.richText.map((part) => part.text).join("");
  }
  if ("text" in value) {
    return value.text;
  }
  return null;
}

export async function readXlsxTable(sourcePath: string): Promise<RawTable> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(sourcePath);

  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new ExtractError(`Workbook has no worksheets: ${sourcePath}`, { sourcePath });
  }

  const headerRow = sheet.getRow(1);
  const columns: { index: number; header: string }[] = [];
  for (let index = 1; index <= sheet.columnCount; index++) {
    const header = String(cellToRaw(headerRow.getCell(index).value) ?? "").trim();
    if (header !== "") {
      columns.push({ index, header });
    }
  }

  const rows: RawRow[] = [];
  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return;
    const raw: RawRow = {};
    for (const { index, header } of columns) {
      raw[header] = cellToRaw(row.getCell(index).value);
    }
    rows.push(raw);
  });

  return { headers: columns.map((c) => c.header), rows };
}
