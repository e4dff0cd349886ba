/**
 * Key-order projection shared by the JSON writers
 */

import type { Row } from "../../types/data-model.js";

/**
 * Copy of the row with keys in `columns` order; missing columns become null
 */
export function projectRow(row: Readonly<Row>, columns: readonly string[]): Row {
  const projected: Row = {};
  for (const column of columns) {
    projected[column] = row[column] ?? null;
  }
  return projected;
}
