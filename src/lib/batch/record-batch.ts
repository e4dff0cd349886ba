/**
 * RecordBatch - immutable, column-uniform collection of records
 *
 * Every record exposes every column; absent values are stored as `null`.
 * Batches and their rows are frozen, so a stage that hands a batch
 * downstream cannot change it afterwards.
 */

import type { CellValue, Row } from "../../types/data-model.js";

export class RecordBatch {
  readonly columns: readonly string[];
  readonly records: readonly Readonly<Row>[];

  private constructor(columns: readonly string[], records: readonly Readonly<Row>[]) {
    this.columns = columns;
    this.records = records;
  }

  /**
   * Build a batch from loosely shaped rows; missing columns become null
   */
  static fromRows(columns: readonly string[], rows: readonly Partial<Row>[]): RecordBatch {
    const uniqueColumns = [...new Set(columns)];
    const normalized = rows.map((row) => normalizeRow(uniqueColumns, row));
    return new RecordBatch(Object.freeze(uniqueColumns), Object.freeze(normalized));
  }

  static empty(columns: readonly string[] = []): RecordBatch {
    return RecordBatch.fromRows(columns, []);
  }

  get size(): number {
    return this.records.length;
  }

  get columnCount(): number {
    return this.columns.length;
  }

  hasColumn(column: string): boolean {
    return this.columns.includes(column);
  }

  /**
   * Values of one column in record order (null when the column is absent)
   */
  values(column: string): CellValue[] {
    return this.records.map((record) => record[column] ?? null);
  }

  /**
   * New batch keeping the records the predicate accepts, in order
   */
  filter(predicate: (record: Readonly<Row>, index: number) => boolean): RecordBatch {
    return RecordBatch.fromRows(this.columns, this.records.filter(predicate));
  }

  /**
   * New batch with extra columns appended (or overwritten in place) by `derive`
   */
  withColumns(
    columns: readonly string[],
    derive: (record: Readonly<Row>, index: number) => Row,
  ): RecordBatch {
    const merged = [...this.columns, ...columns.filter((c) => !this.columns.includes(c))];
    const rows = this.records.map((record, index) => ({
      ...record,
      ...derive(record, index),
    }));
    return RecordBatch.fromRows(merged, rows);
  }

  /**
   * Plain mutable copies of the records, for writers and serialization
   */
  toRows(): Row[] {
    return this.records.map((record) => ({ ...record }));
  }
}

function normalizeRow(columns: readonly string[], row: Partial<Row>): Readonly<Row> {
  const normalized: Row = {};
  for (const column of columns) {
    const value = row[column];
    normalized[column] = value === undefined ? null : value;
  }
  return Object.freeze(normalized);
}
