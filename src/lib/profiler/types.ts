/**
 * Profiler module types
 */

import type { RecordId } from "../../types/data-model.js";

/**
 * IQR fences of one field; values strictly outside [lower, upper] are outliers
 */
export interface OutlierFences {
  q1: number;
  q3: number;
  iqr: number;
  lower: number;
  upper: number;
}

export interface OutlierAnalysis {
  field: string;
  fences: OutlierFences | null; // null when the field has no numeric values
  valuesConsidered: number;
  rowIndexes: number[];
  recordIds: RecordId[];
}
