/**
 * QualityFinding construction
 */

import type {
  FindingKind,
  FindingSeverity,
  QualityFinding,
  RecordId,
} from "../../types/data-model.js";

const DEFAULT_SEVERITY: Record<FindingKind, FindingSeverity> = {
  NullCritical: "critical",
  OutOfRange: "critical",
  Duplicate: "critical",
  Inconsistent: "advisory",
  Outlier: "advisory",
};

export interface FindingInput {
  kind: FindingKind;
  field: string | null;
  recordIds: RecordId[];
  rowIndexes: number[];
  message: string;
  severity?: FindingSeverity;
}

/**
 * Create a frozen finding; severity defaults by kind
 */
export function createFinding(input: FindingInput): QualityFinding {
  return Object.freeze({
    kind: input.kind,
    severity: input.severity ?? DEFAULT_SEVERITY[input.kind],
    field: input.field,
    recordIds: Object.freeze([...input.recordIds]),
    rowIndexes: Object.freeze([...input.rowIndexes]),
    message: input.message,
  });
}

export function isCritical(finding: QualityFinding): boolean {
  return finding.severity === "critical";
}

/**
 * Count findings per kind, for logs and summaries
 */
export function countByKind(findings: readonly QualityFinding[]): Partial<Record<FindingKind, number>> {
  const counts: Partial<Record<FindingKind, number>> = {};
  for (const finding of findings) {
    counts[finding.kind] = (counts[finding.kind] ?? 0) + 1;
  }
  return counts;
}
