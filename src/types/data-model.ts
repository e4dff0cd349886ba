/**
 * Core data model types for estate-etl
 * These structures flow through the pipeline: extraction → validation → enrichment → anomaly checks → load
 */

/**
 * CellValue - A single field value; `null` is the explicit missing marker
 */
export type CellValue = string | number | boolean | null;

/**
 * RecordId - Listing identifiers are strings ("PROP-0001") or integers
 */
export type RecordId = string | number;

/**
 * Row - One record keyed by column name
 */
export type Row = Record<string, CellValue>;

/**
 * Semantic types a declared schema field can carry
 */
export type FieldType = "string" | "number" | "integer" | "date" | "boolean";

/**
 * Text normalization applied to string fields at load time
 */
export type TextNormalization = "none" | "trim" | "title";

/**
 * SchemaField - Declared column: name, semantic type, nullability
 */
export interface SchemaField {
  name: string;
  type: FieldType;
  nullable: boolean;
  aliases?: string[]; // Alternative source header names (e.g. "precio")
  normalize?: TextNormalization; // Defaults to "trim" for string fields
}

/**
 * RecordSchema - Explicit record shape checked at load time
 */
export interface RecordSchema {
  name: string;
  fields: SchemaField[];
}

/**
 * Columns added by the enricher, in output order
 */
export const DERIVED_COLUMNS = [
  "price_per_m2",
  "price_category",
  "publication_month",
  "publication_year",
  "age_days",
  "price_area_ratio",
] as const;

export type DerivedColumn = (typeof DERIVED_COLUMNS)[number];

export const PRICE_CATEGORIES = ["Economico", "Medio", "Premium"] as const;

export type PriceCategory = (typeof PRICE_CATEGORIES)[number];

/**
 * ListingRecord - Essential listing fields after schema coercion
 */
export interface ListingRecord extends Row {
  id: RecordId | null;
  price: number | null;
  property_type: string | null;
  area_m2: number | null;
  publication_date: string | null;
}

/**
 * Finding kinds raised by the validator and outlier detector
 */
export type FindingKind =
  | "NullCritical"
  | "OutOfRange"
  | "Outlier"
  | "Duplicate"
  | "Inconsistent";

export type FindingSeverity = "critical" | "advisory";

/**
 * QualityFinding - One validation failure; frozen after creation
 */
export interface QualityFinding {
  readonly kind: FindingKind;
  readonly severity: FindingSeverity;
  readonly field: string | null;
  readonly recordIds: readonly RecordId[];
  readonly rowIndexes: readonly number[]; // Positions in the batch the finding was raised on
  readonly message: string;
}

/**
 * QualityReport - Aggregated validator output
 */
export interface QualityReport {
  findings: QualityFinding[];
  passed: boolean; // No critical findings
  criticalCount: number;
  advisoryCount: number;
  recordsChecked: number;
}

/**
 * Orchestrator states
 */
export type PipelineState =
  | "Idle"
  | "Extracted"
  | "Validated"
  | "Enriched"
  | "AnomalyChecked"
  | "Loaded"
  | "Done"
  | "Failed";

/**
 * StateTransition - One recorded orchestrator step
 */
export interface StateTransition {
  from: PipelineState;
  to: PipelineState;
  recordCount: number;
}

/**
 * FatalError - A collaborator or gate failure that halted the run
 */
export interface FatalError {
  state: PipelineState; // State the pipeline was in when it failed
  code: string;
  message: string;
}

/**
 * ColumnStats - Descriptive statistics of a numeric column
 */
export interface ColumnStats {
  count: number;
  mean: number;
  std: number | null; // Sample standard deviation; null below two values
  min: number;
  p25: number;
  p50: number;
  p75: number;
  max: number;
}

/**
 * ProcessingReport - One per pipeline run; frozen once returned
 */
export interface ProcessingReport {
  readonly status: "success" | "failed";
  readonly state: "Done" | "Failed";
  readonly timestamp: string; // ISO-8601 of the run's reference "now"
  readonly inputPath: string;
  readonly outputPath: string;
  readonly inputRecordCount: number;
  readonly outputRecordCount: number;
  readonly columnCount: number;
  readonly findings: readonly QualityFinding[];
  readonly fatalErrors: readonly FatalError[];
  readonly transitions: readonly StateTransition[];
  readonly duplicatesRemoved: number;
  readonly outliersRemoved: number;
  readonly statistics: Readonly<Record<string, ColumnStats>>;
}
