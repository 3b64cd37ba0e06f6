// Supply risk model v1
// Types only. No functions.

export type ISO8601 = string;

/* ------------------------------ Dataset ------------------------------ */

export type AttributeType = "number" | "string" | "date";

export interface ColumnSpec {
  column: string; // header text in the source table
  attribute: string;
  type: AttributeType;
  required: boolean;
}

export interface DatasetSchema {
  id_attribute: string;
  time_attribute?: string;
  columns: ColumnSpec[];
}

/* ---------------------------- Observations --------------------------- */

// dates are carried as normalized ISO strings
export type AttributeValue = number | string;

export interface Observation {
  readonly obs_id: string;
  readonly row: number; // 1-based source line, header is line 1
  readonly entity_id: string;
  readonly time?: ISO8601;
  readonly values: Readonly<Record<string, AttributeValue>>;
}

/* -------------------------------- Rules ------------------------------ */

export type Comparator = "<" | ">" | "==" | "!=";

export type Severity = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export type BatchStatistic = "mean" | "median" | "min" | "max";

export interface StatisticThreshold {
  stat: BatchStatistic;
  plus_std?: number;
}

export type Threshold = number | string | StatisticThreshold;

export type RecommendationPriority = "HIGH" | "MEDIUM" | "LOW";

export interface RuleRecommendation {
  area: string;
  action: string;
  priority: RecommendationPriority;
}

/** One entry of the rule mapping, as written in configuration. */
export interface RuleDefinition {
  attribute: string;
  comparator: Comparator;
  threshold: Threshold;
  label: string;
  severity: Severity;
  description?: string;
  recommendation?: RuleRecommendation;
}

/** A rule bound to the dataset schema it was validated against. */
export interface Rule extends RuleDefinition {
  name: string;
  attribute_type: AttributeType;
}

export interface RuleSet {
  rules: Rule[]; // sorted by name
  labels: string[]; // sorted, unique
}

/* ------------------------------ Flags -------------------------------- */

export interface RiskFlag {
  readonly flag_id: string;
  readonly obs_id: string;
  readonly row: number;
  readonly entity_id: string;

  readonly rule: string;
  readonly label: string;
  readonly severity: Severity;

  readonly attribute: string;
  readonly comparator: Comparator;
  readonly observed: AttributeValue;
  readonly threshold: AttributeValue;
  readonly threshold_basis: string; // "fixed" | "mean" | "mean+1std" ...
}

/* ------------------------------ Report ------------------------------- */

export type ReportFormat = "text" | "json" | "sqlite";

/** Rank observations by a number attribute, highest first, keeping the first `n`. */
export interface TopOption {
  attribute: string;
  n: number;
}

export interface ReportOptions {
  metrics?: string[];
  group_by?: string[];
  at_risk_min_flags?: number;
  top?: TopOption;
  format?: ReportFormat;
  delimiter?: string;
}
