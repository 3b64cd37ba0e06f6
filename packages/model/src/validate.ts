import { z } from "zod";

import type { ConfigViolation, ConfigViolationCode } from "./errors.js";
import type { DatasetSchema, ReportOptions, RuleDefinition } from "./schema.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

export const ATTRIBUTE_TYPES = ["number", "string", "date"] as const;
export const COMPARATORS = ["<", ">", "==", "!="] as const;
export const SEVERITIES = ["LOW", "MEDIUM", "HIGH", "CRITICAL"] as const;
export const PRIORITIES = ["HIGH", "MEDIUM", "LOW"] as const;
export const BATCH_STATISTICS = ["mean", "median", "min", "max"] as const;
export const REPORT_FORMATS = ["text", "json", "sqlite"] as const;
export const DEFAULT_TOP_N = 10;

const NonEmpty = z.string().trim().min(1);

const AttributeName = z
  .string()
  .trim()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Attribute names must use letters, digits and underscores");

const FiniteNumber = z
  .number()
  .refine(Number.isFinite, "Must be a finite number");

// "High" and "high" are accepted for HIGH
const upper = (v: unknown) => (typeof v === "string" ? v.trim().toUpperCase() : v);

/* ------------------------------------------------------------------ */
/*                               Dataset                              */
/* ------------------------------------------------------------------ */

const ColumnSpecSchema = z.object({
  column: NonEmpty,
  attribute: AttributeName,
  type: z.enum(ATTRIBUTE_TYPES),
  required: z.boolean().default(true),
});

const DatasetSchemaSchema = z.object({
  id_attribute: AttributeName,
  time_attribute: AttributeName.optional(),
  columns: z.array(ColumnSpecSchema).min(1, "At least one column is required"),
});

/* ------------------------------------------------------------------ */
/*                                Rules                               */
/* ------------------------------------------------------------------ */

const ThresholdSchema = z.union([
  FiniteNumber,
  NonEmpty,
  z.object({
    stat: z.enum(BATCH_STATISTICS),
    plus_std: FiniteNumber.optional(),
  }),
]);

const RuleDefinitionSchema = z.object({
  attribute: NonEmpty,
  comparator: z.enum(COMPARATORS),
  threshold: ThresholdSchema,
  label: z.preprocess(upper, NonEmpty),
  severity: z.preprocess(upper, z.enum(SEVERITIES)),
  description: z.string().optional(),
  recommendation: z
    .object({
      area: NonEmpty,
      action: NonEmpty,
      priority: z.preprocess(upper, z.enum(PRIORITIES)),
    })
    .optional(),
});

const RuleMappingSchema = z.record(z.string(), z.unknown());

/* ------------------------------------------------------------------ */
/*                               Report                               */
/* ------------------------------------------------------------------ */

const ReportOptionsSchema = z.object({
  metrics: z.array(AttributeName).optional(),
  group_by: z.array(AttributeName).optional(),
  at_risk_min_flags: z.number().int().min(1).optional(),
  top: z
    .object({
      attribute: AttributeName,
      n: z.number().int().min(1).default(DEFAULT_TOP_N),
    })
    .optional(),
  format: z.preprocess(
    (v) => (typeof v === "string" ? v.trim().toLowerCase() : v),
    z.enum(REPORT_FORMATS)
  ).optional(),
  delimiter: z.string().length(1, "Delimiter must be a single character").optional(),
});

/* ------------------------------------------------------------------ */
/*                               Parsing                              */
/* ------------------------------------------------------------------ */

export type ParseOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; violations: ConfigViolation[] };

type IssueLike = { path: PropertyKey[]; message: string };

export function issuesToViolations(
  issues: readonly IssueLike[],
  code: ConfigViolationCode,
  basePath: string
): ConfigViolation[] {
  return issues.map((i) => ({
    code,
    message: i.message,
    path: [basePath, ...i.path.map((p) => String(p))].join("/"),
  }));
}

export function parseDatasetSchemaShape(input: unknown): ParseOutcome<DatasetSchema> {
  const r = DatasetSchemaSchema.safeParse(input);
  if (!r.success) {
    return { ok: false, violations: issuesToViolations(r.error.issues, "INVALID_SCHEMA", "/dataset") };
  }
  return { ok: true, value: r.data };
}

export function parseRuleMapping(input: unknown): ParseOutcome<Record<string, unknown>> {
  const r = RuleMappingSchema.safeParse(input);
  if (!r.success) {
    return { ok: false, violations: issuesToViolations(r.error.issues, "INVALID_RULE", "/rules") };
  }
  return { ok: true, value: r.data };
}

export function parseRuleDefinition(input: unknown, path: string): ParseOutcome<RuleDefinition> {
  const r = RuleDefinitionSchema.safeParse(input);
  if (!r.success) {
    return { ok: false, violations: issuesToViolations(r.error.issues, "INVALID_RULE", path) };
  }
  return { ok: true, value: r.data };
}

export function parseReportOptionsShape(input: unknown): ParseOutcome<ReportOptions> {
  const r = ReportOptionsSchema.safeParse(input ?? {});
  if (!r.success) {
    return { ok: false, violations: issuesToViolations(r.error.issues, "INVALID_REPORT_OPTION", "/report") };
  }
  return { ok: true, value: r.data };
}

export function isReportFormat(v: string): v is (typeof REPORT_FORMATS)[number] {
  return REPORT_FORMATS.some((f) => f === v);
}
