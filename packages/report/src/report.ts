import { summarize } from "../../compute/src/summary.js";
import type { Summary } from "../../compute/src/summary.js";
import { buildRecommendations } from "../../explain/src/recommendations.js";
import type { Recommendation } from "../../explain/src/recommendations.js";
import type { DataFormatError, DataFormatIssue } from "../../model/src/errors.js";
import type { DatasetSchema, Observation, RiskFlag, RuleSet, TopOption } from "../../model/src/schema.js";
import { fingerprintOf } from "./hash.js";

export const REPORT_TITLE = "Supply Chain Risk Report";

export type RejectedRow = {
  row: number;
  issues: DataFormatIssue[];
};

export type SupplyRiskReport = {
  title: string;
  source: string;
  fingerprint: string;

  rules: number;
  labels: string[];

  summary: Summary;
  flags: RiskFlag[];
  rejected: RejectedRow[];
  recommendations: Recommendation[];
};

export type ReportInput = {
  source: string;
  schema: DatasetSchema;
  ruleSet: RuleSet;

  observations: readonly Observation[];
  rejected: readonly DataFormatError[];
  flags: readonly RiskFlag[];

  metrics: readonly string[];
  group_by: readonly string[];
  at_risk_min_flags: number;
  top: TopOption | null;
};

/** Assemble the report. Flags and rejections are re-sorted, so input order does not matter. */
export function buildReport(input: ReportInput): SupplyRiskReport {
  const flags = [...input.flags].sort((a, b) => a.row - b.row || a.rule.localeCompare(b.rule));
  const rejected: RejectedRow[] = [...input.rejected]
    .sort((a, b) => a.row - b.row)
    .map((e) => ({ row: e.row, issues: e.issues }));

  const summary = summarize({
    observations: input.observations,
    flags,
    rules: input.ruleSet.rules,
    rejected_row_count: rejected.length,
    metrics: input.metrics,
    group_by: input.group_by,
    at_risk_min_flags: input.at_risk_min_flags,
    top: input.top,
  });

  return {
    title: REPORT_TITLE,
    source: input.source,
    fingerprint: computeFingerprint(input, rejected),

    rules: input.ruleSet.rules.length,
    labels: input.ruleSet.labels,

    summary,
    flags,
    rejected,
    recommendations: buildRecommendations(input.ruleSet.rules, flags),
  };
}

/** SHA-256 over the canonical run inputs; the source path is not part of it. */
export function computeFingerprint(input: ReportInput, rejected: readonly RejectedRow[]): string {
  return fingerprintOf({
    schema: input.schema,
    rules: input.ruleSet.rules,
    options: {
      metrics: input.metrics,
      group_by: input.group_by,
      at_risk_min_flags: input.at_risk_min_flags,
      top: input.top,
    },
    observations: input.observations,
    rejected,
  });
}
