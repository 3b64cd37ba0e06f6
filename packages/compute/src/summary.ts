import type { Observation, RiskFlag, Rule, Severity, TopOption } from "../../model/src/schema.js";
import { rankObservations } from "./ranking.js";
import type { TopRanking } from "./ranking.js";
import { scoreObservations } from "./scoring.js";
import type { AtRiskObservation } from "./scoring.js";
import { describeValues, mean, numericValues, sum } from "./stats.js";
import type { ValueStats } from "./stats.js";

export type MetricStats = { attribute: string } & ValueStats;

export type GroupRow = {
  key: string;
  observation_count: number;
  flag_count: number;
  sums: Record<string, number>;
  means: Record<string, number | null>;
};

export type GroupBreakdown = {
  attribute: string;
  rows: GroupRow[];
};

export type Summary = {
  observation_count: number;
  rejected_row_count: number;
  flag_count: number;
  flagged_observation_count: number;

  flags_by_label: Record<string, number>;
  flags_by_severity: Record<Severity, number>;
  flags_by_rule: Record<string, number>;

  metrics: MetricStats[];
  groups: GroupBreakdown[];
  at_risk: AtRiskObservation[];
  top: TopRanking | null;
};

export type SummaryInput = {
  observations: readonly Observation[];
  flags: readonly RiskFlag[];
  rules: readonly Rule[];
  rejected_row_count: number;

  metrics: readonly string[];
  group_by: readonly string[];
  at_risk_min_flags: number;
  top: TopOption | null;
};

export const MISSING_GROUP_KEY = "(missing)";

/**
 * Summary over one batch. Every count is order-independent, so the result does
 * not depend on the order flags were produced in.
 */
export function summarize(input: SummaryInput): Summary {
  const { observations, flags, rules } = input;

  const flags_by_label = zeroCounts(rules.map((r) => r.label));
  const flags_by_rule = zeroCounts(rules.map((r) => r.name));
  const flags_by_severity: Record<Severity, number> = { LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 };

  const flagged = new Set<string>();
  for (const f of flags) {
    flags_by_label[f.label] = (flags_by_label[f.label] ?? 0) + 1;
    flags_by_rule[f.rule] = (flags_by_rule[f.rule] ?? 0) + 1;
    flags_by_severity[f.severity] += 1;
    flagged.add(f.obs_id);
  }

  const metrics: MetricStats[] = input.metrics.map((attribute) => ({
    attribute,
    ...describeValues(numericValues(observations, attribute)),
  }));

  const groups = input.group_by.map((attribute) =>
    groupBreakdown(attribute, observations, flags, input.metrics)
  );

  return {
    observation_count: observations.length,
    rejected_row_count: input.rejected_row_count,
    flag_count: flags.length,
    flagged_observation_count: flagged.size,

    flags_by_label,
    flags_by_severity,
    flags_by_rule,

    metrics,
    groups,
    at_risk: scoreObservations(flags, { minFlags: input.at_risk_min_flags }),
    top: input.top ? rankObservations(observations, input.top) : null,
  };
}

/* ------------------------------ internals ------------------------------ */

function zeroCounts(keys: readonly string[]): Record<string, number> {
  const sorted = [...new Set(keys)].sort((a, b) => a.localeCompare(b));
  const out: Record<string, number> = {};
  for (const k of sorted) out[k] = 0;
  return out;
}

function groupBreakdown(
  attribute: string,
  observations: readonly Observation[],
  flags: readonly RiskFlag[],
  metricAttributes: readonly string[]
): GroupBreakdown {
  const members = new Map<string, Observation[]>();
  const keyByObs = new Map<string, string>();

  for (const o of observations) {
    const v = o.values[attribute];
    const key = v === undefined ? MISSING_GROUP_KEY : String(v);
    const list = members.get(key) ?? [];
    list.push(o);
    members.set(key, list);
    keyByObs.set(o.obs_id, key);
  }

  const flagCount = new Map<string, number>();
  for (const f of flags) {
    const key = keyByObs.get(f.obs_id);
    if (key === undefined) continue;
    flagCount.set(key, (flagCount.get(key) ?? 0) + 1);
  }

  const rows: GroupRow[] = [...members.entries()]
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([key, list]) => {
      const sums: Record<string, number> = {};
      const means: Record<string, number | null> = {};
      for (const m of metricAttributes) {
        const xs = numericValues(list, m);
        sums[m] = sum(xs);
        means[m] = mean(xs);
      }
      return {
        key,
        observation_count: list.length,
        flag_count: flagCount.get(key) ?? 0,
        sums,
        means,
      };
    });

  return { attribute, rows };
}
