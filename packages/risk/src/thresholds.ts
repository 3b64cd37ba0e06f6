import { batchStatistic, numericValues, sampleStdDev } from "../../compute/src/stats.js";
import { parseIsoDate } from "../../model/src/dates.js";
import type { Observation, Rule, RuleSet, StatisticThreshold } from "../../model/src/schema.js";

export type ResolvedThreshold =
  | { kind: "number"; value: number | null; basis: string }
  | { kind: "string"; value: string; basis: "fixed" }
  | { kind: "date"; value: number | null; iso: string; basis: "fixed" };

export type ResolvedRule = {
  rule: Rule;
  threshold: ResolvedThreshold;
};

/**
 * Turn every rule threshold into a concrete value for this batch.
 * Statistic thresholds are computed over the observations that carry the
 * attribute; with no such values (or no stddev when plus_std is set) the value
 * is null and the rule cannot fire.
 */
export function resolveThresholds(
  ruleSet: RuleSet,
  observations: readonly Observation[]
): ResolvedRule[] {
  return ruleSet.rules.map((rule) => ({ rule, threshold: resolveOne(rule, observations) }));
}

function resolveOne(rule: Rule, observations: readonly Observation[]): ResolvedThreshold {
  const t = rule.threshold;

  if (rule.attribute_type === "date") {
    const ms = typeof t === "string" ? parseIsoDate(t) : null;
    if (ms === null) return { kind: "date", value: null, iso: String(t), basis: "fixed" };
    return { kind: "date", value: ms, iso: new Date(ms).toISOString(), basis: "fixed" };
  }

  if (rule.attribute_type === "string") {
    return { kind: "string", value: String(t), basis: "fixed" };
  }

  if (typeof t === "number") return { kind: "number", value: t, basis: "fixed" };
  if (typeof t === "string") return { kind: "number", value: null, basis: "fixed" };

  return {
    kind: "number",
    value: statisticValue(t, numericValues(observations, rule.attribute)),
    basis: statisticBasis(t),
  };
}

function statisticValue(t: StatisticThreshold, xs: number[]): number | null {
  const base = batchStatistic(xs, t.stat);
  if (base === null) return null;

  const k = t.plus_std ?? 0;
  if (k === 0) return base;

  const sd = sampleStdDev(xs);
  return sd === null ? null : base + k * sd;
}

export function statisticBasis(t: StatisticThreshold): string {
  const k = t.plus_std ?? 0;
  if (k === 0) return t.stat;
  return `${t.stat}${k > 0 ? "+" : "-"}${Math.abs(k)}std`;
}
