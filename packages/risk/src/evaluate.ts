import type { AttributeValue, Comparator, Observation, RiskFlag } from "../../model/src/schema.js";
import type { ResolvedRule, ResolvedThreshold } from "./thresholds.js";

/**
 * Evaluate every rule against every observation. Rules are independent
 * predicates; an observation yields one flag per rule it satisfies.
 * Output order is (row, rule name) whatever order the rules arrive in.
 */
export function evaluateRules(
  observations: readonly Observation[],
  rules: readonly ResolvedRule[]
): RiskFlag[] {
  const ordered = [...rules].sort((a, b) => a.rule.name.localeCompare(b.rule.name));

  const flags: RiskFlag[] = [];
  for (const o of observations) {
    for (const r of ordered) {
      const f = evaluateRule(o, r);
      if (f) flags.push(f);
    }
  }

  return flags.sort((a, b) => a.row - b.row || a.rule.localeCompare(b.rule));
}

/** The flag for `o` if the rule holds, otherwise null. Missing attribute values never fire. */
export function evaluateRule(o: Observation, r: ResolvedRule): RiskFlag | null {
  const observed = o.values[r.rule.attribute];
  if (observed === undefined) return null;

  const t = r.threshold;
  const cmp = r.rule.comparator;

  const outcome = test(observed, cmp, t);
  if (!outcome || !outcome.fired) return null;

  return Object.freeze({
    flag_id: `${o.obs_id}:${r.rule.name}`,
    obs_id: o.obs_id,
    row: o.row,
    entity_id: o.entity_id,

    rule: r.rule.name,
    label: r.rule.label,
    severity: r.rule.severity,

    attribute: r.rule.attribute,
    comparator: cmp,
    observed,
    threshold: outcome.threshold,
    threshold_basis: t.basis,
  });
}

function test(
  observed: AttributeValue,
  cmp: Comparator,
  t: ResolvedThreshold
): { fired: boolean; threshold: AttributeValue } | null {
  switch (t.kind) {
    case "number":
      if (t.value === null || typeof observed !== "number") return null;
      return { fired: compare(observed, cmp, t.value), threshold: t.value };
    case "string":
      if (typeof observed !== "string") return null;
      return { fired: compare(observed, cmp, t.value), threshold: t.value };
    case "date": {
      if (t.value === null || typeof observed !== "string") return null;
      const ms = Date.parse(observed);
      if (Number.isNaN(ms)) return null;
      return { fired: compare(ms, cmp, t.value), threshold: t.iso };
    }
  }
}

export function compare(a: AttributeValue, cmp: Comparator, b: AttributeValue): boolean {
  switch (cmp) {
    case "<":
      return ordering(a, b) < 0;
    case ">":
      return ordering(a, b) > 0;
    case "==":
      return a === b;
    case "!=":
      return a !== b;
  }
}

function ordering(a: AttributeValue, b: AttributeValue): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const x = String(a);
  const y = String(b);
  return x < y ? -1 : x > y ? 1 : 0;
}
