import type { RecommendationPriority, RiskFlag, Rule } from "../../model/src/schema.js";

export type Recommendation = {
  rule: string;
  label: string;
  area: string;
  issue: string;
  action: string;
  priority: RecommendationPriority;
  count: number;
};

const PRIORITY_ORDER: Record<RecommendationPriority, number> = { HIGH: 0, MEDIUM: 1, LOW: 2 };

/**
 * One recommendation per rule that carries one and fired at least once.
 * Ordered HIGH -> LOW, then by rule name.
 */
export function buildRecommendations(
  rules: readonly Rule[],
  flags: readonly RiskFlag[]
): Recommendation[] {
  const counts = new Map<string, number>();
  for (const f of flags) counts.set(f.rule, (counts.get(f.rule) ?? 0) + 1);

  const out: Recommendation[] = [];
  for (const r of rules) {
    const count = counts.get(r.name) ?? 0;
    if (!r.recommendation || count === 0) continue;
    out.push({
      rule: r.name,
      label: r.label,
      area: r.recommendation.area,
      issue: `${r.label} raised on ${count} observation${count === 1 ? "" : "s"}`,
      action: r.recommendation.action,
      priority: r.recommendation.priority,
      count,
    });
  }

  return out.sort(
    (a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority] || a.rule.localeCompare(b.rule)
  );
}
