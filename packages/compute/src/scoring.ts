import type { RiskFlag, Severity } from "../../model/src/schema.js";

export const SEVERITY_WEIGHT: Record<Severity, number> = {
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
  CRITICAL: 4,
};

export const DEFAULT_AT_RISK_MIN_FLAGS = 2;

export type AtRiskObservation = {
  obs_id: string;
  row: number;
  entity_id: string;
  flag_count: number;
  weighted_score: number;
  labels: string[];
};

/**
 * Observations carrying at least `minFlags` flags, highest weighted score first.
 * Ties: more flags first, then source order.
 */
export function scoreObservations(
  flags: readonly RiskFlag[],
  options: { minFlags?: number } = {}
): AtRiskObservation[] {
  const minFlags = options.minFlags ?? DEFAULT_AT_RISK_MIN_FLAGS;

  const byObs = new Map<string, { row: number; entity_id: string; count: number; score: number; labels: Set<string> }>();
  for (const f of flags) {
    const cur = byObs.get(f.obs_id) ?? { row: f.row, entity_id: f.entity_id, count: 0, score: 0, labels: new Set<string>() };
    cur.count += 1;
    cur.score += SEVERITY_WEIGHT[f.severity];
    cur.labels.add(f.label);
    byObs.set(f.obs_id, cur);
  }

  return [...byObs.entries()]
    .filter(([, s]) => s.count >= minFlags)
    .map(([obs_id, s]) => ({
      obs_id,
      row: s.row,
      entity_id: s.entity_id,
      flag_count: s.count,
      weighted_score: s.score,
      labels: [...s.labels].sort((a, b) => a.localeCompare(b)),
    }))
    .sort((a, b) => b.weighted_score - a.weighted_score || b.flag_count - a.flag_count || a.row - b.row);
}
