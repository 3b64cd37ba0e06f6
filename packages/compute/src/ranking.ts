import type { Observation, TopOption } from "../../model/src/schema.js";

export type RankedObservation = {
  obs_id: string;
  row: number;
  entity_id: string;
  value: number;
};

export type TopRanking = {
  attribute: string;
  n: number;
  rows: RankedObservation[];
};

/**
 * The `n` observations with the highest value of a number attribute.
 * Ties keep source order; observations without the attribute are left out.
 */
export function rankObservations(observations: readonly Observation[], top: TopOption): TopRanking {
  const rows: RankedObservation[] = [];
  for (const o of observations) {
    const v = o.values[top.attribute];
    if (typeof v !== "number") continue;
    rows.push({ obs_id: o.obs_id, row: o.row, entity_id: o.entity_id, value: v });
  }

  rows.sort((a, b) => b.value - a.value || a.row - b.row);
  return { attribute: top.attribute, n: top.n, rows: rows.slice(0, top.n) };
}
