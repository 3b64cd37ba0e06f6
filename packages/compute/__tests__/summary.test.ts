import { describe, expect, it } from "vitest";

import { scoreObservations } from "../src/scoring.js";
import { summarize } from "../src/summary.js";
import type { SummaryInput } from "../src/summary.js";
import { flagsFor, obs, ruleSet, sampleObservations } from "../../risk/__tests__/_helpers/fixtures.js";

function input(overrides: Partial<SummaryInput> = {}): SummaryInput {
  const observations = sampleObservations();
  return {
    observations,
    flags: flagsFor(observations),
    rules: ruleSet().rules,
    rejected_row_count: 1,
    metrics: ["lead_time", "defect_rate"],
    group_by: ["region"],
    at_risk_min_flags: 2,
    top: null,
    ...overrides,
  };
}

describe("summarize", () => {
  it("is all zeros for an empty batch", () => {
    const s = summarize(input({ observations: [], flags: [], rejected_row_count: 0, metrics: ["lead_time"], group_by: [] }));
    expect(s).toEqual({
      observation_count: 0,
      rejected_row_count: 0,
      flag_count: 0,
      flagged_observation_count: 0,
      flags_by_label: { DELAY_RISK: 0, QUALITY_RISK: 0 },
      flags_by_severity: { LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 },
      flags_by_rule: { delay: 0, quality: 0 },
      metrics: [{ attribute: "lead_time", count: 0, sum: 0, min: null, max: null, mean: null, stddev: null }],
      groups: [],
      at_risk: [],
      top: null,
    });
  });

  it("counts flags per label, severity and rule", () => {
    const s = summarize(input());
    expect(s.observation_count).toBe(3);
    expect(s.rejected_row_count).toBe(1);
    expect(s.flag_count).toBe(3);
    expect(s.flagged_observation_count).toBe(2);
    expect(s.flags_by_label).toEqual({ DELAY_RISK: 2, QUALITY_RISK: 1 });
    expect(s.flags_by_severity).toEqual({ LOW: 0, MEDIUM: 1, HIGH: 2, CRITICAL: 0 });
    expect(s.flags_by_rule).toEqual({ delay: 2, quality: 1 });
  });

  it("describes each metric", () => {
    const [lead, defects] = summarize(input()).metrics;
    expect(lead).toMatchObject({ attribute: "lead_time", count: 3, sum: 46, min: 10, max: 20 });
    expect(lead?.mean).toBeCloseTo(46 / 3, 10);
    expect(defects).toMatchObject({ attribute: "defect_rate", count: 2, sum: 6, min: 1, max: 5, mean: 3 });
    expect(defects?.stddev).toBeCloseTo(Math.sqrt(8), 10);
  });

  it("breaks observations down by group, with a bucket for missing keys", () => {
    expect(summarize(input()).groups).toEqual([
      {
        attribute: "region",
        rows: [
          {
            key: "(missing)",
            observation_count: 1,
            flag_count: 1,
            sums: { lead_time: 16, defect_rate: 0 },
            means: { lead_time: 16, defect_rate: null },
          },
          {
            key: "EU",
            observation_count: 1,
            flag_count: 2,
            sums: { lead_time: 20, defect_rate: 5 },
            means: { lead_time: 20, defect_rate: 5 },
          },
          {
            key: "US",
            observation_count: 1,
            flag_count: 0,
            sums: { lead_time: 10, defect_rate: 1 },
            means: { lead_time: 10, defect_rate: 1 },
          },
        ],
      },
    ]);
  });

  it("lists observations at or above the flag threshold", () => {
    expect(summarize(input()).at_risk).toEqual([
      { obs_id: "row-2", row: 2, entity_id: "A", flag_count: 2, weighted_score: 5, labels: ["DELAY_RISK", "QUALITY_RISK"] },
    ]);
  });

  it("totals metrics per group", () => {
    const observations = [
      obs(2, { supplier: "A", region: "EU", lead_time: 20 }),
      obs(3, { supplier: "B", region: "EU", lead_time: 5 }),
      obs(4, { supplier: "C", region: "US", lead_time: 7 }),
    ];
    const [region] = summarize(
      input({ observations, flags: flagsFor(observations), metrics: ["lead_time"] })
    ).groups;
    expect(region?.rows.map((r) => [r.key, r.sums.lead_time, r.means.lead_time])).toEqual([
      ["EU", 25, 12.5],
      ["US", 7, 7],
    ]);
  });

  it("ranks the top observations when asked", () => {
    const s = summarize(input({ top: { attribute: "lead_time", n: 2 } }));
    expect(s.top).toEqual({
      attribute: "lead_time",
      n: 2,
      rows: [
        { obs_id: "row-2", row: 2, entity_id: "A", value: 20 },
        { obs_id: "row-4", row: 4, entity_id: "C", value: 16 },
      ],
    });
  });

  it("does not depend on flag order", () => {
    const base = input();
    expect(summarize({ ...base, flags: [...base.flags].reverse() })).toEqual(summarize(base));
  });
});

describe("scoreObservations", () => {
  it("ranks by weighted score, then flag count, then row", () => {
    const observations = [
      ...sampleObservations(),
      obs(5, { supplier: "D", lead_time: 30 }),
      obs(6, { supplier: "E", lead_time: 2, defect_rate: 9 }),
    ];
    const ranked = scoreObservations(flagsFor(observations), { minFlags: 1 });
    expect(ranked.map((a) => [a.entity_id, a.weighted_score, a.flag_count])).toEqual([
      ["A", 5, 2],
      ["C", 3, 1],
      ["D", 3, 1],
      ["E", 2, 1],
    ]);
  });

  it("defaults to two flags", () => {
    expect(scoreObservations(flagsFor(sampleObservations())).map((a) => a.entity_id)).toEqual(["A"]);
  });
});
