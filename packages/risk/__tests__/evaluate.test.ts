import { describe, expect, it } from "vitest";

import type { DatasetSchema } from "../../model/src/schema.js";
import { compare, evaluateRules } from "../src/evaluate.js";
import { loadRuleSet } from "../src/load.js";
import { resolveThresholds } from "../src/thresholds.js";
import { flagsFor, obs, ruleSet, sampleObservations } from "./_helpers/fixtures.js";

describe("evaluateRules", () => {
  it("flags supplier A for a lead time over 14", () => {
    const rs = ruleSet({
      delay: { attribute: "lead_time", comparator: ">", threshold: 14, label: "DELAY_RISK", severity: "HIGH" },
    });
    const flags = flagsFor([obs(2, { supplier: "A", lead_time: 20 })], rs);
    expect(flags).toEqual([
      {
        flag_id: "row-2:delay",
        obs_id: "row-2",
        row: 2,
        entity_id: "A",
        rule: "delay",
        label: "DELAY_RISK",
        severity: "HIGH",
        attribute: "lead_time",
        comparator: ">",
        observed: 20,
        threshold: 14,
        threshold_basis: "fixed",
      },
    ]);
  });

  it("yields one flag per satisfied rule", () => {
    const flags = flagsFor(sampleObservations());
    expect(flags.map((f) => [f.row, f.rule])).toEqual([
      [2, "delay"],
      [2, "quality"],
      [4, "delay"],
    ]);
  });

  it("yields nothing for an observation no rule matches", () => {
    expect(flagsFor([obs(3, { supplier: "B", lead_time: 10, defect_rate: 1 })])).toEqual([]);
  });

  it("yields nothing without rules", () => {
    expect(flagsFor(sampleObservations(), ruleSet({}))).toEqual([]);
  });

  it("does not depend on rule order", () => {
    const observations = sampleObservations();
    const resolved = resolveThresholds(ruleSet(), observations);
    expect(evaluateRules(observations, [...resolved].reverse())).toEqual(evaluateRules(observations, resolved));
  });

  it("compares against batch statistics", () => {
    const rs = ruleSet({
      slow: { attribute: "lead_time", comparator: ">", threshold: { stat: "mean" }, label: "SLOW", severity: "LOW" },
    });
    const flags = flagsFor(
      [obs(2, { supplier: "A", lead_time: 10 }), obs(3, { supplier: "B", lead_time: 20 }), obs(4, { supplier: "C", lead_time: 30 })],
      rs
    );
    expect(flags.map((f) => [f.entity_id, f.threshold, f.threshold_basis])).toEqual([["C", 20, "mean"]]);
  });

  it("never fires an unresolved statistic", () => {
    const rs = ruleSet({
      defects: { attribute: "defect_rate", comparator: ">", threshold: { stat: "mean" }, label: "Q", severity: "LOW" },
    });
    expect(flagsFor([obs(2, { supplier: "A", lead_time: 1 })], rs)).toEqual([]);
  });

  it("matches strings by equality", () => {
    const rs = ruleSet({
      eu: { attribute: "region", comparator: "==", threshold: "EU", label: "REGION_WATCH", severity: "LOW" },
    });
    expect(flagsFor(sampleObservations(), rs).map((f) => f.entity_id)).toEqual(["A"]);
  });

  it("orders dates chronologically", () => {
    const schema: DatasetSchema = {
      id_attribute: "id",
      columns: [
        { column: "id", attribute: "id", type: "string", required: true },
        { column: "shipped", attribute: "shipped", type: "date", required: true },
      ],
    };
    const rs = loadRuleSet(
      { late: { attribute: "shipped", comparator: ">", threshold: "2024-03-01", label: "LATE", severity: "LOW" } },
      schema
    );
    const observations = [
      { obs_id: "row-2", row: 2, entity_id: "X", values: { id: "X", shipped: "2024-04-01T00:00:00.000Z" } },
      { obs_id: "row-3", row: 3, entity_id: "Y", values: { id: "Y", shipped: "2024-02-01T00:00:00.000Z" } },
    ];
    const flags = evaluateRules(observations, resolveThresholds(rs, observations));
    expect(flags.map((f) => [f.entity_id, f.threshold])).toEqual([["X", "2024-03-01T00:00:00.000Z"]]);
  });
});

describe("compare", () => {
  it("supports every comparator", () => {
    expect(compare(3, "<", 4)).toBe(true);
    expect(compare(3, ">", 4)).toBe(false);
    expect(compare("b", ">", "a")).toBe(true);
    expect(compare("A", "==", "A")).toBe(true);
    expect(compare(3, "!=", 3)).toBe(false);
  });
});
