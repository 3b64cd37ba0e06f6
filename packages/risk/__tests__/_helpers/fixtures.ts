import type { AttributeValue, DatasetSchema, Observation, RiskFlag, RuleSet } from "../../../model/src/schema.js";
import { evaluateRules } from "../../src/evaluate.js";
import { loadRuleSet } from "../../src/load.js";
import { resolveThresholds } from "../../src/thresholds.js";

export const SCHEMA: DatasetSchema = {
  id_attribute: "supplier",
  columns: [
    { column: "Supplier", attribute: "supplier", type: "string", required: true },
    { column: "Region", attribute: "region", type: "string", required: false },
    { column: "Lead time", attribute: "lead_time", type: "number", required: true },
    { column: "Defect rate", attribute: "defect_rate", type: "number", required: false },
  ],
};

export const RULES = {
  delay: {
    attribute: "lead_time",
    comparator: ">",
    threshold: 14,
    label: "DELAY_RISK",
    severity: "high",
    recommendation: { area: "Supplier Management", action: "Qualify a second source", priority: "high" },
  },
  quality: {
    attribute: "defect_rate",
    comparator: ">",
    threshold: 3,
    label: "quality_risk",
    severity: "medium",
  },
};

export function ruleSet(raw: unknown = RULES): RuleSet {
  return loadRuleSet(raw, SCHEMA);
}

export function obs(row: number, values: Record<string, AttributeValue>): Observation {
  return {
    obs_id: `row-${row}`,
    row,
    entity_id: String(values.supplier),
    values,
  };
}

/** A: both rules, B: none, C: delay only (no region, no defect rate). */
export function sampleObservations(): Observation[] {
  return [
    obs(2, { supplier: "A", region: "EU", lead_time: 20, defect_rate: 5 }),
    obs(3, { supplier: "B", region: "US", lead_time: 10, defect_rate: 1 }),
    obs(4, { supplier: "C", lead_time: 16 }),
  ];
}

export function flagsFor(observations: readonly Observation[], rs: RuleSet = ruleSet()): RiskFlag[] {
  return evaluateRules(observations, resolveThresholds(rs, observations));
}
