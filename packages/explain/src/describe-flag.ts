import type { RiskFlag } from "../../model/src/schema.js";
import { formatValue } from "./format.js";

/**
 * One-line reason for a flag.
 *   lead_time 20 > 14 (DELAY_RISK)
 *   unit_cost 61.5 > 48.25 [mean] (COST_RISK)
 */
export function describeFlag(f: RiskFlag): string {
  const basis = f.threshold_basis === "fixed" ? "" : ` [${f.threshold_basis}]`;
  return `${f.attribute} ${formatValue(f.observed)} ${f.comparator} ${formatValue(f.threshold)}${basis} (${f.label})`;
}
