import type { SupplyRiskReport } from "./report.js";

export function renderJson(report: SupplyRiskReport): string {
  return JSON.stringify(report, null, 2) + "\n";
}
