// ---------- Statistics ----------
export {
  numericValues,
  sum,
  mean,
  median,
  minOf,
  maxOf,
  sampleStdDev,
  describeValues,
  batchStatistic,
} from "./stats.js";

export type { ValueStats } from "./stats.js";

// ---------- Scoring ----------
export { scoreObservations, SEVERITY_WEIGHT, DEFAULT_AT_RISK_MIN_FLAGS } from "./scoring.js";
export type { AtRiskObservation } from "./scoring.js";

// ---------- Ranking ----------
export { rankObservations } from "./ranking.js";
export type { RankedObservation, TopRanking } from "./ranking.js";

// ---------- Summary ----------
export { summarize, MISSING_GROUP_KEY } from "./summary.js";
export type { Summary, SummaryInput, MetricStats, GroupRow, GroupBreakdown } from "./summary.js";
