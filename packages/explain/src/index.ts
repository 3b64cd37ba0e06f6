export { describeFlag } from "./describe-flag.js";
export { formatNumber, formatValue } from "./format.js";

export { buildRecommendations } from "./recommendations.js";
export type { Recommendation } from "./recommendations.js";
