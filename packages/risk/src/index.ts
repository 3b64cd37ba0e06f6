export { checkRuleSet, loadRuleSet } from "./load.js";
export type { RuleSetCheck } from "./load.js";

export { resolveThresholds, statisticBasis } from "./thresholds.js";
export type { ResolvedRule, ResolvedThreshold } from "./thresholds.js";

export { evaluateRules, evaluateRule, compare } from "./evaluate.js";
