export type * from "./schema.js";

export {
  SupplyRiskError,
  ConfigurationError,
  DataFormatError,
} from "./errors.js";

export type {
  SupplyRiskErrorCode,
  ConfigViolation,
  ConfigViolationCode,
  DataFormatIssue,
  DataFormatIssueCode,
} from "./errors.js";

export {
  ATTRIBUTE_TYPES,
  COMPARATORS,
  SEVERITIES,
  PRIORITIES,
  BATCH_STATISTICS,
  REPORT_FORMATS,
  DEFAULT_TOP_N,
  issuesToViolations,
  parseDatasetSchemaShape,
  parseRuleMapping,
  parseRuleDefinition,
  parseReportOptionsShape,
  isReportFormat,
} from "./validate.js";

export type { ParseOutcome } from "./validate.js";

export {
  attributeTypes,
  checkSchemaInvariants,
  checkRuleInvariants,
  checkReportInvariants,
} from "./invariants.js";

export { canonicalizeRules, canonicalizeSchema, uniqueSorted } from "./canonicalize.js";
export { loadDatasetSchema } from "./dataset.js";
export { parseIsoDate } from "./dates.js";
