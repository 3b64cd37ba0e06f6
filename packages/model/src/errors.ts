export type SupplyRiskErrorCode = "CONFIGURATION_ERROR" | "DATA_FORMAT_ERROR";

export class SupplyRiskError extends Error {
  public readonly code: SupplyRiskErrorCode;

  constructor(code: SupplyRiskErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/* --------------------------- Configuration --------------------------- */

export type ConfigViolationCode =
  | "UNREADABLE_CONFIG"
  | "INVALID_SCHEMA"
  | "INVALID_RULE"
  | "INVALID_REPORT_OPTION"
  | "DUPLICATE_COLUMN"
  | "DUPLICATE_ATTRIBUTE"
  | "UNKNOWN_ATTRIBUTE"
  | "MALFORMED_THRESHOLD"
  | "TYPE_MISMATCH";

export type ConfigViolation = {
  code: ConfigViolationCode;
  message: string;
  path: string; // JSON pointer-like path for debugging
};

export class ConfigurationError extends SupplyRiskError {
  public readonly violations: ConfigViolation[];

  constructor(violations: ConfigViolation[]) {
    super(
      "CONFIGURATION_ERROR",
      `Invalid configuration: ${violations.map((v) => `${v.path}: ${v.message}`).join("; ")}`
    );
    this.violations = violations;
  }
}

/* ---------------------------- Data format ---------------------------- */

export type DataFormatIssueCode =
  | "MISSING_COLUMN"
  | "MISSING_FIELD"
  | "UNPARSABLE_VALUE"
  | "MALFORMED_ROW";

export type DataFormatIssue = {
  code: DataFormatIssueCode;
  message: string;
  column?: string;
  attribute?: string;
};

export class DataFormatError extends SupplyRiskError {
  public readonly row: number;
  public readonly issues: DataFormatIssue[];

  constructor(row: number, issues: DataFormatIssue[]) {
    super("DATA_FORMAT_ERROR", `Row ${row}: ${issues.map((i) => i.message).join("; ")}`);
    this.row = row;
    this.issues = issues;
  }
}
