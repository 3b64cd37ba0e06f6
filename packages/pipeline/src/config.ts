import * as fs from "node:fs";
import * as path from "node:path";

import { JSON_SCHEMA, load } from "js-yaml";
import { z } from "zod";

import { loadDatasetSchema } from "../../model/src/dataset.js";
import { ConfigurationError } from "../../model/src/errors.js";
import type { ConfigViolation } from "../../model/src/errors.js";
import { attributeTypes, checkReportInvariants } from "../../model/src/invariants.js";
import type { DatasetSchema, ReportFormat, RuleSet, TopOption } from "../../model/src/schema.js";
import { issuesToViolations, isReportFormat, parseReportOptionsShape } from "../../model/src/validate.js";
import { DEFAULT_AT_RISK_MIN_FLAGS } from "../../compute/src/scoring.js";
import { checkRuleSet } from "../../risk/src/load.js";

export type Env = Record<string, string | undefined>;

export const FORMAT_ENV_VAR = "SUPPLY_RISK_FORMAT";
export const DEFAULT_FORMAT: ReportFormat = "text";
export const DEFAULT_DELIMITER = ",";

export type ResolvedReportOptions = {
  metrics: string[];
  group_by: string[];
  at_risk_min_flags: number;
  top: TopOption | null;
  format: ReportFormat;
  delimiter: string;
};

export type RiskConfig = {
  schema: DatasetSchema;
  ruleSet: RuleSet;
  report: ResolvedReportOptions;
};

const ConfigDocumentSchema = z.object({
  dataset: z.unknown().optional(),
  rules: z.unknown().optional(),
  report: z.unknown().optional(),
});

/**
 * Parse a configuration file: YAML for anything but `.json`. I/O errors propagate.
 * YAML is read with the JSON schema, so `2024-03-01` stays a string.
 */
export function readConfigFile(filePath: string): unknown {
  const text = fs.readFileSync(filePath, "utf8");
  const isJson = path.extname(filePath).toLowerCase() === ".json";

  try {
    return isJson ? parseJson(text) : load(text, { schema: JSON_SCHEMA });
  } catch (e) {
    throw new ConfigurationError([
      {
        code: "UNREADABLE_CONFIG",
        message: `${filePath}: ${e instanceof Error ? e.message : String(e)}`,
        path: "",
      },
    ]);
  }
}

function parseJson(text: string): unknown {
  return JSON.parse(text);
}

/**
 * Validate a whole configuration document. Schema problems are reported on
 * their own (rules cannot be checked without it); rule and report problems
 * are reported together.
 */
export function parseRiskConfig(raw: unknown, env: Env = process.env): RiskConfig {
  const doc = ConfigDocumentSchema.safeParse(raw);
  if (!doc.success) {
    throw new ConfigurationError(issuesToViolations(doc.error.issues, "UNREADABLE_CONFIG", ""));
  }

  const schema = loadDatasetSchema(doc.data.dataset);
  const types = attributeTypes(schema);
  const violations: ConfigViolation[] = [];

  const rules = checkRuleSet(doc.data.rules, schema);
  if (!rules.ok) violations.push(...rules.violations);

  const opts = parseReportOptionsShape(doc.data.report);
  if (!opts.ok) violations.push(...opts.violations);
  else violations.push(...checkReportInvariants(opts.value, types));

  const envFormat = formatFromEnv(env);
  if (!envFormat.ok) violations.push(...envFormat.violations);

  if (!rules.ok || !opts.ok || !envFormat.ok || violations.length) {
    throw new ConfigurationError(violations);
  }

  const o = opts.value;
  return {
    schema,
    ruleSet: rules.ruleSet,
    report: {
      metrics: o.metrics ?? schema.columns.filter((c) => c.type === "number").map((c) => c.attribute),
      group_by: o.group_by ?? [],
      at_risk_min_flags: o.at_risk_min_flags ?? DEFAULT_AT_RISK_MIN_FLAGS,
      top: o.top ?? null,
      format: o.format ?? envFormat.value ?? DEFAULT_FORMAT,
      delimiter: o.delimiter ?? DEFAULT_DELIMITER,
    },
  };
}

export function loadRiskConfig(filePath: string, env: Env = process.env): RiskConfig {
  return parseRiskConfig(readConfigFile(filePath), env);
}

function formatFromEnv(
  env: Env
): { ok: true; value: ReportFormat | undefined } | { ok: false; violations: ConfigViolation[] } {
  const raw = env[FORMAT_ENV_VAR]?.trim().toLowerCase();
  if (!raw) return { ok: true, value: undefined };
  if (isReportFormat(raw)) return { ok: true, value: raw };
  return {
    ok: false,
    violations: [
      {
        code: "INVALID_REPORT_OPTION",
        message: `${FORMAT_ENV_VAR} must be one of text, json, sqlite; got '${raw}'`,
        path: `/env/${FORMAT_ENV_VAR}`,
      },
    ],
  };
}
