import * as fs from "node:fs";

import { ingestText } from "../../ingest/src/ingest.js";
import { ConfigurationError } from "../../model/src/errors.js";
import type { ConfigViolation } from "../../model/src/errors.js";
import { isReportFormat } from "../../model/src/validate.js";
import { buildReport } from "../../report/src/report.js";
import type { SupplyRiskReport } from "../../report/src/report.js";
import { checkWriteTarget, writeReport } from "../../report/src/write.js";
import type { WriteResult } from "../../report/src/write.js";
import { evaluateRules } from "../../risk/src/evaluate.js";
import { resolveThresholds } from "../../risk/src/thresholds.js";
import { loadRiskConfig } from "./config.js";
import type { Env, ResolvedReportOptions, RiskConfig } from "./config.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";

const logger = createLogger("pipeline");

export type AnalyzeOptions = {
  strict?: boolean;
  logger?: Logger;
};

export type RunOptions = {
  rulesPath: string;
  dataPath: string;
  out?: string;

  // CLI overrides; they win over the configuration file
  format?: string;
  delimiter?: string;
  strict?: boolean;

  env?: Env;
  logger?: Logger;
  readSource?: (filePath: string) => string;
};

export type RunResult = {
  report: SupplyRiskReport;
  written: WriteResult;
};

/** Ingest, evaluate and summarize one batch of delimited text. */
export function analyze(
  config: RiskConfig,
  text: string,
  source: string,
  options: AnalyzeOptions = {}
): SupplyRiskReport {
  const log = options.logger ?? logger;
  const { schema, ruleSet, report: opts } = config;

  const ingested = ingestText(text, schema, { strict: options.strict, delimiter: opts.delimiter });
  log.info(
    { source, rows: ingested.total_rows, accepted: ingested.observations.length, rejected: ingested.rejected.length },
    "rows ingested"
  );
  for (const e of ingested.rejected) {
    log.warn({ row: e.row, issues: e.issues.map((i) => i.code) }, e.message);
  }

  const resolved = resolveThresholds(ruleSet, ingested.observations);
  const flags = evaluateRules(ingested.observations, resolved);
  log.info({ flags: flags.length }, "rules evaluated");

  return buildReport({
    source,
    schema,
    ruleSet,
    observations: ingested.observations,
    rejected: ingested.rejected,
    flags,
    metrics: opts.metrics,
    group_by: opts.group_by,
    at_risk_min_flags: opts.at_risk_min_flags,
    top: opts.top,
  });
}

/**
 * Full batch run. Configuration and the write target are validated before
 * the data file is opened, so a bad configuration never reads any data.
 */
export function runPipeline(options: RunOptions): RunResult {
  const log = options.logger ?? logger;
  const readSource = options.readSource ?? ((p: string) => fs.readFileSync(p, "utf8"));

  const loaded = loadRiskConfig(options.rulesPath, options.env);
  const report = applyOverrides(loaded.report, options);
  const config: RiskConfig = { ...loaded, report };
  log.info({ rules: config.ruleSet.rules.length, labels: config.ruleSet.labels }, "rules loaded");

  const target = { format: report.format, out: options.out };
  const targetViolations = checkWriteTarget(target);
  if (targetViolations.length) throw new ConfigurationError(targetViolations);

  const text = readSource(options.dataPath);
  const built = analyze(config, text, options.dataPath, { strict: options.strict, logger: log });

  const written = writeReport(built, target);
  log.info({ format: written.format, destination: written.destination ?? "stdout" }, "report written");

  return { report: built, written };
}

function applyOverrides(base: ResolvedReportOptions, o: RunOptions): ResolvedReportOptions {
  const violations: ConfigViolation[] = [];
  const out = { ...base };

  if (o.format !== undefined) {
    const f = o.format.trim().toLowerCase();
    if (isReportFormat(f)) out.format = f;
    else {
      violations.push({
        code: "INVALID_REPORT_OPTION",
        message: `Unknown report format '${o.format}'`,
        path: "/cli/format",
      });
    }
  }

  if (o.delimiter !== undefined) {
    if (o.delimiter.length === 1) out.delimiter = o.delimiter;
    else {
      violations.push({
        code: "INVALID_REPORT_OPTION",
        message: "Delimiter must be a single character",
        path: "/cli/delimiter",
      });
    }
  }

  if (violations.length) throw new ConfigurationError(violations);
  return out;
}
