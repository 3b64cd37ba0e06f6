import * as fs from "node:fs";

import type { ConfigViolation } from "../../model/src/errors.js";
import { ConfigurationError } from "../../model/src/errors.js";
import type { ReportFormat } from "../../model/src/schema.js";
import { renderJson } from "./render-json.js";
import { renderText } from "./render-text.js";
import type { SupplyRiskReport } from "./report.js";
import { writeSqliteReport } from "./sqlite-report.js";

export type WriteTarget = {
  format: ReportFormat;
  out?: string;
};

export type WriteResult = {
  format: ReportFormat;
  destination: string | null; // null: caller prints `content`
  content: string | null; // null for sqlite
};

export function checkWriteTarget(t: WriteTarget): ConfigViolation[] {
  if (t.format === "sqlite" && !t.out) {
    return [
      {
        code: "INVALID_REPORT_OPTION",
        message: "sqlite reports need an output path",
        path: "/report/format",
      },
    ];
  }
  return [];
}

/** Render and write. Write failures (missing directory, permissions) propagate unchanged. */
export function writeReport(report: SupplyRiskReport, target: WriteTarget): WriteResult {
  const violations = checkWriteTarget(target);
  if (violations.length) throw new ConfigurationError(violations);

  if (target.format === "sqlite") {
    const out = target.out ?? "";
    writeSqliteReport(out, report);
    return { format: "sqlite", destination: out, content: null };
  }

  const content = target.format === "json" ? renderJson(report) : renderText(report);
  if (target.out) {
    fs.writeFileSync(target.out, content, "utf8");
    return { format: target.format, destination: target.out, content };
  }
  return { format: target.format, destination: null, content };
}
