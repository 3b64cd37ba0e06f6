import type { TopRanking } from "../../compute/src/ranking.js";
import type { GroupBreakdown, Summary } from "../../compute/src/summary.js";
import { describeFlag } from "../../explain/src/describe-flag.js";
import { formatNumber } from "../../explain/src/format.js";
import type { SupplyRiskReport } from "./report.js";
import { formatBarChart, formatKeyValues, formatTable } from "./table.js";
import type { Align } from "./table.js";

const NONE = "(none)";

export function renderText(report: SupplyRiskReport): string {
  const s = report.summary;

  const sections: string[][] = [
    [report.title, "=".repeat(report.title.length)],
    formatKeyValues([
      ["Source", report.source],
      ["Fingerprint", report.fingerprint],
      ["Rules", String(report.rules)],
      ["Observations", String(s.observation_count)],
      ["Rejected rows", String(s.rejected_row_count)],
      ["Flags", String(s.flag_count)],
      ["Flagged observations", String(s.flagged_observation_count)],
    ]),
    section("Flags by label", formatBarChart(Object.entries(s.flags_by_label))),
    section(
      "Flags by severity",
      formatTable(
        ["severity", "flags"],
        Object.entries(s.flags_by_severity).map(([k, n]) => [k, String(n)]),
        ["left", "right"]
      )
    ),
    section("Metrics", metricsTable(s)),
    ...s.groups.map((g) => section(`By ${g.attribute}`, groupTable(g, s.metrics.map((m) => m.attribute)))),
    ...(s.top ? [section(`Top ${s.top.n} by ${s.top.attribute}`, topTable(s.top))] : []),
    section(
      "At-risk observations",
      s.at_risk.length === 0
        ? [NONE]
        : formatTable(
            ["row", "entity", "flags", "score", "labels"],
            s.at_risk.map((a) => [
              String(a.row),
              a.entity_id,
              String(a.flag_count),
              String(a.weighted_score),
              a.labels.join(","),
            ]),
            ["right", "left", "right", "right"]
          )
    ),
    section(
      "Recommendations",
      report.recommendations.length === 0
        ? [NONE]
        : formatTable(
            ["priority", "area", "issue", "action"],
            report.recommendations.map((r) => [r.priority, r.area, r.issue, r.action])
          )
    ),
    section(
      "Risk flags",
      report.flags.length === 0
        ? [NONE]
        : formatTable(
            ["row", "entity", "rule", "severity", "reason"],
            report.flags.map((f) => [String(f.row), f.entity_id, f.rule, f.severity, describeFlag(f)]),
            ["right"]
          )
    ),
    section(
      "Skipped rows",
      report.rejected.length === 0
        ? [NONE]
        : formatTable(
            ["row", "issues"],
            report.rejected.map((r) => [String(r.row), r.issues.map((i) => i.message).join("; ")]),
            ["right"]
          )
    ),
  ];

  return sections.map((lines) => lines.join("\n")).join("\n\n") + "\n";
}

function section(title: string, body: string[]): string[] {
  return [title, "-".repeat(title.length), ...body];
}

function metricsTable(s: Summary): string[] {
  if (s.metrics.length === 0) return [NONE];
  return formatTable(
    ["attribute", "count", "sum", "min", "max", "mean", "stddev"],
    s.metrics.map((m) => [
      m.attribute,
      String(m.count),
      formatNumber(m.sum),
      formatNumber(m.min),
      formatNumber(m.max),
      formatNumber(m.mean),
      formatNumber(m.stddev),
    ]),
    ["left", "right", "right", "right", "right", "right", "right"]
  );
}

function groupTable(g: GroupBreakdown, metricNames: string[]): string[] {
  return formatTable(
    [g.attribute, "observations", "flags", ...metricNames.flatMap((m) => [`sum ${m}`, `mean ${m}`])],
    g.rows.map((r) => [
      r.key,
      String(r.observation_count),
      String(r.flag_count),
      ...metricNames.flatMap((m) => [formatNumber(r.sums[m] ?? null), formatNumber(r.means[m] ?? null)]),
    ]),
    ["left", "right", "right", ...metricNames.flatMap((): Align[] => ["right", "right"])]
  );
}

function topTable(t: TopRanking): string[] {
  if (t.rows.length === 0) return [NONE];
  return formatTable(
    ["rank", "row", "entity", t.attribute],
    t.rows.map((r, i) => [String(i + 1), String(r.row), r.entity_id, formatNumber(r.value)]),
    ["right", "right", "left", "right"]
  );
}
