import * as fs from "node:fs";

import Database from "better-sqlite3";

import type { SupplyRiskReport } from "./report.js";

const DDL = `
CREATE TABLE report_meta (
  key   TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE flags (
  flag_id         TEXT PRIMARY KEY,
  obs_id          TEXT NOT NULL,
  source_row      INTEGER NOT NULL,
  entity_id       TEXT NOT NULL,
  rule            TEXT NOT NULL,
  label           TEXT NOT NULL,
  severity        TEXT NOT NULL,
  attribute       TEXT NOT NULL,
  comparator      TEXT NOT NULL,
  observed        NOT NULL,
  threshold       NOT NULL,
  threshold_basis TEXT NOT NULL
);

CREATE TABLE label_counts (
  label TEXT PRIMARY KEY,
  flags INTEGER NOT NULL
);

CREATE TABLE metrics (
  attribute TEXT PRIMARY KEY,
  count     INTEGER NOT NULL,
  sum       REAL NOT NULL,
  min       REAL,
  max       REAL,
  mean      REAL,
  stddev    REAL
);

CREATE TABLE top_observations (
  rank       INTEGER PRIMARY KEY,
  attribute  TEXT NOT NULL,
  source_row INTEGER NOT NULL,
  entity_id  TEXT NOT NULL,
  value      REAL NOT NULL
);

CREATE TABLE rejected_rows (
  source_row  INTEGER PRIMARY KEY,
  issues_json TEXT NOT NULL
);

CREATE TABLE recommendations (
  rule     TEXT PRIMARY KEY,
  label    TEXT NOT NULL,
  area     TEXT NOT NULL,
  issue    TEXT NOT NULL,
  action   TEXT NOT NULL,
  priority TEXT NOT NULL,
  flags    INTEGER NOT NULL
);
`;

/**
 * Write the report as a fresh SQLite database. A path replaces any existing
 * file; an open handle (e.g. ":memory:" in tests) is written into and left open.
 * Tables and rows go in one transaction, and a path that fails part-way is removed.
 */
export function writeSqliteReport(target: string | Database.Database, report: SupplyRiskReport): void {
  if (typeof target !== "string") {
    writeInto(target, report);
    return;
  }

  fs.rmSync(target, { force: true });
  const db = new Database(target);
  try {
    writeInto(db, report);
  } catch (e) {
    db.close();
    fs.rmSync(target, { force: true });
    throw e;
  }
  db.close();
}

function writeInto(db: Database.Database, report: SupplyRiskReport): void {
  db.transaction(() => {
    db.exec(DDL);

    const meta = db.prepare<[string, string]>("INSERT INTO report_meta (key, value) VALUES (?, ?)");
    const flag = db.prepare<[string, string, number, string, string, string, string, string, string, number | string, number | string, string]>(
      `INSERT INTO flags (flag_id, obs_id, source_row, entity_id, rule, label, severity, attribute, comparator, observed, threshold, threshold_basis)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const label = db.prepare<[string, number]>("INSERT INTO label_counts (label, flags) VALUES (?, ?)");
    const metric = db.prepare<[string, number, number, number | null, number | null, number | null, number | null]>(
      "INSERT INTO metrics (attribute, count, sum, min, max, mean, stddev) VALUES (?, ?, ?, ?, ?, ?, ?)"
    );
    const top = db.prepare<[number, string, number, string, number]>(
      "INSERT INTO top_observations (rank, attribute, source_row, entity_id, value) VALUES (?, ?, ?, ?, ?)"
    );
    const rejected = db.prepare<[number, string]>("INSERT INTO rejected_rows (source_row, issues_json) VALUES (?, ?)");
    const rec = db.prepare<[string, string, string, string, string, string, number]>(
      "INSERT INTO recommendations (rule, label, area, issue, action, priority, flags) VALUES (?, ?, ?, ?, ?, ?, ?)"
    );

    meta.run("title", report.title);
    meta.run("source", report.source);
    meta.run("fingerprint", report.fingerprint);
    meta.run("summary_json", JSON.stringify(report.summary));

    for (const f of report.flags) {
      flag.run(
        f.flag_id,
        f.obs_id,
        f.row,
        f.entity_id,
        f.rule,
        f.label,
        f.severity,
        f.attribute,
        f.comparator,
        f.observed,
        f.threshold,
        f.threshold_basis
      );
    }

    for (const [l, n] of Object.entries(report.summary.flags_by_label)) label.run(l, n);

    for (const m of report.summary.metrics) {
      metric.run(m.attribute, m.count, m.sum, m.min, m.max, m.mean, m.stddev);
    }

    const ranking = report.summary.top;
    if (ranking) {
      ranking.rows.forEach((r, i) => {
        top.run(i + 1, ranking.attribute, r.row, r.entity_id, r.value);
      });
    }

    for (const r of report.rejected) rejected.run(r.row, JSON.stringify(r.issues));

    for (const r of report.recommendations) {
      rec.run(r.rule, r.label, r.area, r.issue, r.action, r.priority, r.count);
    }
  })();
}
