import * as fs from "node:fs";

import { parseIsoDate } from "../../model/src/dates.js";
import { DataFormatError } from "../../model/src/errors.js";
import type { DataFormatIssue } from "../../model/src/errors.js";
import type {
  AttributeType,
  AttributeValue,
  ColumnSpec,
  DatasetSchema,
  Observation,
} from "../../model/src/schema.js";
import { parseDelimited } from "./delimited.js";
import type { RawRow, RawTable } from "./delimited.js";

export type IngestOptions = {
  // throw the first row-level DataFormatError instead of collecting it
  strict?: boolean;
  delimiter?: string;
};

export type IngestResult = {
  observations: Observation[];
  rejected: DataFormatError[];
  total_rows: number;
};

export type InputRecord = Record<string, string | number | null | undefined>;

const HEADER_LINE = 1;

export function ingestTable(
  table: RawTable,
  schema: DatasetSchema,
  options: IngestOptions = {}
): IngestResult {
  if (table.header.length === 0 && table.rows.length === 0) {
    return { observations: [], rejected: [], total_rows: 0 };
  }

  const index = new Map<string, number>();
  table.header.forEach((h, i) => {
    if (!index.has(h)) index.set(h, i);
  });

  const missing = schema.columns.filter((c) => c.required && !index.has(c.column));
  if (missing.length) {
    throw new DataFormatError(
      HEADER_LINE,
      missing.map((c) => ({
        code: "MISSING_COLUMN",
        message: `required column "${c.column}" not found in header`,
        column: c.column,
        attribute: c.attribute,
      }))
    );
  }

  const observations: Observation[] = [];
  const rejected: DataFormatError[] = [];

  for (const row of table.rows) {
    const r = toObservation(row, table.header.length, index, schema);
    if (r.ok) {
      observations.push(r.observation);
      continue;
    }
    const err = new DataFormatError(row.line, r.issues);
    if (options.strict) throw err;
    rejected.push(err);
  }

  return { observations, rejected, total_rows: table.rows.length };
}

export function ingestText(text: string, schema: DatasetSchema, options: IngestOptions = {}): IngestResult {
  return ingestTable(parseDelimited(text, { delimiter: options.delimiter }), schema, options);
}

/** Reads the whole file; I/O errors propagate unchanged. */
export function ingestFile(filePath: string, schema: DatasetSchema, options: IngestOptions = {}): IngestResult {
  return ingestText(fs.readFileSync(filePath, "utf8"), schema, options);
}

export function ingestRecords(
  records: readonly InputRecord[],
  schema: DatasetSchema,
  options: IngestOptions = {}
): IngestResult {
  return ingestTable(recordsToTable(records), schema, options);
}

/** Header is the union of record keys in first-seen order; rows are numbered as if under a header line. */
export function recordsToTable(records: readonly InputRecord[]): RawTable {
  const header: string[] = [];
  const seen = new Set<string>();
  for (const r of records) {
    for (const k of Object.keys(r)) {
      if (seen.has(k)) continue;
      seen.add(k);
      header.push(k);
    }
  }

  const rows: RawRow[] = records.map((r, i) => ({
    line: i + HEADER_LINE + 1,
    cells: header.map((h) => {
      const v = r[h];
      return v === null || v === undefined ? "" : String(v);
    }),
  }));

  return { header, rows };
}

/* ------------------------------ internals ------------------------------ */

type RowOutcome =
  | { ok: true; observation: Observation }
  | { ok: false; issues: DataFormatIssue[] };

function toObservation(
  row: RawRow,
  width: number,
  index: Map<string, number>,
  schema: DatasetSchema
): RowOutcome {
  if (row.cells.length !== width) {
    return {
      ok: false,
      issues: [
        { code: "MALFORMED_ROW", message: `expected ${width} cells, found ${row.cells.length}` },
      ],
    };
  }

  const values: Record<string, AttributeValue> = {};
  const issues: DataFormatIssue[] = [];

  for (const col of schema.columns) {
    const idx = index.get(col.column);
    if (idx === undefined) continue; // optional column absent from this source

    const raw = (row.cells[idx] ?? "").trim();
    if (raw === "") {
      if (col.required) issues.push(issue("MISSING_FIELD", `missing required value`, col));
      continue;
    }

    const parsed = parseValue(raw, col.type);
    if (parsed === null) {
      issues.push(issue("UNPARSABLE_VALUE", `cannot parse "${raw}" as ${col.type}`, col));
      continue;
    }
    values[col.attribute] = parsed;
  }

  const id = values[schema.id_attribute];
  if (issues.length || id === undefined) return { ok: false, issues };

  const time = schema.time_attribute !== undefined ? values[schema.time_attribute] : undefined;

  const observation: Observation = Object.freeze({
    obs_id: `row-${row.line}`,
    row: row.line,
    entity_id: String(id),
    ...(typeof time === "string" ? { time } : {}),
    values: Object.freeze(values),
  });
  return { ok: true, observation };
}

function issue(code: DataFormatIssue["code"], what: string, col: ColumnSpec): DataFormatIssue {
  return {
    code,
    message: `${what} for "${col.attribute}" (column "${col.column}")`,
    column: col.column,
    attribute: col.attribute,
  };
}

// plain decimals, optionally with grouped thousands: "1,250.5"
const DECIMAL = /^[+-]?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?$/;

export function parseValue(raw: string, type: AttributeType): AttributeValue | null {
  if (type === "string") return raw;

  if (type === "number") {
    if (!DECIMAL.test(raw)) return null;
    return Number(raw.replace(/,/g, ""));
  }

  const t = parseIsoDate(raw);
  return t === null ? null : new Date(t).toISOString();
}
