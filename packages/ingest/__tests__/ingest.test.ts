import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { afterAll, describe, expect, it } from "vitest";

import { DataFormatError } from "../../model/src/errors.js";
import type { DatasetSchema } from "../../model/src/schema.js";
import { SCHEMA } from "../../risk/__tests__/_helpers/fixtures.js";
import { ingestFile, ingestRecords, ingestText, parseValue } from "../src/ingest.js";

const HEADER = "Supplier,Region,Lead time,Defect rate";

const TEXT = [HEADER, "A,EU,20,1.5", 'B,,"1,250",', "C,US,soon,2", ",US,4,1"].join("\n");

describe("ingestText", () => {
  it("maps columns to attributes and types", () => {
    const r = ingestText(TEXT, SCHEMA);
    expect(r.total_rows).toBe(4);
    expect(r.observations).toEqual([
      {
        obs_id: "row-2",
        row: 2,
        entity_id: "A",
        values: { supplier: "A", region: "EU", lead_time: 20, defect_rate: 1.5 },
      },
      { obs_id: "row-3", row: 3, entity_id: "B", values: { supplier: "B", lead_time: 1250 } },
    ]);
    expect(Object.isFrozen(r.observations[0])).toBe(true);
  });

  it("reports malformed rows instead of dropping them", () => {
    const r = ingestText(TEXT, SCHEMA);
    expect(r.rejected.map((e) => e.row)).toEqual([4, 5]);
    expect(r.rejected.map((e) => e.message)).toEqual([
      'Row 4: cannot parse "soon" as number for "lead_time" (column "Lead time")',
      'Row 5: missing required value for "supplier" (column "Supplier")',
    ]);
    expect(r.rejected[0]?.issues[0]).toEqual({
      code: "UNPARSABLE_VALUE",
      message: 'cannot parse "soon" as number for "lead_time" (column "Lead time")',
      column: "Lead time",
      attribute: "lead_time",
    });
  });

  it("throws the first row error in strict mode", () => {
    expect(() => ingestText(TEXT, SCHEMA, { strict: true })).toThrow(
      'Row 4: cannot parse "soon" as number for "lead_time" (column "Lead time")'
    );
  });

  it("flags rows with the wrong number of cells", () => {
    const r = ingestText(`${HEADER}\nA,EU,20`, SCHEMA);
    expect(r.rejected[0]?.issues).toEqual([{ code: "MALFORMED_ROW", message: "expected 4 cells, found 3" }]);
  });

  it("fails the whole file when a required column is missing", () => {
    let err: unknown;
    try {
      ingestText("Supplier,Region\nA,EU", SCHEMA);
    } catch (e) {
      err = e;
    }
    expect(err).toBeInstanceOf(DataFormatError);
    if (err instanceof DataFormatError) {
      expect(err.row).toBe(1);
      expect(err.message).toBe('Row 1: required column "Lead time" not found in header');
    }
  });

  it("tolerates absent optional columns", () => {
    const r = ingestText("Supplier,Lead time\nA,3", SCHEMA);
    expect(r.observations[0]?.values).toEqual({ supplier: "A", lead_time: 3 });
  });

  it("returns an empty result for an empty source", () => {
    expect(ingestText("", SCHEMA)).toEqual({ observations: [], rejected: [], total_rows: 0 });
    expect(ingestText(`${HEADER}\n`, SCHEMA)).toEqual({ observations: [], rejected: [], total_rows: 0 });
  });

  it("normalizes the time attribute", () => {
    const schema: DatasetSchema = {
      id_attribute: "id",
      time_attribute: "shipped",
      columns: [
        { column: "id", attribute: "id", type: "string", required: true },
        { column: "shipped", attribute: "shipped", type: "date", required: true },
      ],
    };
    const r = ingestText("id,shipped\nX,2024-03-01", schema);
    expect(r.observations[0]?.time).toBe("2024-03-01T00:00:00.000Z");
  });

  it("uses the given delimiter", () => {
    const r = ingestText("Supplier;Lead time\nA;7", SCHEMA, { delimiter: ";" });
    expect(r.observations[0]?.values).toEqual({ supplier: "A", lead_time: 7 });
  });
});

describe("ingestRecords", () => {
  it("numbers rows as if under a header line", () => {
    const r = ingestRecords(
      [
        { Supplier: "A", "Lead time": 20 },
        { Supplier: "B", "Lead time": null },
      ],
      SCHEMA
    );
    expect(r.observations.map((o) => o.values)).toEqual([{ supplier: "A", lead_time: 20 }]);
    expect(r.rejected.map((e) => [e.row, e.issues[0]?.code])).toEqual([[3, "MISSING_FIELD"]]);
  });
});

describe("ingestFile", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "supply-risk-ingest-"));
  afterAll(() => fs.rmSync(dir, { recursive: true, force: true }));

  it("reads a file from disk", () => {
    const f = path.join(dir, "data.csv");
    fs.writeFileSync(f, `${HEADER}\nA,EU,20,1`, "utf8");
    expect(ingestFile(f, SCHEMA).observations.map((o) => o.entity_id)).toEqual(["A"]);
  });

  it("lets I/O errors through unchanged", () => {
    expect(() => ingestFile(path.join(dir, "missing.csv"), SCHEMA)).toThrow(/ENOENT/);
  });
});

describe("parseValue", () => {
  it("parses numbers with thousands separators", () => {
    expect(parseValue("1,250", "number")).toBe(1250);
    expect(parseValue(",", "number")).toBeNull();
    expect(parseValue("abc", "number")).toBeNull();
  });

  it("rejects numbers that are not plain decimals", () => {
    expect(parseValue("0x1A", "number")).toBeNull();
    expect(parseValue("1,2,3", "number")).toBeNull();
    expect(parseValue("12,50", "number")).toBeNull();
    expect(parseValue("1e3", "number")).toBeNull();
    expect(parseValue("-0.25", "number")).toBe(-0.25);
    expect(parseValue("12,345,678.5", "number")).toBe(12345678.5);
  });

  it("parses dates to ISO strings", () => {
    expect(parseValue("2024-03-01", "date")).toBe("2024-03-01T00:00:00.000Z");
    expect(parseValue("2024-03-01T10:30:00Z", "date")).toBe("2024-03-01T10:30:00.000Z");
    expect(parseValue("2024-03-01T10:30:00+02:00", "date")).toBe("2024-03-01T08:30:00.000Z");
    expect(parseValue("not a date", "date")).toBeNull();
  });

  it("rejects dates that are not on the calendar or not ISO", () => {
    expect(parseValue("2024-02-30", "date")).toBeNull();
    expect(parseValue("2023-02-29", "date")).toBeNull();
    expect(parseValue("12", "date")).toBeNull();
    expect(parseValue("03/01/2024", "date")).toBeNull();
    expect(parseValue("2024-02-29", "date")).toBe("2024-02-29T00:00:00.000Z");
  });

  it("rejects the row rather than storing a guessed value", () => {
    const schema: DatasetSchema = {
      id_attribute: "id",
      columns: [
        { column: "id", attribute: "id", type: "string", required: true },
        { column: "qty", attribute: "qty", type: "number", required: true },
        { column: "shipped", attribute: "shipped", type: "date", required: true },
      ],
    };
    const r = ingestText("id,qty,shipped\nX,0x1A,2024-02-30\nY,7,2024-03-01", schema);
    expect(r.observations.map((o) => o.entity_id)).toEqual(["Y"]);
    expect(r.rejected.map((e) => ({ row: e.row, issues: e.issues }))).toEqual([
      {
        row: 2,
        issues: [
          {
            code: "UNPARSABLE_VALUE",
            message: 'cannot parse "0x1A" as number for "qty" (column "qty")',
            column: "qty",
            attribute: "qty",
          },
          {
            code: "UNPARSABLE_VALUE",
            message: 'cannot parse "2024-02-30" as date for "shipped" (column "shipped")',
            column: "shipped",
            attribute: "shipped",
          },
        ],
      },
    ]);
  });
});
