import { parseIsoDate } from "./dates.js";
import type { ConfigViolation } from "./errors.js";
import type { AttributeType, DatasetSchema, ReportOptions, RuleDefinition } from "./schema.js";

export function attributeTypes(s: DatasetSchema): Map<string, AttributeType> {
  return new Map(s.columns.map((c) => [c.attribute, c.type]));
}

export function checkSchemaInvariants(s: DatasetSchema): ConfigViolation[] {
  const v: ConfigViolation[] = [];

  // ---- Unique columns and attributes
  const seenColumns = new Set<string>();
  const seenAttributes = new Set<string>();
  s.columns.forEach((c, i) => {
    if (seenColumns.has(c.column)) {
      v.push({
        code: "DUPLICATE_COLUMN",
        message: `Column '${c.column}' is mapped more than once`,
        path: `/dataset/columns/${i}/column`,
      });
    }
    if (seenAttributes.has(c.attribute)) {
      v.push({
        code: "DUPLICATE_ATTRIBUTE",
        message: `Attribute '${c.attribute}' is declared more than once`,
        path: `/dataset/columns/${i}/attribute`,
      });
    }
    seenColumns.add(c.column);
    seenAttributes.add(c.attribute);
  });

  // ---- Identifier must resolve to a required column
  const idColumn = s.columns.find((c) => c.attribute === s.id_attribute);
  if (!idColumn) {
    v.push({
      code: "UNKNOWN_ATTRIBUTE",
      message: `id_attribute '${s.id_attribute}' is not a declared attribute`,
      path: "/dataset/id_attribute",
    });
  } else if (!idColumn.required) {
    v.push({
      code: "INVALID_SCHEMA",
      message: `id_attribute '${s.id_attribute}' must map to a required column`,
      path: "/dataset/id_attribute",
    });
  }

  // ---- Timestamp, if declared, must be a date column
  if (s.time_attribute !== undefined) {
    const t = s.columns.find((c) => c.attribute === s.time_attribute);
    if (!t) {
      v.push({
        code: "UNKNOWN_ATTRIBUTE",
        message: `time_attribute '${s.time_attribute}' is not a declared attribute`,
        path: "/dataset/time_attribute",
      });
    } else if (t.type !== "date") {
      v.push({
        code: "TYPE_MISMATCH",
        message: `time_attribute '${s.time_attribute}' must have type date, found ${t.type}`,
        path: "/dataset/time_attribute",
      });
    }
  }

  return v;
}

export function checkRuleInvariants(
  name: string,
  r: RuleDefinition,
  types: Map<string, AttributeType>,
  path: string
): ConfigViolation[] {
  const v: ConfigViolation[] = [];

  if (name.trim() === "") {
    v.push({ code: "INVALID_RULE", message: "Rule name must not be empty", path });
  }

  const type = types.get(r.attribute);
  if (type === undefined) {
    v.push({
      code: "UNKNOWN_ATTRIBUTE",
      message: `Rule '${name}' references unknown attribute '${r.attribute}'`,
      path: `${path}/attribute`,
    });
    return v;
  }

  const t = r.threshold;

  if (type === "number") {
    if (typeof t === "string") {
      v.push({
        code: "MALFORMED_THRESHOLD",
        message: `Rule '${name}' compares number attribute '${r.attribute}' with non-numeric threshold '${t}'`,
        path: `${path}/threshold`,
      });
    }
    return v;
  }

  if (type === "string" && (r.comparator === "<" || r.comparator === ">")) {
    v.push({
      code: "TYPE_MISMATCH",
      message: `Rule '${name}' uses ordering comparator '${r.comparator}' on string attribute '${r.attribute}'`,
      path: `${path}/comparator`,
    });
  }

  if (typeof t !== "string") {
    v.push({
      code: "MALFORMED_THRESHOLD",
      message: `Rule '${name}' needs a ${type} threshold for attribute '${r.attribute}'`,
      path: `${path}/threshold`,
    });
  } else if (type === "date" && parseIsoDate(t) === null) {
    v.push({
      code: "MALFORMED_THRESHOLD",
      message: `Rule '${name}' threshold '${t}' is not a valid date`,
      path: `${path}/threshold`,
    });
  }

  return v;
}

export function checkReportInvariants(
  o: ReportOptions,
  types: Map<string, AttributeType>
): ConfigViolation[] {
  const v: ConfigViolation[] = [];

  (o.metrics ?? []).forEach((m, i) => {
    const type = types.get(m);
    if (type === undefined) {
      v.push({
        code: "UNKNOWN_ATTRIBUTE",
        message: `Metric '${m}' is not a declared attribute`,
        path: `/report/metrics/${i}`,
      });
    } else if (type !== "number") {
      v.push({
        code: "TYPE_MISMATCH",
        message: `Metric '${m}' must be a number attribute, found ${type}`,
        path: `/report/metrics/${i}`,
      });
    }
  });

  if (o.top !== undefined) {
    const type = types.get(o.top.attribute);
    if (type === undefined) {
      v.push({
        code: "UNKNOWN_ATTRIBUTE",
        message: `top attribute '${o.top.attribute}' is not a declared attribute`,
        path: "/report/top/attribute",
      });
    } else if (type !== "number") {
      v.push({
        code: "TYPE_MISMATCH",
        message: `top attribute '${o.top.attribute}' must be a number attribute, found ${type}`,
        path: "/report/top/attribute",
      });
    }
  }

  (o.group_by ?? []).forEach((g, i) => {
    if (!types.has(g)) {
      v.push({
        code: "UNKNOWN_ATTRIBUTE",
        message: `group_by attribute '${g}' is not a declared attribute`,
        path: `/report/group_by/${i}`,
      });
    }
  });

  return v;
}
