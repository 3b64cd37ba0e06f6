import type { DatasetSchema, Rule } from "./schema.js";

/**
 * Canonicalize configuration for deterministic downstream computation.
 * - Sorts rules by name
 * - Upper-cases and trims labels
 * - Trims column headers
 *
 * NOTE: We do NOT "fix" invalid configuration here. Only normalize representation.
 */
export function canonicalizeRules(rules: Rule[]): Rule[] {
  return [...rules]
    .map((r) => ({ ...r, name: r.name.trim(), label: r.label.trim().toUpperCase() }))
    .sort(byKey("name"));
}

export function canonicalizeSchema(s: DatasetSchema): DatasetSchema {
  return {
    ...s,
    columns: s.columns.map((c) => ({ ...c, column: c.column.trim() })),
  };
}

export function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort((a, b) => a.localeCompare(b));
}

function byKey<K extends string>(key: K) {
  return (a: Record<K, string>, b: Record<K, string>) =>
    a[key].localeCompare(b[key]);
}
