import type { AttributeValue } from "../../model/src/schema.js";

/** Two decimals at most, no trailing zeros: 20 -> "20", 3.14159 -> "3.14". */
export function formatNumber(x: number | null): string {
  if (x === null) return "-";
  const r = Math.round(x * 100) / 100;
  return String(Object.is(r, -0) ? 0 : r);
}

export function formatValue(v: AttributeValue | null): string {
  return typeof v === "string" ? v : formatNumber(v);
}
