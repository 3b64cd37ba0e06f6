import { createHash } from "node:crypto";

/**
 * Stable (canonical) JSON stringify:
 * - object keys are sorted
 * - arrays preserve order
 * - undefined is omitted in objects (like JSON.stringify)
 * - NaN and Infinity become null
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (value === null) return null;

  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;

  if (Array.isArray(value)) return value.map(canonicalize);

  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(value).sort()) {
      const v = value[k];
      if (typeof v === "undefined") continue;
      out[k] = canonicalize(v);
    }
    return out;
  }

  return null;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

export function sha256Hex(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/** Run fingerprint: SHA-256 of the canonical JSON form. */
export function fingerprintOf(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}
