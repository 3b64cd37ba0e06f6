// YYYY-MM-DD, optionally followed by a time and a zone
const ISO_DATE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,3})?)?(?:Z|[+-]\d{2}:\d{2})?)?$/;

/**
 * Epoch milliseconds for an ISO-8601 date or date-time. Returns null for any
 * other shape and for calendar dates that do not exist (2024-02-30).
 * Date-only values are read as UTC midnight.
 */
export function parseIsoDate(raw: string): number | null {
  const text = raw.trim();
  const m = ISO_DATE.exec(text);
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const calendar = new Date(Date.UTC(year, month - 1, day));
  if (
    calendar.getUTCFullYear() !== year ||
    calendar.getUTCMonth() !== month - 1 ||
    calendar.getUTCDate() !== day
  ) {
    return null;
  }

  const t = Date.parse(text.replace(" ", "T"));
  return Number.isNaN(t) ? null : t;
}
