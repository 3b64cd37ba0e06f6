export type Align = "left" | "right";

/** Plain-text table: header, dashed rule, rows; columns two spaces apart. */
export function formatTable(headers: string[], rows: string[][], align: Align[] = []): string[] {
  const widths = headers.map((h, i) =>
    rows.reduce((w, r) => Math.max(w, (r[i] ?? "").length), h.length)
  );

  const line = (cells: string[]) =>
    widths
      .map((w, i) => {
        const c = cells[i] ?? "";
        return align[i] === "right" ? c.padStart(w) : c.padEnd(w);
      })
      .join("  ")
      .trimEnd();

  return [line(headers), line(widths.map((w) => "-".repeat(w))), ...rows.map(line)];
}

/** `Key:   value` lines with values aligned after the longest key. */
export function formatKeyValues(pairs: Array<[string, string]>): string[] {
  const w = pairs.reduce((m, [k]) => Math.max(m, k.length), 0) + 1;
  return pairs.map(([k, v]) => `${`${k}:`.padEnd(w)} ${v}`);
}

export const BAR_WIDTH = 30;

/** Horizontal bar chart scaled so the largest count spans BAR_WIDTH characters. */
export function formatBarChart(entries: Array<[string, number]>): string[] {
  if (entries.length === 0) return ["(none)"];

  const max = entries.reduce((m, [, n]) => Math.max(m, n), 0);
  const lw = entries.reduce((m, [k]) => Math.max(m, k.length), 0);
  const cw = entries.reduce((m, [, n]) => Math.max(m, String(n).length), 0);

  return entries.map(([k, n]) => {
    const bar = "#".repeat(max > 0 ? Math.round((n / max) * BAR_WIDTH) : 0);
    return `${k.padEnd(lw)}  ${String(n).padStart(cw)}  ${bar}`.trimEnd();
  });
}
