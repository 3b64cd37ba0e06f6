import { DataFormatError } from "../../model/src/errors.js";

export type RawRow = {
  line: number; // 1-based line where the record starts
  cells: string[];
};

export type RawTable = {
  header: string[];
  rows: RawRow[];
};

/**
 * Parse delimited text (RFC 4180 quoting: "a ""quoted"" cell", embedded
 * delimiters and newlines inside quotes, CRLF or LF line endings).
 * Blank lines are skipped. The first record is the header.
 */
export function parseDelimited(text: string, options: { delimiter?: string } = {}): RawTable {
  const delimiter = options.delimiter ?? ",";
  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const records: RawRow[] = [];

  let cells: string[] = [];
  let field = "";
  let quoted = false; // current field started with a quote
  let inQuotes = false;
  let line = 1;
  let startLine = 1;

  const endRecord = () => {
    cells.push(field);
    const blank = cells.length === 1 && field === "" && !quoted;
    if (!blank) records.push({ line: startLine, cells });
    cells = [];
    field = "";
    quoted = false;
  };

  for (let i = 0; i < src.length; i++) {
    const ch = src.charAt(i);

    if (inQuotes) {
      if (ch === '"') {
        if (src.charAt(i + 1) === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
        continue;
      }
      if (ch === "\n") line++;
      field += ch;
      continue;
    }

    if (ch === '"' && field === "" && !quoted) {
      inQuotes = true;
      quoted = true;
      continue;
    }
    if (ch === delimiter) {
      cells.push(field);
      field = "";
      quoted = false;
      continue;
    }
    if (ch === "\r") continue;
    if (ch === "\n") {
      endRecord();
      line++;
      startLine = line;
      continue;
    }
    field += ch;
  }

  if (inQuotes) {
    throw new DataFormatError(startLine, [
      { code: "MALFORMED_ROW", message: "unterminated quoted field" },
    ]);
  }
  if (field !== "" || cells.length > 0 || quoted) endRecord();

  const [head, ...rows] = records;
  return {
    header: head ? head.cells.map((c) => c.trim()) : [],
    rows,
  };
}
