/**
 * CSV reading and writing (RFC 4180).
 *
 * Every value is kept as text: identities such as "00123" keep their leading
 * zeros and nothing is coerced to a number or boolean here.
 */

import type { RawRow, RawTable } from "../../src/poll_types";

const BOM = "\uFEFF";

/**
 * Quote a CSV field per RFC 4180.
 * Fields containing commas, double quotes, or newlines are wrapped
 * in double quotes. Internal double quotes are escaped by doubling.
 */
export function csvQuote(value: string): string {
  if (
    value.includes(",") ||
    value.includes('"') ||
    value.includes("\n") ||
    value.includes("\r")
  ) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Parse CSV text into records. Quoted fields may span lines; CRLF and LF
 * are both accepted. Field values are not trimmed.
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = "";
  let inQuotes = false;
  let i = text.startsWith(BOM) ? 1 : 0;

  const endRecord = () => {
    fields.push(current);
    current = "";
    // A bare empty line is not a record
    if (!(fields.length === 1 && fields[0] === "")) records.push(fields);
    fields = [];
  };

  while (i < text.length) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (i + 1 < text.length && text[i + 1] === '"') {
          current += '"';
          i += 2;
        } else {
          inQuotes = false;
          i++;
        }
      } else {
        current += ch;
        i++;
      }
    } else if (ch === '"') {
      inQuotes = true;
      i++;
    } else if (ch === ",") {
      fields.push(current);
      current = "";
      i++;
    } else if (ch === "\r" && text[i + 1] === "\n") {
      endRecord();
      i += 2;
    } else if (ch === "\n") {
      endRecord();
      i++;
    } else {
      current += ch;
      i++;
    }
  }
  if (current !== "" || fields.length > 0) endRecord();

  return records;
}

/** First record is the header. Short rows are padded with empty cells. */
export function parseCsvTable(text: string): RawTable {
  const [header, ...records] = parseCsv(text);
  if (!header) return { columns: [], rows: [] };

  const rows = records.map((record) => {
    const row: RawRow = {};
    header.forEach((column, index) => {
      row[column] = record[index] ?? "";
    });
    return row;
  });
  return { columns: header, rows };
}

export function formatCsv(
  columns: readonly string[],
  rows: ReadonlyArray<Record<string, string | number | null>>,
): string {
  const lines = [columns.map(csvQuote).join(",")];
  for (const row of rows) {
    lines.push(
      columns.map((column) => csvQuote(String(row[column] ?? ""))).join(","),
    );
  }
  return lines.join("\n") + "\n";
}
