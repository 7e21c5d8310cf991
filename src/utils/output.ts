export const OUTPUT_FORMATS = ["json", "table", "raw"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

type PlainRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is PlainRecord =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const singleLine = (value: string): string => value.replace(/\s+/g, " ").trim();

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "object") return singleLine(JSON.stringify(value));
  return singleLine(String(value));
}

function pick(record: PlainRecord, fields: string[]): PlainRecord {
  const picked: PlainRecord = {};
  for (const field of fields) {
    if (field in record) picked[field] = record[field];
  }
  return picked;
}

/** Keeps only the named keys of a record, or of every record in a list. Other values pass through. */
export function filterFields(value: unknown, fields?: string[]): unknown {
  if (!fields?.length) return value;
  if (Array.isArray(value)) {
    return value.map((item) => (isRecord(item) ? pick(item, fields) : item));
  }
  return isRecord(value) ? pick(value, fields) : value;
}

export function parseFieldList(raw?: string): string[] | undefined {
  if (!raw) return undefined;
  const fields = raw
    .split(",")
    .map((field) => field.trim())
    .filter(Boolean);
  return fields.length ? fields : undefined;
}

export function renderTable(rows: PlainRecord[], columns?: string[]): string {
  if (!rows.length) return "(no results)\n";

  const headers = columns?.length ? columns : Array.from(new Set(rows.flatMap((row) => Object.keys(row))));
  const cells = rows.map((row) => headers.map((header) => cellText(row[header])));
  const widths = headers.map((header, index) => Math.max(header.length, ...cells.map((line) => line[index].length)));

  const formatLine = (values: string[]): string =>
    values
      .map((value, index) => value.padEnd(widths[index]))
      .join("  ")
      .trimEnd();

  const lines = [formatLine(headers), formatLine(widths.map((width) => "-".repeat(width))), ...cells.map(formatLine)];
  return `${lines.join("\n")}\n`;
}

export function renderOutput(value: unknown, format: OutputFormat, fields?: string[]): string {
  const filtered = filterFields(value, fields);

  if (format === "raw") {
    return typeof filtered === "string" ? filtered : `${JSON.stringify(filtered)}\n`;
  }

  if (format === "table") {
    if (Array.isArray(filtered)) {
      return renderTable(filtered.filter(isRecord), fields);
    }
    if (isRecord(filtered)) {
      return renderTable(
        Object.entries(filtered).map(([field, fieldValue]) => ({ field, value: fieldValue })),
        ["field", "value"],
      );
    }
  }

  return `${JSON.stringify(filtered, null, 2)}\n`;
}
