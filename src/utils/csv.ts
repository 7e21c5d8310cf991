import { parse } from "csv-parse/sync";
import { STEP_COLUMNS, type CsvRow, type StepEntry } from "../types/domain.js";
import { MalformedRowError } from "./errors.js";

export type ParsedCsv = {
  header: string[];
  rows: CsvRow[];
};

export type ParseCsvOptions = {
  columnAliases?: Record<string, string>;
};

const CORE_COLUMNS = new Set(["case_id", "title", "section"]);
const STEP_COLUMN_NAMES: ReadonlySet<string> = new Set(STEP_COLUMNS);
const NUMBERED_STEP_COLUMN = /^(step|expected|additional_info)_(\d+)$/;

function toStringRecords(value: unknown): string[][] {
  if (!Array.isArray(value)) return [];
  return value.map((record) => (Array.isArray(record) ? record.map((cell) => String(cell ?? "")) : []));
}

function isStepColumn(column: string): boolean {
  return (
    column === "teststeps" ||
    STEP_COLUMN_NAMES.has(column) ||
    NUMBERED_STEP_COLUMN.test(column)
  );
}

export function normalizeCaseId(raw: string): string {
  const trimmed = raw.trim();
  const prefixed = /^[Cc](\d+)$/.exec(trimmed);
  return prefixed ? prefixed[1] : trimmed;
}

function isBlank(value: string | undefined): boolean {
  return !String(value ?? "").trim();
}

function makeStep(content = "", expected = "", additionalInfo = "", refs = ""): StepEntry {
  return { content, expected, additionalInfo, refs };
}

export function parseTestStepsCell(cell: string): StepEntry[] {
  return cell
    .split(/\r?\n|\\n/)
    .filter((line) => line.trim())
    .map((line) => {
      const [content = "", expected = "", additionalInfo = ""] = line.split("|").map((part) => part.trim());
      return makeStep(content, expected, additionalInfo);
    });
}

function numberedSteps(values: Record<string, string>): StepEntry[] {
  const numbers = new Set<number>();
  for (const column of Object.keys(values)) {
    const match = NUMBERED_STEP_COLUMN.exec(column);
    if (match) numbers.add(Number(match[2]));
  }

  return Array.from(numbers)
    .sort((a, b) => a - b)
    .map((n) => makeStep(values[`step_${n}`] ?? "", values[`expected_${n}`] ?? "", values[`additional_info_${n}`] ?? ""))
    .filter((step) => !isBlank(step.content) || !isBlank(step.expected) || !isBlank(step.additionalInfo));
}

/**
 * Steps carried by one row. A row that names its `steps_field` and has no other
 * step encoding always holds one step, blank or not, so step positions survive.
 */
function rowSteps(values: Record<string, string>): StepEntry[] {
  const steps = [...parseTestStepsCell(values.teststeps ?? ""), ...numberedSteps(values)];
  const own = makeStep(values.step ?? "", values.expected ?? "", values.additional_info ?? "", values.step_refs ?? "");
  const hasContent = !isBlank(own.content) || !isBlank(own.expected) || !isBlank(own.additionalInfo) || !isBlank(own.refs);
  if (hasContent || (!isBlank(values.steps_field) && !steps.length)) {
    steps.push(own);
  }
  return steps;
}

function readHeader(cells: string[], aliases: Record<string, string>): string[] {
  const header = cells.map((cell) => {
    const name = cell.trim();
    return aliases[name] ?? name;
  });

  const seen = new Set<string>();
  for (const column of header) {
    if (!column) continue;
    if (seen.has(column)) {
      throw new MalformedRowError(`Duplicate column '${column}' in header`, 1);
    }
    seen.add(column);
  }

  if (!seen.has("case_id")) {
    throw new MalformedRowError("Missing required column 'case_id' in header");
  }
  return header;
}

export function parseCsvRows(csvText: string, options: ParseCsvOptions = {}): ParsedCsv {
  let records: string[][];
  try {
    records = toStringRecords(
      parse(csvText, {
        bom: true,
        relax_column_count: true,
        skip_empty_lines: false,
      }),
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown_csv_error";
    throw new MalformedRowError(`Unreadable CSV: ${message}`);
  }

  if (!records.length) {
    throw new MalformedRowError("CSV has no header row");
  }

  const header = readHeader(records[0], options.columnAliases ?? {});
  const rows: CsvRow[] = [];

  records.slice(1).forEach((cells, index) => {
    if (cells.every((cell) => isBlank(cell))) return;

    const values: Record<string, string> = {};
    header.forEach((column, columnIndex) => {
      if (column) values[column] = cells[columnIndex] ?? "";
    });

    const fields: Record<string, string> = {};
    for (const column of header) {
      if (!column || CORE_COLUMNS.has(column) || isStepColumn(column)) continue;
      fields[column] = values[column];
    }

    rows.push({
      rowNumber: index + 2,
      caseId: normalizeCaseId(values.case_id ?? ""),
      title: values.title ?? "",
      section: values.section ?? "",
      fields,
      steps: rowSteps(values),
    });
  });

  return { header, rows };
}

export function parseList(raw: string | undefined): string[] {
  return String(raw || "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function escapeCsvCell(value: unknown): string {
  const normalized = String(value ?? "");
  if (/[",\n\r]/.test(normalized)) {
    return `"${normalized.replace(/"/g, "\"\"")}"`;
  }
  return normalized;
}

export function buildCsvText(columns: readonly string[], rows: Array<Record<string, unknown>>): string {
  const header = columns.join(",");
  if (!rows.length) return `${header}\n`;

  const body = rows
    .map((row) => columns.map((column) => escapeCsvCell(row[column])).join(","))
    .join("\n");

  return `${header}\n${body}\n`;
}
