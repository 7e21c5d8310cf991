import { CSV_COLUMNS, type CaseApi, type CaseRecord } from "../types/domain.js";
import { buildCsvText } from "../utils/csv.js";
import { STEP_STORAGE_FIELDS, decodeSteps, textOf } from "../utils/steps.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { createFieldMapping, encodeFieldCell, remoteToGeneric, type FieldMapping } from "./fieldMappingService.js";
import { buildSectionPaths, resolveSuite } from "./sectionService.js";

/** Options for one export run. Case ids win over the list filters. */
export type ExportOptions = {
  projectId: number;
  suiteId?: number;
  suiteName?: string;
  caseIds?: number[];
  sectionId?: number;
  priorityIds?: number[];
  typeIds?: number[];
  mapping?: FieldMapping;
};

export type ExportResult = {
  csvText: string;
  columns: string[];
  caseCount: number;
  rowCount: number;
};

type CsvRecord = Record<string, string>;

const FIXED_COLUMNS = new Set<string>(CSV_COLUMNS);
const CASE_COLUMNS = ["template_id", "type_id", "priority_id", "milestone_id", "estimate", "refs"] as const;

/** One CSV record per step, every record repeating the case-level columns; a case without steps still yields one. */
export function caseToRows(record: CaseRecord, sectionPath: string, mapping: FieldMapping): CsvRecord[] {
  const templateId = typeof record.template_id === "number" ? record.template_id : null;
  const reverse = remoteToGeneric(mapping, templateId);
  const { stepsField, steps } = decodeSteps(record);

  const caseLevel: CsvRecord = {
    case_id: String(record.id),
    title: textOf(record.title),
    section: sectionPath,
    steps_field: stepsField ?? "",
  };
  for (const column of CASE_COLUMNS) {
    caseLevel[column] = encodeFieldCell(column, record[column]);
  }

  for (const [field, value] of Object.entries(record)) {
    if (!field.startsWith("custom_") || STEP_STORAGE_FIELDS.has(field)) continue;
    const column = reverse[field] ?? field;
    if (value === null || value === undefined) {
      if (FIXED_COLUMNS.has(column)) caseLevel[column] = "";
      continue;
    }
    caseLevel[column] = encodeFieldCell(field, value);
  }

  if (!steps.length) {
    return [{ ...caseLevel, step: "", expected: "", additional_info: "", step_refs: "" }];
  }

  return steps.map((step) => ({
    ...caseLevel,
    step: step.content,
    expected: step.expected,
    additional_info: step.additionalInfo,
    step_refs: step.refs,
  }));
}

async function fetchCases(api: CaseApi, options: ExportOptions): Promise<{ cases: CaseRecord[]; suiteId: number | null }> {
  if (options.caseIds?.length) {
    const cases: CaseRecord[] = [];
    for (const caseId of options.caseIds) {
      cases.push(await api.getCase(caseId));
    }
    return { cases, suiteId: options.suiteId ?? null };
  }

  const suiteId = await resolveSuite(api, options.projectId, { suiteId: options.suiteId, suiteName: options.suiteName });
  const cases = await api.listCases({
    projectId: options.projectId,
    suiteId,
    sectionId: options.sectionId,
    priorityIds: options.priorityIds,
    typeIds: options.typeIds,
  });
  return { cases, suiteId };
}

/**
 * Serializes remote cases into the column layout the importer reads. Extra
 * `custom_*` fields follow the fixed columns, sorted by column name.
 */
export async function exportCases(
  api: CaseApi,
  options: ExportOptions,
  logger: Logger = silentLogger(),
): Promise<ExportResult> {
  const mapping = options.mapping ?? createFieldMapping();
  const { cases, suiteId } = await fetchCases(api, options);

  const sectionPathsBySuite = new Map<number | null, Map<number, string>>();
  const sectionPathsFor = async (caseSuiteId: number | null): Promise<Map<number, string>> => {
    const known = sectionPathsBySuite.get(caseSuiteId);
    if (known) return known;
    const paths = buildSectionPaths(await api.listSections(options.projectId, caseSuiteId));
    sectionPathsBySuite.set(caseSuiteId, paths);
    return paths;
  };

  const rows: CsvRecord[] = [];
  for (const record of cases) {
    const caseSuiteId = typeof record.suite_id === "number" ? record.suite_id : suiteId;
    const paths = await sectionPathsFor(caseSuiteId);
    const sectionPath = paths.get(record.section_id) ?? "";
    if (!sectionPath) {
      logger.warn("section path not found for case", { caseId: record.id, sectionId: record.section_id });
    }
    rows.push(...caseToRows(record, sectionPath, mapping));
  }

  const extraColumns = Array.from(new Set(rows.flatMap((row) => Object.keys(row))))
    .filter((column) => !FIXED_COLUMNS.has(column))
    .sort((a, b) => a.localeCompare(b));
  const columns = [...CSV_COLUMNS, ...extraColumns];

  logger.info("export finished", { cases: cases.length, rows: rows.length });

  return {
    csvText: buildCsvText(columns, rows),
    columns,
    caseCount: cases.length,
    rowCount: rows.length,
  };
}
