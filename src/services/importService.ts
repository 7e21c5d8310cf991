import type {
  CaseApi,
  FieldMap,
  GroupOutcome,
  ImportPreviewGroup,
  ImportSummary,
  StepsField,
} from "../types/domain.js";
import { parseCsvRows } from "../utils/csv.js";
import { MappingError, errorKind, errorMessage } from "../utils/errors.js";
import { encodeSteps, resolveStepsField } from "../utils/steps.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { createFieldMapping, mapCaseFields, type FieldMapping } from "./fieldMappingService.js";
import { assertConsistent, groupRows, rowRange, type CaseGroup } from "./groupingService.js";
import { createSectionResolver, resolveSuite } from "./sectionService.js";

/** Options for one import run. */
export type ImportOptions = {
  projectId: number;
  /** Suite to file cases under; looked up by `suiteName`, or the project's only suite, when absent. */
  suiteId?: number;
  suiteName?: string;
  /** Section path for created cases whose rows leave `section` blank. */
  defaultSection?: string;
  /** Applied to every case, ahead of the CSV's `template_id`/`template` columns. */
  templateId?: number;
  /** Applied to every case, ahead of the CSV's `steps_field` column. */
  stepsField?: StepsField;
  /** Create absent sections parent-first instead of failing the group. Default false. */
  createMissingSections?: boolean;
  /** Column aliases and generic-to-remote field associations. Default: built-ins only. */
  mapping?: FieldMapping;
  /** Abort before any remote call when any group is invalid. Default false. */
  strict?: boolean;
};

export type PreviewOptions = Pick<ImportOptions, "defaultSection" | "templateId" | "stepsField" | "mapping">;

type PreparedGroup =
  | { kind: "invalid"; group: CaseGroup; caseId: number | null; error: Error }
  | { kind: "update"; group: CaseGroup; caseId: number; fields: FieldMap; dropped: string[]; stepsField: StepsField | null }
  | { kind: "create"; group: CaseGroup; fields: FieldMap; dropped: string[]; stepsField: StepsField | null };

function parseCaseId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const caseId = Number(raw);
  return caseId > 0 ? caseId : null;
}

function prepareGroup(group: CaseGroup, mapping: FieldMapping, options: PreviewOptions): PreparedGroup {
  const caseId = group.caseId ? parseCaseId(group.caseId) : null;
  try {
    if (group.conflict) throw group.conflict;
    if (group.caseId && caseId === null) {
      throw new MappingError(`Invalid case_id '${group.caseId}'`);
    }

    const mode = caseId === null ? "create" : "update";
    const mapped = mapCaseFields(group, mapping, { templateId: options.templateId, mode });
    const stepsField = resolveStepsField(group.fields.steps_field, group.steps.length, options.stepsField);

    if (caseId !== null) {
      return { kind: "update", group, caseId, fields: mapped.fields, dropped: mapped.dropped, stepsField };
    }

    if (!group.title.trim()) {
      throw new MappingError("Missing or empty 'title' for a new case");
    }
    if (!group.section.trim() && !options.defaultSection?.trim()) {
      throw new MappingError("Section is required for creating cases");
    }
    return { kind: "create", group, fields: mapped.fields, dropped: mapped.dropped, stepsField };
  } catch (error) {
    return { kind: "invalid", group, caseId, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

function prepareImport(csvText: string, options: PreviewOptions): { totalRows: number; prepared: PreparedGroup[] } {
  const mapping = options.mapping ?? createFieldMapping();
  const { rows } = parseCsvRows(csvText, { columnAliases: mapping.columnAliases });
  const groups = groupRows(rows);
  return {
    totalRows: rows.length,
    prepared: groups.map((group) => prepareGroup(group, mapping, options)),
  };
}

export function previewImport(
  csvText: string,
  options: PreviewOptions = {},
): {
  totalRows: number;
  totalGroups: number;
  createCount: number;
  updateCount: number;
  invalidCount: number;
  groups: ImportPreviewGroup[];
} {
  const { totalRows, prepared } = prepareImport(csvText, options);

  const groups = prepared.map((item): ImportPreviewGroup => {
    const base = {
      ...rowRange(item.group),
      caseId: item.group.caseId,
      title: item.group.title,
      section: item.group.section.trim() ? item.group.section : options.defaultSection ?? "",
      stepCount: item.group.steps.length,
    };
    if (item.kind === "invalid") {
      return { ...base, action: "invalid", fields: {}, dropped: [], errorMessage: item.error.message };
    }
    return { ...base, action: item.kind, fields: item.fields, dropped: item.dropped };
  });

  return {
    totalRows,
    totalGroups: groups.length,
    createCount: groups.filter((group) => group.action === "create").length,
    updateCount: groups.filter((group) => group.action === "update").length,
    invalidCount: groups.filter((group) => group.action === "invalid").length,
    groups,
  };
}

function failedOutcome(group: CaseGroup, caseId: number | null, error: unknown): GroupOutcome {
  return {
    status: "failed",
    ...rowRange(group),
    caseId,
    title: group.title,
    errorKind: errorKind(error),
    error: errorMessage(error),
  };
}

/**
 * Creates or updates one remote case per CSV group, in source order.
 *
 * CSV structure errors, suite lookup errors and (with `strict`) invalid groups are
 * thrown before the first remote call. Past that point every group's failure is
 * recorded in its outcome and the run moves on to the next group.
 */
export async function importCases(
  api: CaseApi,
  csvText: string,
  options: ImportOptions,
  logger: Logger = silentLogger(),
): Promise<ImportSummary> {
  const { prepared } = prepareImport(csvText, options);

  if (options.strict) {
    assertConsistent(prepared.map((item) => item.group));
    for (const item of prepared) {
      if (item.kind === "invalid") throw item.error;
    }
  }

  const needsSections = prepared.some(
    (item) => item.kind === "create" || (item.kind === "update" && item.group.section.trim()),
  );
  const suiteId = needsSections
    ? await resolveSuite(api, options.projectId, { suiteId: options.suiteId, suiteName: options.suiteName })
    : options.suiteId ?? null;
  const sections = createSectionResolver(
    api,
    { projectId: options.projectId, suiteId },
    { createMissing: options.createMissingSections ?? false, logger },
  );

  logger.info("import started", { groups: prepared.length, projectId: options.projectId, suiteId });

  const outcomes: GroupOutcome[] = [];
  for (const item of prepared) {
    const range = rowRange(item.group);

    if (item.kind === "invalid") {
      logger.warn("group rejected", { ...range, error: item.error.message });
      outcomes.push(failedOutcome(item.group, item.caseId, item.error));
      continue;
    }

    if (item.dropped.length) {
      logger.debug("columns not mapped for this template", { ...range, columns: item.dropped });
    }

    const steps = item.stepsField ? encodeSteps(item.group.steps, item.stepsField) : {};

    if (item.kind === "update") {
      try {
        const fields: FieldMap = { ...item.fields };
        if (item.group.section.trim()) {
          fields.section_id = await sections.resolve(item.group.section);
        }
        await api.updateCase(item.caseId, fields, steps);
        logger.debug("case updated", { ...range, caseId: item.caseId });
        outcomes.push({ status: "updated", ...range, caseId: item.caseId, title: item.group.title });
      } catch (error) {
        logger.warn("case update failed", { ...range, caseId: item.caseId, error: errorMessage(error) });
        outcomes.push(failedOutcome(item.group, item.caseId, error));
      }
      continue;
    }

    try {
      const sectionPath = item.group.section.trim() ? item.group.section : options.defaultSection ?? "";
      const sectionId = await sections.resolve(sectionPath);
      const caseId = await api.createCase(sectionId, item.fields, steps);
      logger.debug("case created", { ...range, caseId, sectionId });
      outcomes.push({ status: "created", ...range, caseId, title: item.group.title });
    } catch (error) {
      logger.warn("case create failed", { ...range, error: errorMessage(error) });
      outcomes.push(failedOutcome(item.group, null, error));
    }
  }

  const summary: ImportSummary = {
    suiteId,
    created: outcomes.filter((outcome) => outcome.status === "created").length,
    updated: outcomes.filter((outcome) => outcome.status === "updated").length,
    failed: outcomes.filter((outcome) => outcome.status === "failed").length,
    outcomes,
  };
  logger.info("import finished", { created: summary.created, updated: summary.updated, failed: summary.failed });
  return summary;
}

function describeRows(outcome: GroupOutcome): string {
  return outcome.firstRow === outcome.lastRow ? `row ${outcome.firstRow}` : `rows ${outcome.firstRow}-${outcome.lastRow}`;
}

export function formatImportSummary(summary: ImportSummary): string {
  const lines = [`Created: ${summary.created}`, `Updated: ${summary.updated}`, `Failed: ${summary.failed}`];

  const failures = summary.outcomes.filter((outcome) => outcome.status === "failed");
  if (failures.length) {
    lines.push("", "Failures:");
    for (const failure of failures) {
      const subject = failure.caseId !== null ? `case ${failure.caseId}` : JSON.stringify(failure.title);
      lines.push(`  - ${describeRows(failure)} (${subject}): ${failure.error ?? "unknown error"}`);
    }
  }

  return `${lines.join("\n")}\n`;
}
