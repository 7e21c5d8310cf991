import type { CsvRow, GroupKey, StepEntry } from "../types/domain.js";
import { InconsistentCaseFieldsError } from "../utils/errors.js";

export type CaseGroup = {
  key: GroupKey;
  rowNumbers: number[];
  caseId: string;
  title: string;
  section: string;
  fields: Record<string, string>;
  steps: StepEntry[];
  conflict: InconsistentCaseFieldsError | null;
};

function openGroup(row: CsvRow): CaseGroup {
  return {
    key: row.caseId ? { kind: "id", caseId: row.caseId } : { kind: "composite", title: row.title, section: row.section },
    rowNumbers: [row.rowNumber],
    caseId: row.caseId,
    title: row.title,
    section: row.section,
    fields: { ...row.fields },
    steps: [...row.steps],
    conflict: null,
  };
}

function findConflict(group: CaseGroup, firstRow: number, row: CsvRow): InconsistentCaseFieldsError | null {
  const compared: Array<[string, string, string]> = [
    ["title", group.title, row.title],
    ["section", group.section, row.section],
    ...Object.keys(group.fields).map((field): [string, string, string] => [field, group.fields[field], row.fields[field] ?? ""]),
  ];

  for (const [field, expected, actual] of compared) {
    if (expected !== actual) {
      return new InconsistentCaseFieldsError(field, [expected, actual], [firstRow, row.rowNumber]);
    }
  }
  return null;
}

function joinGroup(group: CaseGroup, row: CsvRow): void {
  if (!group.conflict) {
    group.conflict = findConflict(group, group.rowNumbers[0], row);
  }
  group.rowNumbers.push(row.rowNumber);
  group.steps.push(...row.steps);
}

/**
 * Folds step-per-row CSV records into one group per logical case.
 *
 * Rows carrying a case id merge with every other row of the same id, wherever it
 * appears. Rows without one merge only with the row directly above them, and only
 * when that row also has no id and the same title and section.
 */
export function groupRows(rows: CsvRow[]): CaseGroup[] {
  const groups: CaseGroup[] = [];
  const byCaseId = new Map<string, CaseGroup>();
  let previous: { row: CsvRow; group: CaseGroup } | null = null;

  for (const row of rows) {
    let group: CaseGroup | undefined;

    if (row.caseId) {
      group = byCaseId.get(row.caseId);
      if (group) {
        joinGroup(group, row);
      } else {
        group = openGroup(row);
        byCaseId.set(row.caseId, group);
        groups.push(group);
      }
    } else if (previous && !previous.row.caseId && previous.row.title === row.title && previous.row.section === row.section) {
      group = previous.group;
      joinGroup(group, row);
    } else {
      group = openGroup(row);
      groups.push(group);
    }

    previous = { row, group };
  }

  return groups;
}

export function assertConsistent(groups: CaseGroup[]): void {
  for (const group of groups) {
    if (group.conflict) throw group.conflict;
  }
}

export function rowRange(group: CaseGroup): { firstRow: number; lastRow: number } {
  return {
    firstRow: Math.min(...group.rowNumbers),
    lastRow: Math.max(...group.rowNumbers),
  };
}
