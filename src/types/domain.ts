export const CSV_COLUMNS = [
  "case_id",
  "title",
  "section",
  "template_id",
  "type_id",
  "priority_id",
  "milestone_id",
  "estimate",
  "refs",
  "preconds",
  "mission",
  "goals",
  "steps_field",
  "step",
  "expected",
  "additional_info",
  "step_refs",
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export const STEP_COLUMNS = ["step", "expected", "additional_info", "step_refs"] as const;

export const STEPS_FIELDS = ["custom_steps_separated", "custom_steps", "custom_gherkin"] as const;

export type StepsField = (typeof STEPS_FIELDS)[number];

export const DEFAULT_STEPS_FIELD: StepsField = "custom_steps_separated";

export type StepEntry = {
  content: string;
  expected: string;
  additionalInfo: string;
  refs: string;
};

export type StepPayload = {
  content: string;
  expected: string;
  additional_info?: string;
  refs?: string;
};

export type FieldValue = string | number | boolean | null | string[] | number[] | StepPayload[];

export type FieldMap = Record<string, FieldValue>;

export type CsvRow = {
  rowNumber: number;
  caseId: string;
  title: string;
  section: string;
  fields: Record<string, string>;
  steps: StepEntry[];
};

export type GroupKey =
  | { kind: "id"; caseId: string }
  | { kind: "composite"; title: string; section: string };

export type CaseRecord = {
  id: number;
  title: string;
  section_id: number;
  suite_id?: number | null;
  template_id?: number | null;
  type_id?: number | null;
  priority_id?: number | null;
  milestone_id?: number | null;
  estimate?: string | null;
  refs?: string | null;
  [field: string]: unknown;
};

export type SectionRecord = {
  id: number;
  name: string;
  parent_id: number | null;
  suite_id?: number | null;
  depth?: number;
};

export type SuiteRecord = {
  id: number;
  name: string;
};

export type ProjectRecord = {
  id: number;
  name: string;
  suite_mode?: number;
  is_completed?: boolean;
};

export type CaseFilters = {
  projectId: number;
  suiteId?: number;
  sectionId?: number;
  priorityIds?: number[];
  typeIds?: number[];
};

export interface CaseApi {
  createCase(sectionId: number, fields: FieldMap, steps: FieldMap): Promise<number>;
  updateCase(caseId: number, fields: FieldMap, steps: FieldMap): Promise<void>;
  getCase(caseId: number): Promise<CaseRecord>;
  listCases(filters: CaseFilters): Promise<CaseRecord[]>;
  listSections(projectId: number, suiteId: number | null): Promise<SectionRecord[]>;
  createSection(projectId: number, suiteId: number | null, parentId: number | null, name: string): Promise<number>;
  listSuites(projectId: number): Promise<SuiteRecord[]>;
}

export type GroupOutcomeStatus = "created" | "updated" | "failed";

export type GroupOutcome = {
  status: GroupOutcomeStatus;
  firstRow: number;
  lastRow: number;
  caseId: number | null;
  title: string;
  errorKind?: string;
  error?: string;
};

export type ImportSummary = {
  /** Suite the run resolved; null when no group needed a section. */
  suiteId: number | null;
  created: number;
  updated: number;
  failed: number;
  outcomes: GroupOutcome[];
};

export type PlannedAction = "create" | "update" | "invalid";

export type ImportPreviewGroup = {
  action: PlannedAction;
  firstRow: number;
  lastRow: number;
  caseId: string;
  title: string;
  section: string;
  stepCount: number;
  fields: FieldMap;
  dropped: string[];
  errorMessage?: string;
};
