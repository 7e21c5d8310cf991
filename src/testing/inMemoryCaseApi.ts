import type { ApiClient } from "../api/client.js";
import type {
  CaseFilters,
  CaseRecord,
  FieldMap,
  ProjectRecord,
  SectionRecord,
  SuiteRecord,
} from "../types/domain.js";
import { ApiError } from "../utils/errors.js";

export type RecordedCall = {
  method: string;
  args: unknown[];
};

type FailureRule = {
  method: string;
  error: Error;
  match?: (args: unknown[]) => boolean;
};

export type InMemorySeed = {
  projects?: ProjectRecord[];
  suites?: SuiteRecord[];
  sections?: SectionRecord[];
  cases?: CaseRecord[];
  nextCaseId?: number;
  nextSectionId?: number;
};

export type InMemoryCaseApi = ApiClient & {
  calls: RecordedCall[];
  cases: Map<number, CaseRecord>;
  sections: SectionRecord[];
  /** Every later call of `method` whose arguments satisfy `match` throws `error`. */
  fail: (method: string, error: Error, match?: (args: unknown[]) => boolean) => void;
  callsTo: (method: string) => unknown[][];
};

/** Stand-in for the REST client that keeps projects, suites, sections and cases in memory. */
export function createInMemoryCaseApi(seed: InMemorySeed = {}): InMemoryCaseApi {
  const projects = seed.projects ?? [{ id: 1, name: "Project" }];
  const suites = seed.suites ?? [{ id: 1, name: "Master" }];
  const sections: SectionRecord[] = (seed.sections ?? []).map((section) => ({ ...section }));
  const cases = new Map<number, CaseRecord>((seed.cases ?? []).map((record) => [record.id, { ...record }]));
  const calls: RecordedCall[] = [];
  const failures: FailureRule[] = [];
  let nextCaseId = seed.nextCaseId ?? 1000;
  let nextSectionId = seed.nextSectionId ?? 500;

  const record = (method: string, args: unknown[]): void => {
    calls.push({ method, args });
    const rule = failures.find((item) => item.method === method && (!item.match || item.match(args)));
    if (rule) throw rule.error;
  };

  const withValues = (base: CaseRecord, ...maps: FieldMap[]): CaseRecord => {
    const next: CaseRecord = { ...base };
    for (const values of maps) {
      for (const [field, value] of Object.entries(values)) next[field] = value;
    }
    return next;
  };

  const depthOf = (parentId: number | null): number => {
    if (parentId === null) return 0;
    const parent = sections.find((section) => section.id === parentId);
    return parent ? (parent.depth ?? 0) + 1 : 0;
  };

  const addSectionRecord = (suiteId: number | null, parentId: number | null, name: string): SectionRecord => {
    const section: SectionRecord = {
      id: nextSectionId,
      name,
      parent_id: parentId,
      suite_id: suiteId,
      depth: depthOf(parentId),
    };
    nextSectionId += 1;
    sections.push(section);
    return section;
  };

  return {
    calls,
    cases,
    sections,
    fail: (method, error, match) => {
      failures.push({ method, error, match });
    },
    callsTo: (method) => calls.filter((call) => call.method === method).map((call) => call.args),

    call: async (endpoint, method = "GET", options = {}) => {
      record("call", [endpoint, method, options]);
      return null;
    },

    listProjects: async () => {
      record("listProjects", []);
      return projects;
    },

    listSuites: async (projectId: number) => {
      record("listSuites", [projectId]);
      return suites;
    },

    listSections: async (projectId: number, suiteId: number | null) => {
      record("listSections", [projectId, suiteId]);
      return sections.filter((section) => suiteId === null || section.suite_id === suiteId).map((section) => ({ ...section }));
    },

    addSection: async (projectId, input) => {
      record("addSection", [projectId, input]);
      return addSectionRecord(input.suiteId, input.parentId, input.name);
    },

    createSection: async (projectId: number, suiteId: number | null, parentId: number | null, name: string) => {
      record("createSection", [projectId, suiteId, parentId, name]);
      return addSectionRecord(suiteId, parentId, name).id;
    },

    getCase: async (caseId: number) => {
      record("getCase", [caseId]);
      const found = cases.get(caseId);
      if (!found) {
        throw new ApiError("HTTP 400: Field :case_id is not a valid test case.", 400, `get_case/${caseId}`);
      }
      return { ...found };
    },

    listCases: async (filters: CaseFilters) => {
      record("listCases", [filters]);
      return Array.from(cases.values())
        .filter((item) => filters.suiteId === undefined || item.suite_id === undefined || item.suite_id === filters.suiteId)
        .filter((item) => filters.sectionId === undefined || item.section_id === filters.sectionId)
        .filter((item) => !filters.priorityIds?.length || filters.priorityIds.includes(Number(item.priority_id)))
        .filter((item) => !filters.typeIds?.length || filters.typeIds.includes(Number(item.type_id)))
        .sort((a, b) => a.id - b.id)
        .map((item) => ({ ...item }));
    },

    createCase: async (sectionId: number, fields: FieldMap, steps: FieldMap) => {
      record("createCase", [sectionId, fields, steps]);
      const section = sections.find((item) => item.id === sectionId);
      if (!section) {
        throw new ApiError("HTTP 400: Field :section_id is not a valid section.", 400, `add_case/${sectionId}`);
      }
      const created = withValues({ id: nextCaseId, title: "", section_id: sectionId }, fields, steps);
      created.title = typeof fields.title === "string" ? fields.title : "";
      created.section_id = sectionId;
      created.suite_id = section.suite_id ?? null;
      nextCaseId += 1;
      cases.set(created.id, created);
      return created.id;
    },

    updateCase: async (caseId: number, fields: FieldMap, steps: FieldMap) => {
      record("updateCase", [caseId, fields, steps]);
      const existing = cases.get(caseId);
      if (!existing) {
        throw new ApiError("HTTP 400: Field :case_id is not a valid test case.", 400, `update_case/${caseId}`);
      }
      const updated = withValues(existing, fields, steps);
      updated.id = existing.id;
      updated.title = typeof fields.title === "string" ? fields.title : existing.title;
      updated.section_id = typeof fields.section_id === "number" ? fields.section_id : existing.section_id;
      cases.set(caseId, updated);
    },
  };
}
