import { z } from "zod";
import type {
  CaseApi,
  CaseFilters,
  CaseRecord,
  FieldMap,
  ProjectRecord,
  SectionRecord,
  SuiteRecord,
} from "../types/domain.js";
import { ApiError } from "../utils/errors.js";

export type ApiClientConfig = {
  url: string;
  email: string;
  password: string;
  timeoutSeconds?: number;
};

export type HttpMethod = "GET" | "POST" | "DELETE";

export type QueryValue = string | number | boolean | null | undefined | Array<string | number>;

export type ApiClient = CaseApi & {
  call: (
    endpoint: string,
    method?: HttpMethod,
    options?: { params?: Record<string, QueryValue>; data?: Record<string, unknown> },
  ) => Promise<unknown>;
  listProjects: () => Promise<ProjectRecord[]>;
  addSection: (
    projectId: number,
    input: { name: string; suiteId: number | null; parentId: number | null; description?: string },
  ) => Promise<SectionRecord>;
};

const API_PREFIX = "index.php?/api/v2/";

const projectSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    suite_mode: z.number().optional(),
    is_completed: z.boolean().optional(),
  })
  .passthrough();

const suiteSchema = z.object({ id: z.number(), name: z.string() }).passthrough();

const sectionSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    parent_id: z.number().nullable().default(null),
    suite_id: z.number().nullish(),
    depth: z.number().optional(),
  })
  .passthrough();

const caseSchema = z
  .object({
    id: z.number(),
    title: z.string(),
    section_id: z.number(),
    suite_id: z.number().nullish(),
    template_id: z.number().nullish(),
    type_id: z.number().nullish(),
    priority_id: z.number().nullish(),
    milestone_id: z.number().nullish(),
    estimate: z.string().nullish(),
    refs: z.string().nullish(),
  })
  .passthrough();

const pageSchema = z
  .object({
    _links: z.object({ next: z.string().nullish() }).partial().optional(),
  })
  .passthrough();

function buildQuery(params: Record<string, QueryValue> = {}): string {
  return Object.entries(params)
    .filter(([, value]) => value !== undefined && value !== null && !(Array.isArray(value) && value.length === 0))
    .map(([key, value]) => {
      const text = Array.isArray(value) ? value.join(",") : String(value);
      return `&${encodeURIComponent(key)}=${encodeURIComponent(text)}`;
    })
    .join("");
}

/** `_links.next` comes back as `/api/v2/get_cases/1&limit=250&offset=250`. */
function nextEndpoint(link: string | null | undefined): string | null {
  if (!link) return null;
  return link.replace(/^.*?\/api\/v2\//, "");
}

export function createApiClient(config: ApiClientConfig): ApiClient {
  const baseUrl = config.url.replace(/\/+$/, "");
  const authorization = `Basic ${Buffer.from(`${config.email}:${config.password}`).toString("base64")}`;
  const timeoutMs = (config.timeoutSeconds ?? 30) * 1000;

  async function request(method: "GET" | "POST", endpoint: string, data?: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${baseUrl}/${API_PREFIX}${endpoint}`, {
        method,
        headers: {
          Authorization: authorization,
          Accept: "application/json",
          ...(data !== undefined ? { "Content-Type": "application/json" } : {}),
        },
        body: data !== undefined ? JSON.stringify(data) : undefined,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ApiError(`Request to ${endpoint} failed: ${message}`, 0, endpoint);
    }

    const text = await response.text();

    if (!response.ok) {
      let detail = response.statusText;
      try {
        const payload: unknown = JSON.parse(text);
        const parsed = z.object({ error: z.string() }).safeParse(payload);
        if (parsed.success) detail = parsed.data.error;
      } catch {
        detail = text.trim() || response.statusText;
      }
      throw new ApiError(`HTTP ${response.status}: ${detail}`, response.status, endpoint);
    }

    if (!text.trim()) return null;
    try {
      return JSON.parse(text);
    } catch {
      throw new ApiError(`Invalid JSON in response from ${endpoint}`, response.status, endpoint);
    }
  }

  function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, endpoint: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ApiError(
        `Unexpected response from ${endpoint}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid body"}`,
        200,
        endpoint,
      );
    }
    return parsed.data;
  }

  async function listAll<T>(
    endpoint: string,
    key: string,
    params: Record<string, QueryValue>,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T[]> {
    const items: T[] = [];
    let next: string | null = `${endpoint}${buildQuery(params)}`;

    while (next) {
      const current: string = next;
      const body = await request("GET", current);
      if (Array.isArray(body)) {
        items.push(...parseBody(z.array(itemSchema), body, current));
        break;
      }
      const page = parseBody(pageSchema, body, current);
      items.push(...parseBody(z.array(itemSchema), page[key] ?? [], current));
      next = nextEndpoint(page._links?.next);
    }

    return items;
  }

  async function addSection(
    projectId: number,
    input: { name: string; suiteId: number | null; parentId: number | null; description?: string },
  ): Promise<SectionRecord> {
    const endpoint = `add_section/${projectId}`;
    const body = await request("POST", endpoint, {
      name: input.name,
      ...(input.suiteId !== null ? { suite_id: input.suiteId } : {}),
      ...(input.parentId !== null ? { parent_id: input.parentId } : {}),
      ...(input.description ? { description: input.description } : {}),
    });
    return parseBody(sectionSchema, body, endpoint);
  }

  return {
    call: async (endpoint, method = "GET", options = {}) => {
      const target = `${endpoint}${buildQuery(options.params)}`;
      // the API takes deletes as POST
      return method === "GET" ? request("GET", target) : request("POST", target, options.data ?? {});
    },

    listProjects: () => listAll("get_projects", "projects", {}, projectSchema),

    listSuites: (projectId: number): Promise<SuiteRecord[]> =>
      listAll(`get_suites/${projectId}`, "suites", {}, suiteSchema),

    listSections: (projectId: number, suiteId: number | null): Promise<SectionRecord[]> =>
      listAll(`get_sections/${projectId}`, "sections", { suite_id: suiteId }, sectionSchema),

    addSection,

    createSection: async (projectId, suiteId, parentId, name) => {
      const section = await addSection(projectId, { name, suiteId, parentId });
      return section.id;
    },

    listCases: (filters: CaseFilters): Promise<CaseRecord[]> =>
      listAll(
        `get_cases/${filters.projectId}`,
        "cases",
        {
          suite_id: filters.suiteId,
          section_id: filters.sectionId,
          priority_id: filters.priorityIds,
          type_id: filters.typeIds,
        },
        caseSchema,
      ),

    getCase: async (caseId: number): Promise<CaseRecord> => {
      const endpoint = `get_case/${caseId}`;
      return parseBody(caseSchema, await request("GET", endpoint), endpoint);
    },

    createCase: async (sectionId: number, fields: FieldMap, steps: FieldMap): Promise<number> => {
      const endpoint = `add_case/${sectionId}`;
      const created = parseBody(caseSchema, await request("POST", endpoint, { ...fields, ...steps }), endpoint);
      return created.id;
    },

    updateCase: async (caseId: number, fields: FieldMap, steps: FieldMap): Promise<void> => {
      await request("POST", `update_case/${caseId}`, { ...fields, ...steps });
    },
  };
}
