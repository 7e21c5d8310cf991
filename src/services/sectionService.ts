import type { CaseApi, SectionRecord } from "../types/domain.js";
import { ConfigError, SectionNotFoundError } from "../utils/errors.js";
import type { Logger } from "../logger.js";

export type SectionScope = {
  projectId: number;
  suiteId: number | null;
};

export type SectionResolver = {
  resolve: (sectionPath: string) => Promise<number>;
};

export function splitSectionPath(sectionPath: string): string[] {
  return sectionPath
    .split("/")
    .map((segment) => segment.trim())
    .filter(Boolean);
}

function childKey(parentId: number | null, name: string): string {
  return `${parentId ?? "root"}/${name}`;
}

/**
 * Resolves `/`-delimited section paths for one import run. The section tree is
 * listed once, on first use; resolved prefixes and created sections stay cached
 * until the resolver is dropped.
 */
export function createSectionResolver(
  api: Pick<CaseApi, "listSections" | "createSection">,
  scope: SectionScope,
  options: { createMissing: boolean; logger?: Logger },
): SectionResolver {
  let children: Map<string, number> | null = null;
  const pathCache = new Map<string, number>();

  const loadTree = async (): Promise<Map<string, number>> => {
    if (children) return children;
    const sections = await api.listSections(scope.projectId, scope.suiteId);
    const tree = new Map<string, number>();
    for (const section of sections) {
      const key = childKey(section.parent_id ?? null, section.name.trim());
      if (!tree.has(key)) tree.set(key, section.id);
    }
    children = tree;
    return tree;
  };

  const resolve = async (sectionPath: string): Promise<number> => {
    const segments = splitSectionPath(sectionPath);
    if (!segments.length) {
      throw new SectionNotFoundError("", sectionPath);
    }

    const tree = await loadTree();
    let parentId: number | null = null;

    for (let depth = 0; depth < segments.length; depth += 1) {
      const segment = segments[depth];
      const prefix = segments.slice(0, depth + 1).join("/");
      const cached = pathCache.get(prefix);
      if (cached !== undefined) {
        parentId = cached;
        continue;
      }

      let sectionId = tree.get(childKey(parentId, segment));
      if (sectionId === undefined) {
        if (!options.createMissing) {
          throw new SectionNotFoundError(segment, sectionPath);
        }
        sectionId = await api.createSection(scope.projectId, scope.suiteId, parentId, segment);
        tree.set(childKey(parentId, segment), sectionId);
        options.logger?.info("created section", { path: prefix, sectionId });
      }

      pathCache.set(prefix, sectionId);
      parentId = sectionId;
    }

    if (parentId === null) {
      throw new SectionNotFoundError(segments[segments.length - 1], sectionPath);
    }
    return parentId;
  };

  return { resolve };
}

export async function resolveSuite(
  api: Pick<CaseApi, "listSuites">,
  projectId: number,
  options: { suiteId?: number; suiteName?: string },
): Promise<number> {
  if (options.suiteId) return options.suiteId;

  const suites = await api.listSuites(projectId);
  if (options.suiteName) {
    const match = suites.find((suite) => suite.name === options.suiteName);
    if (!match) {
      throw new ConfigError(`Suite not found: ${options.suiteName}`);
    }
    return match.id;
  }

  if (suites.length === 1) return suites[0].id;
  throw new ConfigError("--suite-id or --suite-name is required for multi-suite projects");
}

/** Section id -> full `/`-joined path, built from one listing of the suite's sections. */
export function buildSectionPaths(sections: SectionRecord[]): Map<number, string> {
  const byId = new Map(sections.map((section) => [section.id, section]));
  const paths = new Map<number, string>();

  const pathOf = (sectionId: number, seen: Set<number>): string => {
    const known = paths.get(sectionId);
    if (known !== undefined) return known;
    const section = byId.get(sectionId);
    if (!section) return "";
    if (seen.has(sectionId)) return section.name;
    seen.add(sectionId);
    const parentId = section.parent_id ?? null;
    const parentPath = parentId === null ? "" : pathOf(parentId, seen);
    const full = parentPath ? `${parentPath}/${section.name}` : section.name;
    paths.set(sectionId, full);
    return full;
  };

  for (const section of sections) {
    pathOf(section.id, new Set());
  }
  return paths;
}
