import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { FieldMap, FieldValue } from "../types/domain.js";
import type { CaseGroup } from "./groupingService.js";
import { InconsistentCaseFieldsError, MappingError } from "../utils/errors.js";

export const TEMPLATE_IDS: Record<string, number> = {
  text: 1,
  steps: 2,
  exploratory: 3,
  bdd: 4,
};

const PRECONDITION_FIELDS = { preconds: "custom_preconds", preconditions: "custom_preconds" };

const BUILTIN_ASSOCIATIONS: Record<number, Record<string, string>> = {
  1: PRECONDITION_FIELDS,
  2: PRECONDITION_FIELDS,
  3: { mission: "custom_mission", goals: "custom_goals" },
  4: PRECONDITION_FIELDS,
};

const INTEGER_FIELDS = new Set(["priority_id", "type_id", "milestone_id"]);
const TEXT_FIELDS = new Set(["estimate", "refs"]);
const CONSUMED_FIELDS = new Set(["template", "template_id", "steps_field"]);
const TEXT_CUSTOM_FIELDS = new Set(["custom_preconds", "custom_mission", "custom_goals"]);
const NUMBER_CELL = /^-?(0|[1-9]\d*)(\.\d+)?$/;

const targetSchema = z
  .union([z.string().min(1), z.object({ field: z.string().min(1) })])
  .transform((target) => (typeof target === "string" ? target : target.field));

const associationsSchema = z.record(z.string(), targetSchema);

const mappingFileSchema = z.object({
  columns: z.record(z.string(), z.string().min(1)).default({}),
  fields: associationsSchema.default({}),
  templates: z
    .record(z.string().regex(/^\d+$/, "template keys must be template ids"), z.object({ fields: associationsSchema.default({}) }))
    .default({}),
});

export type FieldMapping = {
  columnAliases: Record<string, string>;
  fields: Record<string, string>;
  templates: Record<string, Record<string, string>>;
};

export type MappedFields = {
  templateId: number | null;
  fields: FieldMap;
  dropped: string[];
};

export type MapMode = "create" | "update";

export function createFieldMapping(input: unknown = {}): FieldMapping {
  const parsed = mappingFileSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
    throw new MappingError(`Invalid field mapping: ${detail}`);
  }

  const templates: Record<string, Record<string, string>> = {};
  for (const [templateId, entry] of Object.entries(parsed.data.templates)) {
    templates[String(Number(templateId))] = entry.fields;
  }

  return {
    columnAliases: parsed.data.columns,
    fields: parsed.data.fields,
    templates,
  };
}

export async function loadFieldMapping(filePath: string): Promise<FieldMapping> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown_fs_error";
    throw new MappingError(`Failed to read mapping file ${filePath}: ${message}`);
  }

  let content: unknown;
  try {
    content = path.extname(filePath) === ".json" ? JSON.parse(raw) : parseYaml(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown_parse_error";
    throw new MappingError(`Failed to parse mapping file ${filePath}: ${message}`);
  }

  return createFieldMapping(content);
}

function builtinAssociations(templateId: number | null): Record<string, string> {
  if (templateId !== null && BUILTIN_ASSOCIATIONS[templateId]) {
    return BUILTIN_ASSOCIATIONS[templateId];
  }
  const union: Record<string, string> = {};
  for (const associations of Object.values(BUILTIN_ASSOCIATIONS)) {
    Object.assign(union, associations);
  }
  return union;
}

/** Generic column name -> remote field, later layers winning: built-ins, mapping `fields`, mapping `templates[id]`. */
export function activeAssociations(mapping: FieldMapping, templateId: number | null): Record<string, string> {
  const perTemplate = templateId === null ? {} : mapping.templates[String(templateId)] ?? {};
  return {
    ...builtinAssociations(templateId),
    ...mapping.fields,
    ...perTemplate,
  };
}

/** Remote field -> the generic column the exporter writes it under. User entries win over built-ins. */
export function remoteToGeneric(mapping: FieldMapping, templateId: number | null): Record<string, string> {
  const perTemplate = templateId === null ? {} : mapping.templates[String(templateId)] ?? {};
  const reverse: Record<string, string> = {};
  for (const layer of [perTemplate, mapping.fields, builtinAssociations(templateId)]) {
    for (const [generic, remote] of Object.entries(layer)) {
      if (!(remote in reverse)) reverse[remote] = generic;
    }
  }
  return reverse;
}

export function resolveTemplateId(fields: Record<string, string>, override?: number): number | null {
  if (override !== undefined) return override;

  const rawId = (fields.template_id ?? "").trim();
  if (rawId) {
    if (!/^\d+$/.test(rawId)) {
      throw new MappingError(`template_id must be an integer, got '${rawId}'`);
    }
    return Number(rawId);
  }

  const name = (fields.template ?? "").trim();
  if (name) {
    const templateId = TEMPLATE_IDS[name.toLowerCase()];
    if (templateId === undefined) {
      throw new MappingError(
        `Unknown template '${name}'. Expected one of: ${Object.keys(TEMPLATE_IDS).join(", ")}`,
      );
    }
    return templateId;
  }

  return null;
}

function parseJsonArray(raw: string): FieldValue {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (Array.isArray(parsed) && parsed.every((item): item is number => typeof item === "number")) return parsed;
    if (Array.isArray(parsed) && parsed.every((item): item is string => typeof item === "string")) return parsed;
    return raw;
  } catch {
    return raw;
  }
}

function parseJsonString(raw: string): FieldValue {
  try {
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === "string" ? parsed : raw;
  } catch {
    return raw;
  }
}

/**
 * Reads a `custom_*` cell: `true`/`false`, plain decimal numbers, JSON arrays of
 * numbers or strings, and JSON-quoted strings. Anything else is kept as text.
 */
export function coercePassthrough(raw: string): FieldValue {
  if (!raw.trim()) return null;
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (NUMBER_CELL.test(raw)) return Number(raw);
  if (/^\s*\[[\s\S]*\]\s*$/.test(raw)) return parseJsonArray(raw);
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) return parseJsonString(raw);
  return raw;
}

/** Writes a `custom_*` value so that `coercePassthrough` reads back the same value. */
export function encodePassthrough(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") {
    return coercePassthrough(value) === value ? value : JSON.stringify(value);
  }
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function coerceInteger(column: string, raw: string): FieldValue {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  if (!/^\d+$/.test(trimmed)) {
    throw new MappingError(`${column} must be an integer, got '${trimmed}'`);
  }
  return Number(trimmed);
}

function isTextField(field: string): boolean {
  return TEXT_FIELDS.has(field) || TEXT_CUSTOM_FIELDS.has(field);
}

/** Decodes one cell by the remote field it lands in. */
export function decodeFieldCell(field: string, column: string, raw: string): FieldValue {
  if (INTEGER_FIELDS.has(field)) return coerceInteger(column, raw);
  if (isTextField(field) || !field.startsWith("custom_")) return raw.trim() ? raw : null;
  return coercePassthrough(raw);
}

/** Inverse of `decodeFieldCell` for the exporter. */
export function encodeFieldCell(field: string, value: unknown): string {
  if (field.startsWith("custom_") && !isTextField(field)) return encodePassthrough(value);
  if (value === null || value === undefined) return "";
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

function isDirectColumn(column: string): boolean {
  return INTEGER_FIELDS.has(column) || TEXT_FIELDS.has(column) || column.startsWith("custom_");
}

function checkPreconditionSynonyms(group: CaseGroup): void {
  const preconds = group.fields.preconds ?? "";
  const preconditions = group.fields.preconditions ?? "";
  if (preconds.trim() && preconditions.trim() && preconds !== preconditions) {
    const row = group.rowNumbers[0];
    throw new InconsistentCaseFieldsError("preconditions", [preconds, preconditions], [row, row]);
  }
}

/**
 * Turns a group's case-level columns into the remote field payload.
 *
 * Blank cells become `null` on update, so the update overwrites every column the
 * CSV carries; on create they are left out. When two columns land in the same
 * field, a non-blank cell wins over a blank one.
 */
export function mapCaseFields(
  group: CaseGroup,
  mapping: FieldMapping,
  options: { templateId?: number; mode: MapMode },
): MappedFields {
  checkPreconditionSynonyms(group);

  const templateId = resolveTemplateId(group.fields, options.templateId);
  const associations = activeAssociations(mapping, templateId);
  const fields: FieldMap = {};
  const dropped: string[] = [];

  if (group.title.trim()) fields.title = group.title;

  for (const [column, raw] of Object.entries(group.fields)) {
    if (CONSUMED_FIELDS.has(column)) continue;

    const target = associations[column] ?? (isDirectColumn(column) ? column : null);
    if (!target) {
      dropped.push(column);
      continue;
    }

    const value = decodeFieldCell(target, column, raw);
    // a generic column and the raw custom_* column can both name one field; a blank one never clears the other
    if (value === null && target in fields) continue;
    fields[target] = value;
  }

  if (templateId !== null) fields.template_id = templateId;

  if (options.mode === "create") {
    for (const [field, value] of Object.entries(fields)) {
      if (value === null) delete fields[field];
    }
  }

  return { templateId, fields, dropped };
}
