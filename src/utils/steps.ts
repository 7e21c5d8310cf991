import {
  DEFAULT_STEPS_FIELD,
  STEPS_FIELDS,
  type CaseRecord,
  type FieldMap,
  type StepEntry,
  type StepPayload,
  type StepsField,
} from "../types/domain.js";
import { MappingError } from "./errors.js";

export const STEP_STORAGE_FIELDS = new Set<string>([...STEPS_FIELDS, "custom_expected"]);

const STEPS_FIELD_NAMES: ReadonlySet<string> = new Set(STEPS_FIELDS);

export function isStepsField(value: string): value is StepsField {
  return STEPS_FIELD_NAMES.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function textOf(value: unknown): string {
  if (value === null || value === undefined) return "";
  return typeof value === "string" ? value : String(value);
}

function nonBlank(values: string[]): string[] {
  return values.filter((value) => value.trim());
}

/**
 * Picks the remote field a group's steps are written to: the explicit override,
 * then the group's `steps_field` cell, then the default when there are steps to send.
 * `null` means the case's steps are left untouched.
 */
export function resolveStepsField(
  cell: string | undefined,
  stepCount: number,
  override?: StepsField,
): StepsField | null {
  if (override) return override;

  const requested = (cell ?? "").trim();
  if (requested) {
    if (!isStepsField(requested)) {
      throw new MappingError(`Unknown steps_field '${requested}'. Expected one of: ${STEPS_FIELDS.join(", ")}`);
    }
    return requested;
  }

  return stepCount > 0 ? DEFAULT_STEPS_FIELD : null;
}

export function encodeSteps(steps: StepEntry[], field: StepsField): FieldMap {
  if (field === "custom_steps_separated") {
    return {
      custom_steps_separated: steps.map((step) => {
        const payload: StepPayload = { content: step.content, expected: step.expected };
        if (step.additionalInfo.trim()) payload.additional_info = step.additionalInfo;
        if (step.refs.trim()) payload.refs = step.refs;
        return payload;
      }),
    };
  }

  const contents = nonBlank(steps.map((step) => step.content)).join("\n");
  if (field === "custom_gherkin") {
    return { custom_gherkin: contents || null };
  }

  const expected = nonBlank(steps.map((step) => step.expected)).join("\n");
  return {
    custom_steps: contents || null,
    // empty text rather than null while there are steps
    custom_expected: expected || (contents ? "" : null),
  };
}

export function decodeSteps(record: CaseRecord): { stepsField: StepsField | null; steps: StepEntry[] } {
  const separated = record.custom_steps_separated;
  if (Array.isArray(separated) && separated.length > 0) {
    return {
      stepsField: "custom_steps_separated",
      steps: separated.filter(isRecord).map((step) => ({
        content: textOf(step.content),
        expected: textOf(step.expected),
        additionalInfo: textOf(step.additional_info),
        refs: textOf(step.refs),
      })),
    };
  }

  const gherkin = textOf(record.custom_gherkin);
  if (gherkin.trim()) {
    return {
      stepsField: "custom_gherkin",
      steps: [{ content: gherkin, expected: "", additionalInfo: "", refs: "" }],
    };
  }

  const text = textOf(record.custom_steps);
  if (text.trim()) {
    return {
      stepsField: "custom_steps",
      steps: [{ content: text, expected: textOf(record.custom_expected), additionalInfo: "", refs: "" }],
    };
  }

  return { stepsField: null, steps: [] };
}
