export class MalformedRowError extends Error {
  readonly rowNumber: number | null;

  constructor(message: string, rowNumber: number | null = null) {
    super(rowNumber === null ? message : `Row ${rowNumber}: ${message}`);
    this.name = "MalformedRowError";
    this.rowNumber = rowNumber;
  }
}

export class InconsistentCaseFieldsError extends Error {
  readonly field: string;
  readonly values: [string, string];
  readonly rowNumbers: [number, number];

  constructor(field: string, values: [string, string], rowNumbers: [number, number]) {
    super(
      `Inconsistent value for '${field}': ${JSON.stringify(values[0])} (row ${rowNumbers[0]}) ` +
        `vs ${JSON.stringify(values[1])} (row ${rowNumbers[1]})`,
    );
    this.name = "InconsistentCaseFieldsError";
    this.field = field;
    this.values = values;
    this.rowNumbers = rowNumbers;
  }
}

export class SectionNotFoundError extends Error {
  readonly segment: string;
  readonly path: string;

  constructor(segment: string, path: string) {
    super(`Section not found: ${segment} in path ${path}`);
    this.name = "SectionNotFoundError";
    this.segment = segment;
    this.path = path;
  }
}

export class MappingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MappingError";
  }
}

export class ApiError extends Error {
  readonly status: number;
  readonly endpoint: string;

  constructor(message: string, status: number, endpoint: string) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.endpoint = endpoint;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorKind(error: unknown): string {
  return error instanceof Error ? error.name : "Error";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
