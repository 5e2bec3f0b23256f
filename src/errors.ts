// errors.ts
// Error kinds raised by the tabulation engine, the mapping DSL and the JSON
// configuration loader. Everything is thrown synchronously before (or while)
// aggregating; no partial table is ever returned.

export type ValidationIssueKind =
  | "missing-column"
  | "invalid-aggregation"
  | "invalid-membership"
  | "empty-dimension"
  | "duplicate-label"
  | "invalid-config";

export interface ValidationIssue {
  kind: ValidationIssueKind;
  message: string;
  path?: string[];
  suggestion?: string;
  dimension?: string;
  label?: string;
}

export interface ValidationResult {
  ok: boolean;
  issues: ValidationIssue[];
}

export class TabulationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A referenced column does not exist, or a spec has an invalid shape.
 * Carries every issue that was found, not only the first one.
 */
export class ConfigurationError extends TabulationError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      issues.length === 1
        ? issues[0].message
        : `Invalid tabulation configuration:\n${issues.map((i) => `  - ${i.message}`).join("\n")}`
    );
    this.issues = issues;
  }

  static single(message: string, path?: string[]): ConfigurationError {
    return new ConfigurationError([{ kind: "invalid-config", message, path }]);
  }
}

export class DuplicateLabelError extends TabulationError {
  constructor(readonly dimension: string, readonly label: string) {
    super(`Dimension "${dimension}" defines label "${label}" more than once`);
  }
}

export class EmptyDimensionError extends TabulationError {
  constructor(readonly dimension: string) {
    super(`Dimension "${dimension}" has no labels`);
  }
}

/** An aggregate could not be computed for a value column. */
export class AggregationError extends TabulationError {
  constructor(
    readonly column: string,
    readonly aggregate: string,
    message: string,
    readonly value?: unknown,
    options?: ErrorOptions
  ) {
    super(message, options);
  }

  static nonNumeric(column: string, aggregate: string, value: unknown): AggregationError {
    const shown = typeof value === "string" ? `"${value}"` : String(value);
    return new AggregationError(
      column,
      aggregate,
      `Cannot apply ${aggregate}() to column "${column}": expected a number, got ${shown}`,
      value
    );
  }

  static reducerFailed(column: string, aggregate: string, cause: unknown): AggregationError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new AggregationError(
      column,
      aggregate,
      `${aggregate}() failed on column "${column}": ${reason}`,
      undefined,
      { cause }
    );
  }
}

export class DslParseError extends TabulationError {
  constructor(readonly offset: number, snippet: string) {
    super(`DSL parse error at offset ${offset}: unexpected "${snippet}"`);
  }
}
