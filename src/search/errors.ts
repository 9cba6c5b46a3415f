import type { ComparisonOperator, FieldType } from "./types";

export interface SearchErrorOptions {
  /** Zero-based offset of the offending text in the search string. */
  position?: number | null;
  cause?: unknown;
}

/**
 * Base class for everything that makes a search string invalid.
 */
export class SearchError extends Error {
  readonly position: number | null;

  constructor(message: string, options: SearchErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "SearchError";
    this.position = options.position ?? null;
  }
}

/**
 * Malformed token stream: unterminated quote, unbalanced parentheses,
 * dangling keyword or operator.
 */
export class SearchSyntaxError extends SearchError {
  constructor(message: string, options: SearchErrorOptions = {}) {
    super(message, options);
    this.name = "SearchSyntaxError";
  }
}

/**
 * A column key that names no registered field, raised only under
 * `strictFields`.
 */
export class UnknownFieldError extends SearchError {
  readonly key: string;

  constructor(key: string, options: SearchErrorOptions = {}) {
    super(`Unknown field '${key}'`, options);
    this.name = "UnknownFieldError";
    this.key = key;
  }
}

/**
 * A partial column key that matches more than one field.
 */
export class AmbiguousFieldError extends SearchError {
  readonly key: string;
  readonly candidates: readonly string[];

  constructor(
    key: string,
    candidates: readonly string[],
    options: SearchErrorOptions = {},
  ) {
    super(
      `Ambiguous field '${key}' (could be ${candidates.join(", ")})`,
      options,
    );
    this.name = "AmbiguousFieldError";
    this.key = key;
    this.candidates = candidates;
  }
}

export class OperatorError extends SearchError {
  readonly operator: ComparisonOperator;
  readonly fieldType: FieldType | "null";

  constructor(
    operator: ComparisonOperator,
    fieldType: FieldType | "null",
    options: SearchErrorOptions = {},
  ) {
    super(
      fieldType === "null"
        ? `Invalid operator '${operator}' for None value`
        : `Invalid operator '${operator}' for ${fieldType} field`,
      options,
    );
    this.name = "OperatorError";
    this.operator = operator;
    this.fieldType = fieldType;
  }
}

/**
 * A value that cannot be read as the field's declared type.
 */
export class InvalidValueError extends SearchError {
  readonly value: string;
  readonly fieldType: FieldType;

  constructor(
    value: string,
    fieldType: FieldType,
    options: SearchErrorOptions & { message?: string } = {},
  ) {
    super(options.message ?? `Invalid ${fieldType} value '${value}'`, options);
    this.name = "InvalidValueError";
    this.value = value;
    this.fieldType = fieldType;
  }
}

export class DateParseError extends InvalidValueError {
  constructor(value: string, options: SearchErrorOptions = {}) {
    super(value, "date", {
      ...options,
      message: `Invalid date format '${value}'`,
    });
    this.name = "DateParseError";
  }
}
