/**
 * Term resolver.
 *
 * Turns the raw value of a search term into a typed predicate for the
 * field it targets: string containment or equality, numeric comparison,
 * date instants and spans, booleans, and null checks.
 */

import { type DateContext, resolveDatePhrase } from "./dates";
import { InvalidValueError, OperatorError } from "./errors";
import type {
  ComparisonOperator,
  FieldCondition,
  FieldDescriptor,
  FieldType,
  NumberRangePredicate,
  OrderingOperator,
  ResolvedPredicate,
} from "./types";

const VALID_OPERATORS: Record<FieldType, readonly ComparisonOperator[]> = {
  string: [":", "="],
  number: [":", "=", ">", ">=", "<", "<="],
  date: [":", "=", ">", ">=", "<", "<="],
  boolean: [":", "="],
};

const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;
const NONE_VALUES: ReadonlySet<string> = new Set(["none", "null"]);
const TRUE_VALUES: ReadonlySet<string> = new Set([
  "true",
  "t",
  "yes",
  "y",
  "1",
]);
const FALSE_VALUES: ReadonlySet<string> = new Set([
  "false",
  "f",
  "no",
  "n",
  "0",
]);

/**
 * The raw parts of a term, before they are bound to a field type.
 */
export interface TermInput {
  operator: ComparisonOperator;
  value: string;
  quoted: boolean;
  position: number;
}

export function isNoneValue(value: string): boolean {
  return NONE_VALUES.has(value.toLowerCase());
}

export function isNumeric(value: string): boolean {
  return NUMBER_PATTERN.test(value) && Number.isFinite(Number(value));
}

/**
 * Resolve a column-named term against the field it targets.
 *
 * @throws {OperatorError} If the operator does not apply to the field type.
 * @throws {InvalidValueError} If the value cannot be read as the field type.
 * @throws {DateParseError} If a date field's value is not a known phrase.
 */
export function resolvePredicate(
  field: FieldDescriptor,
  term: TermInput,
  context: DateContext,
): ResolvedPredicate {
  const { operator, value, position } = term;

  // Null checks apply to every field type.
  if (!term.quoted && isNoneValue(value)) {
    if (operator !== ":" && operator !== "=") {
      throw new OperatorError(operator, "null", { position });
    }
    return { type: "null" };
  }

  if (!VALID_OPERATORS[field.type].includes(operator)) {
    throw new OperatorError(operator, field.type, { position });
  }

  switch (field.type) {
    case "string":
      return {
        type: "string",
        mode: operator === "=" ? "exact" : "contains",
        value: value.toLowerCase(),
      };

    case "number": {
      if (!isNumeric(value)) {
        throw new InvalidValueError(value, "number", { position });
      }
      if (operator === ":") return numberContains(value);
      return { type: "number", op: operator, value: Number(value) };
    }

    case "date":
      return resolveDatePredicate(operator, value, context, position);

    case "boolean":
      return { type: "boolean", value: parseBoolean(value, position) };
  }
}

/**
 * Resolve a term without a column key against the free-text fields.
 * An unquoted `none` checks every field for null.  Otherwise string fields
 * are searched for the phrase; number fields only when the phrase is a
 * number.  Other field types are never searched implicitly.
 */
export function resolveFreeText(
  fields: readonly FieldDescriptor[],
  value: string,
  quoted = false,
): FieldCondition[] {
  if (!quoted && isNoneValue(value)) {
    return fields.map(
      (field): FieldCondition => ({ field, predicate: { type: "null" } }),
    );
  }
  const conditions: FieldCondition[] = [];
  for (const field of fields) {
    if (field.type === "string") {
      conditions.push({
        field,
        predicate: {
          type: "string",
          mode: "contains",
          value: value.toLowerCase(),
        },
      });
    } else if (field.type === "number" && isNumeric(value)) {
      conditions.push({ field, predicate: numberContains(value) });
    }
  }
  return conditions;
}

/**
 * Numeric "contains": the values whose integer part is the typed one, so
 * both `60` and `60.4` cover `[60, 61)`.
 */
export function numberContains(value: string): NumberRangePredicate {
  const min = Math.floor(Number(value));
  return {
    type: "numberRange",
    min,
    max: min + 1,
    minInclusive: true,
    maxInclusive: false,
  };
}

/**
 * Read a boolean word such as `yes` or `0`, or `null` if it is none.
 */
export function readBoolean(value: string): boolean | null {
  const lowered = value.toLowerCase();
  if (TRUE_VALUES.has(lowered)) return true;
  if (FALSE_VALUES.has(lowered)) return false;
  return null;
}

function parseBoolean(value: string, position: number): boolean {
  const parsed = readBoolean(value);
  if (parsed == null) {
    throw new InvalidValueError(value, "boolean", { position });
  }
  return parsed;
}

/**
 * Point phrases compare against their instant.  Span phrases such as
 * `yesterday` cover `[min, max)`: `>` means after the whole span, `<`
 * before it, `>=` from its start and `<=` up to its end.
 */
function resolveDatePredicate(
  operator: ComparisonOperator,
  value: string,
  context: DateContext,
  position: number,
): ResolvedPredicate {
  const resolved = resolveDatePhrase(value, context, { position });
  const op: OrderingOperator = operator === ":" ? "=" : operator;
  if (resolved.type === "instant") {
    return { type: "date", op, value: resolved.at };
  }
  switch (op) {
    case "=":
      return { type: "dateRange", min: resolved.min, max: resolved.max };
    case ">":
      return { type: "dateRange", min: resolved.max, max: null };
    case ">=":
      return { type: "dateRange", min: resolved.min, max: null };
    case "<":
      return { type: "dateRange", min: null, max: resolved.min };
    case "<=":
      return { type: "dateRange", min: null, max: resolved.max };
  }
}
