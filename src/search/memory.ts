/**
 * In-memory filter sink.
 *
 * Evaluates a predicate tree against plain objects, reading each field's
 * `backingKey` as a dot-separated property path (`account.name`).
 */

import { readBoolean } from "./resolver";
import { type FilterSink, translate } from "./translate";
import type {
  ExpressionNode,
  OrderingOperator,
  ResolvedPredicate,
} from "./types";

export type RecordMatcher = (record: unknown) => boolean;

/**
 * Read a dot-separated property path, or `undefined` when any step is
 * missing.
 */
export function readPath(record: unknown, path: string): unknown {
  let current: unknown = record;
  for (const key of path.split(".")) {
    if (current == null || typeof current !== "object") return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

function toText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return null;
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

function toTime(value: unknown): number | null {
  if (value instanceof Date) return value.getTime();
  if (typeof value === "string" || typeof value === "number") {
    const time = new Date(value).getTime();
    return Number.isNaN(time) ? null : time;
  }
  return null;
}

function toBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "string" || typeof value === "number") {
    return readBoolean(String(value));
  }
  return null;
}

function compare(left: number, op: OrderingOperator, right: number): boolean {
  switch (op) {
    case "=":
      return left === right;
    case ">":
      return left > right;
    case ">=":
      return left >= right;
    case "<":
      return left < right;
    case "<=":
      return left <= right;
  }
}

/**
 * Whether a stored value satisfies a predicate.  Absent values only
 * satisfy the null predicate.
 */
export function matchValue(
  value: unknown,
  predicate: ResolvedPredicate,
): boolean {
  if (predicate.type === "null") return value == null;
  if (value == null) return false;

  switch (predicate.type) {
    case "string": {
      const text = toText(value)?.toLowerCase();
      if (text == null) return false;
      return predicate.mode === "exact"
        ? text === predicate.value
        : text.includes(predicate.value);
    }

    case "number": {
      const number = toNumber(value);
      return number != null && compare(number, predicate.op, predicate.value);
    }

    case "numberRange": {
      const number = toNumber(value);
      if (number == null) return false;
      const aboveMin = predicate.minInclusive
        ? number >= predicate.min
        : number > predicate.min;
      const belowMax = predicate.maxInclusive
        ? number <= predicate.max
        : number < predicate.max;
      return aboveMin && belowMax;
    }

    case "date": {
      const time = toTime(value);
      return (
        time != null && compare(time, predicate.op, predicate.value.getTime())
      );
    }

    case "dateRange": {
      const time = toTime(value);
      if (time == null) return false;
      return (
        (predicate.min == null || time >= predicate.min.getTime()) &&
        (predicate.max == null || time < predicate.max.getTime())
      );
    }

    case "boolean":
      return toBoolean(value) === predicate.value;
  }
}

/**
 * A filter sink producing record matcher functions.
 */
export function createMemorySink(): FilterSink<RecordMatcher> {
  return {
    condition: (field, predicate) => (record) =>
      matchValue(readPath(record, field.backingKey), predicate),
    and: (left, right) => (record) => left(record) && right(record),
    or: (left, right) => (record) => left(record) || right(record),
    not: (operand) => (record) => !operand(record),
    never: () => () => false,
  };
}

/**
 * Keep the records a predicate tree matches.  A `null` tree (a blank
 * search) keeps everything.
 */
export function filterRecords<R>(
  records: readonly R[],
  tree: ExpressionNode | null,
): R[] {
  if (tree == null) return [...records];
  const matches = translate(tree, createMemorySink());
  return records.filter((record) => matches(record));
}
