/**
 * Search query SQL builder.
 *
 * Converts a predicate tree into Drizzle ORM SQL conditions.
 */

import {
  and,
  type Column,
  eq,
  gt,
  gte,
  ilike,
  isNull,
  lt,
  lte,
  or,
  type SQL,
  sql,
} from "drizzle-orm";
import {
  boolean,
  doublePrecision,
  type PgColumnBuilderBase,
  pgTable,
  text,
  timestamp,
} from "drizzle-orm/pg-core";
import type { FieldRegistry } from "./fields";
import { type FilterSink, translate } from "./translate";
import type {
  ExpressionNode,
  FieldDescriptor,
  OrderingOperator,
  ResolvedPredicate,
} from "./types";

/**
 * Columns keyed by the fields' `backingKey`, e.g. `getTableColumns(table)`.
 */
export type SearchColumns = Record<string, Column>;

function allOf(conditions: SQL[]): SQL {
  return and(...conditions) ?? sql`true`;
}

function anyOf(conditions: SQL[]): SQL {
  return or(...conditions) ?? sql`false`;
}

/**
 * Escape special LIKE characters.
 */
function escapeLike(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/%/g, "\\%").replace(/_/g, "\\_");
}

function compare(
  column: Column,
  op: OrderingOperator,
  value: number | Date,
): SQL {
  switch (op) {
    case "=":
      return eq(column, value);
    case ">":
      return gt(column, value);
    case ">=":
      return gte(column, value);
    case "<":
      return lt(column, value);
    case "<=":
      return lte(column, value);
  }
}

/**
 * Build the condition for one predicate on one column.
 */
function buildCondition(column: Column, predicate: ResolvedPredicate): SQL {
  switch (predicate.type) {
    case "string": {
      // Case-insensitive LIKE; exact matches carry no wildcards
      const escaped = escapeLike(predicate.value);
      return predicate.mode === "exact"
        ? ilike(column, escaped)
        : ilike(column, `%${escaped}%`);
    }

    case "number":
    case "date":
      return compare(column, predicate.op, predicate.value);

    case "numberRange":
      return allOf([
        predicate.minInclusive
          ? gte(column, predicate.min)
          : gt(column, predicate.min),
        predicate.maxInclusive
          ? lte(column, predicate.max)
          : lt(column, predicate.max),
      ]);

    case "dateRange": {
      const conditions: SQL[] = [];
      if (predicate.min != null) conditions.push(gte(column, predicate.min));
      if (predicate.max != null) conditions.push(lt(column, predicate.max));
      return allOf(conditions);
    }

    case "boolean":
      return eq(column, predicate.value);

    case "null":
      return isNull(column);
  }
}

/**
 * A filter sink producing Drizzle SQL conditions.
 *
 * @throws {Error} While translating, if a field has no column.
 */
export function createDrizzleSink(columns: SearchColumns): FilterSink<SQL> {
  const columnFor = (field: FieldDescriptor): Column => {
    const column = columns[field.backingKey];
    if (column == null) {
      throw new Error(
        `No column '${field.backingKey}' for search field '${field.searchKey}'`,
      );
    }
    return column;
  };
  return {
    condition: (field, predicate) =>
      buildCondition(columnFor(field), predicate),
    and: (left, right) => allOf([left, right]),
    or: (left, right) => anyOf([left, right]),
    // NULL counts as false before negating
    not: (operand) => sql`not coalesce(${operand}, false)`,
    never: () => sql`false`,
  };
}

/**
 * Build a SQL filter condition from a predicate tree.
 *
 * @param node The predicate tree to convert.
 * @param columns The columns the fields' backing keys refer to.
 * @returns A Drizzle SQL condition that can be used in a where clause.
 *
 * @example
 * ```typescript
 * const { tree } = compileSearch("age>30 -name:smith", registry);
 * const results = await db
 *   .select()
 *   .from(people)
 *   .where(
 *     tree == null
 *       ? undefined
 *       : buildSearchFilter(tree, getTableColumns(people)),
 *   );
 * ```
 */
export function buildSearchFilter(
  node: ExpressionNode,
  columns: SearchColumns,
): SQL {
  return translate(node, createDrizzleSink(columns));
}

function columnBuilder(field: FieldDescriptor): PgColumnBuilderBase {
  switch (field.type) {
    case "string":
      return text(field.backingKey);
    case "number":
      return doublePrecision(field.backingKey);
    case "date":
      return timestamp(field.backingKey, { withTimezone: true });
    case "boolean":
      return boolean(field.backingKey);
  }
}

/**
 * Define a PostgreSQL table with one column per registered field, named
 * after the fields' backing keys.
 */
export function createSearchTable(name: string, registry: FieldRegistry) {
  const columns: Record<string, PgColumnBuilderBase> = {};
  for (const field of registry.fields) {
    columns[field.backingKey] = columnBuilder(field);
  }
  return pgTable(name, columns);
}
