import { getLogger } from "@logtape/logtape";
import { z } from "zod";
import { SearchError } from "./errors";
import { createFieldRegistry, type FieldInput, FieldRegistry } from "./fields";
import { parseSearchQuery } from "./parser";
import type { ExpressionNode } from "./types";

const logger = getLogger(["searchstring", "compiler"]);

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

export const searchOptionsSchema = z.object({
  timeZone: z
    .string()
    .refine(isTimeZone, { message: "Unknown time zone" })
    .default("UTC"),
  strictFields: z.boolean().default(false),
  partialKeys: z.boolean().default(false),
});

export type SearchOptions = z.input<typeof searchOptionsSchema>;

export interface CompiledSearch {
  query: string;
  /** `null` when the query is blank. */
  tree: ExpressionNode | null;
  referencedKeys: string[];
}

export type SafeCompileResult =
  | { success: true; search: CompiledSearch }
  | { success: false; query: string; error: SearchError };

export interface SearchMeta {
  fields: Record<string, string>;
  query?: string;
  error?: string;
}

/**
 * Compiles search strings against one field registry.  Instances keep no
 * per-search state and may be shared.
 *
 * @example
 * ```typescript
 * const compiler = new SearchCompiler(
 *   [
 *     { searchKey: "name", type: "string", freeText: true },
 *     { searchKey: "age", type: "number" },
 *     { searchKey: "date", backingKey: "created_at", type: "date" },
 *   ],
 *   { timeZone: "America/New_York" },
 * );
 * const { tree } = compiler.compile('age>30 date>"2 weeks ago" name=Michael');
 * ```
 */
export class SearchCompiler {
  readonly registry: FieldRegistry;
  readonly options: z.output<typeof searchOptionsSchema>;

  constructor(
    fields: FieldRegistry | readonly FieldInput[],
    options: SearchOptions = {},
  ) {
    this.registry =
      fields instanceof FieldRegistry ? fields : createFieldRegistry(fields);
    this.options = searchOptionsSchema.parse(options);
  }

  /**
   * Compile a search string into a predicate tree.
   *
   * @param query The search string typed by the user.
   * @param now The reference time for relative dates.
   * @throws {SearchError} If the query is invalid.
   */
  compile(query: string, now: Date = new Date()): CompiledSearch {
    const { tree, referencedKeys } = parseSearchQuery(query, this.registry, {
      ...this.options,
      now,
    });
    logger.debug("Compiled search {query} referencing {referencedKeys}", {
      query,
      referencedKeys,
    });
    return { query, tree, referencedKeys };
  }

  /**
   * Like {@link compile}, but reports invalid queries instead of throwing.
   */
  safeCompile(query: string, now: Date = new Date()): SafeCompileResult {
    try {
      return { success: true, search: this.compile(query, now) };
    } catch (error) {
      if (!(error instanceof SearchError)) throw error;
      logger.debug("Rejected search {query}: {error}", { query, error });
      return { success: false, query, error };
    }
  }

  /**
   * Metadata for showing the searchable fields, and optionally the outcome
   * of a search, to users.
   */
  describe(result?: SafeCompileResult): SearchMeta {
    const meta: SearchMeta = { fields: this.registry.describe() };
    if (result == null) return meta;
    const query = result.success ? result.search.query : result.query;
    if (query.trim() !== "") meta.query = query;
    if (!result.success) meta.error = result.error.message;
    return meta;
  }
}

/**
 * Compile a search string in one call.
 *
 * @throws {SearchError} If the query is invalid.
 */
export function compileSearch(
  query: string,
  fields: FieldRegistry | readonly FieldInput[],
  options: SearchOptions & { now?: Date } = {},
): CompiledSearch {
  const { now, ...rest } = options;
  return new SearchCompiler(fields, rest).compile(query, now);
}
