/**
 * Search string compilation module.
 *
 * This module turns human-friendly search strings into a predicate tree
 * over a registry of typed fields, and translates that tree into filters
 * for a record source.
 *
 * @example
 * ```typescript
 * import { buildSearchFilter, SearchCompiler } from "./search";
 *
 * const compiler = new SearchCompiler(fields, { timeZone: "Europe/Berlin" });
 * const { tree } = compiler.compile('age>30 date>"2 weeks ago" name=Michael');
 * if (tree) {
 *   const filter = buildSearchFilter(tree, getTableColumns(people));
 *   const results = await db.select().from(people).where(filter);
 * }
 * ```
 *
 * ## Search syntax
 *
 * - `word` - Free text, searched in every free-text field
 * - `"quoted phrase"` - One literal unit
 * - `key:value` - Contains; `key=value` - Exact match
 * - `key>value`, `key>=value`, `key<value`, `key<=value` - Comparisons on
 *   number and date fields
 * - `key:null` / `key=none` - Field has no value
 * - Negation with `-` prefix or `not` (e.g., `-name:smith`)
 * - `and`, `or` and parentheses for grouping; adjacent terms are ANDed
 * - Date values accept phrases such as `yesterday`, `"last month"`,
 *   `feb_2024` or `"2 weeks ago"`
 *
 * @module
 */

export {
  buildSearchFilter,
  createDrizzleSink,
  createSearchTable,
  type SearchColumns,
} from "./builder";
export {
  type DateContext,
  type ResolvedDate,
  resolveDatePhrase,
} from "./dates";
export {
  AmbiguousFieldError,
  DateParseError,
  InvalidValueError,
  OperatorError,
  SearchError,
  SearchSyntaxError,
  UnknownFieldError,
} from "./errors";
export {
  createFieldRegistry,
  type FieldInput,
  FieldRegistry,
  fieldSchema,
  registrySchema,
} from "./fields";
export {
  createMemorySink,
  filterRecords,
  matchValue,
  type RecordMatcher,
} from "./memory";
export {
  type ParseOptions,
  type ParseResult,
  parseSearchQuery,
  parseTokens,
} from "./parser";
export { numberContains, resolveFreeText, resolvePredicate } from "./resolver";
export {
  type CompiledSearch,
  compileSearch,
  type SafeCompileResult,
  SearchCompiler,
  type SearchMeta,
  type SearchOptions,
  searchOptionsSchema,
} from "./search";
export { tokenize } from "./tokenizer";
export { type FilterSink, translate } from "./translate";
export type {
  AndNode,
  BooleanPredicate,
  ComparisonOperator,
  DatePredicate,
  DateRangePredicate,
  ExpressionNode,
  FieldCondition,
  FieldDescriptor,
  FieldType,
  LeafNode,
  NotNode,
  NullPredicate,
  NumberPredicate,
  NumberRangePredicate,
  OrderingOperator,
  OrNode,
  ResolvedPredicate,
  SearchTerm,
  StringPredicate,
  Token,
} from "./types";
