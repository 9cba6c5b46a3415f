/**
 * Search query type definitions.
 *
 * This module defines the tokens produced by the tokenizer, the field
 * descriptors supplied by the caller, and the predicate tree the parser
 * builds from them.  Every value here is created fresh per compilation and
 * is never mutated afterwards.
 */

/**
 * The value types a searchable field can have.
 */
export type FieldType = "string" | "number" | "date" | "boolean";

/**
 * Operators that may separate a column key from its value.
 * - `:` contains
 * - `=` exact match
 * - `>`, `>=`, `<`, `<=` comparisons
 */
export type ComparisonOperator = ":" | "=" | ">" | ">=" | "<" | "<=";

/**
 * Operators with arithmetic meaning on numbers and instants.
 */
export type OrderingOperator = "=" | ">" | ">=" | "<" | "<=";

/**
 * A searchable field, as registered by the caller.
 */
export interface FieldDescriptor {
  /** The key users type before the operator, e.g. `age` in `age>30`. */
  readonly searchKey: string;
  /** The column (or property path) the filter sink reads. */
  readonly backingKey: string;
  readonly type: FieldType;
  /** Whether terms without a column key search this field. */
  readonly freeText: boolean;
  readonly description?: string;
}

export type Keyword = "and" | "or" | "not";

/**
 * Bare or quoted text.  Quoting keeps a phrase together as one unit.
 */
export interface WordToken {
  type: "WORD";
  value: string;
  quoted: boolean;
  position: number;
}

export interface OperatorToken {
  type: "OPERATOR";
  value: ComparisonOperator;
  position: number;
}

export interface KeywordToken {
  type: "KEYWORD";
  value: Keyword;
  position: number;
}

export interface PunctuationToken {
  type: "NEGATION" | "LPAREN" | "RPAREN";
  value: string;
  position: number;
}

export type Token = WordToken | OperatorToken | KeywordToken | PunctuationToken;

/**
 * Case-insensitive string match.  The value is already lower-cased.
 */
export interface StringPredicate {
  readonly type: "string";
  readonly mode: "contains" | "exact";
  readonly value: string;
}

export interface NumberPredicate {
  readonly type: "number";
  readonly op: OrderingOperator;
  readonly value: number;
}

/**
 * Numeric "contains": stored values whose decimal representation starts
 * with the typed digits.
 */
export interface NumberRangePredicate {
  readonly type: "numberRange";
  readonly min: number;
  readonly max: number;
  readonly minInclusive: boolean;
  readonly maxInclusive: boolean;
}

/**
 * Comparison against a single instant.
 */
export interface DatePredicate {
  readonly type: "date";
  readonly op: OrderingOperator;
  readonly value: Date;
}

/**
 * Half-open `[min, max)` range; a `null` bound is unbounded.
 */
export interface DateRangePredicate {
  readonly type: "dateRange";
  readonly min: Date | null;
  readonly max: Date | null;
}

export interface BooleanPredicate {
  readonly type: "boolean";
  readonly value: boolean;
}

/**
 * Matches when the field has no value.
 */
export interface NullPredicate {
  readonly type: "null";
}

/**
 * Union type of all type-specific conditions a term can resolve to.
 */
export type ResolvedPredicate =
  | StringPredicate
  | NumberPredicate
  | NumberRangePredicate
  | DatePredicate
  | DateRangePredicate
  | BooleanPredicate
  | NullPredicate;

/**
 * A predicate bound to the field it applies to.
 */
export interface FieldCondition {
  readonly field: FieldDescriptor;
  readonly predicate: ResolvedPredicate;
}

/**
 * A single negatable search condition.  Column-named terms target one
 * field; free-text terms target every free-text field and match when any
 * of their conditions does.
 */
export interface SearchTerm {
  readonly fields: readonly FieldDescriptor[];
  readonly operator: ComparisonOperator;
  readonly value: string;
  readonly quoted: boolean;
  readonly negated: boolean;
  readonly position: number;
  readonly conditions: readonly FieldCondition[];
}

export interface LeafNode {
  readonly type: "leaf";
  readonly term: SearchTerm;
}

export interface AndNode {
  readonly type: "and";
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface OrNode {
  readonly type: "or";
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface NotNode {
  readonly type: "not";
  readonly child: ExpressionNode;
}

/**
 * Union type of all predicate tree nodes.
 */
export type ExpressionNode = LeafNode | AndNode | OrNode | NotNode;
