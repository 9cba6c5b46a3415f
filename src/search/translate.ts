import type {
  ExpressionNode,
  FieldDescriptor,
  ResolvedPredicate,
  SearchTerm,
} from "./types";

/**
 * The backend a predicate tree is translated into.  `T` is the sink's
 * native filter representation, e.g. a drizzle `SQL` fragment or a record
 * matcher function.
 */
export interface FilterSink<T> {
  condition(field: FieldDescriptor, predicate: ResolvedPredicate): T;
  and(left: T, right: T): T;
  or(left: T, right: T): T;
  not(operand: T): T;
  /** A filter that matches nothing, for terms with no searchable field. */
  never(): T;
}

/**
 * Fold a predicate tree into a sink's native filter, children first.
 *
 * @example
 * ```typescript
 * const { tree } = compileSearch("age>30 name=Michael", registry);
 * if (tree != null) {
 *   const where = translate(tree, createDrizzleSink(getTableColumns(people)));
 *   const rows = await db.select().from(people).where(where);
 * }
 * ```
 */
export function translate<T>(node: ExpressionNode, sink: FilterSink<T>): T {
  switch (node.type) {
    case "leaf":
      return translateTerm(node.term, sink);
    case "and":
      return sink.and(translate(node.left, sink), translate(node.right, sink));
    case "or":
      return sink.or(translate(node.left, sink), translate(node.right, sink));
    case "not":
      return sink.not(translate(node.child, sink));
  }
}

/**
 * A term matches when any of its field conditions does.
 */
function translateTerm<T>(term: SearchTerm, sink: FilterSink<T>): T {
  let result: T | null = null;
  for (const { field, predicate } of term.conditions) {
    const condition = sink.condition(field, predicate);
    result = result == null ? condition : sink.or(result, condition);
  }
  const matched = result ?? sink.never();
  return term.negated ? sink.not(matched) : matched;
}
