/**
 * Search query parser.
 *
 * Parses the token stream into a predicate tree, resolving every term
 * against the field registry as it goes.
 *
 * Grammar (highest to lowest binding):
 *   primary    = "(" expression ")" | "-" primary | "not" primary | term
 *   term       = [ columnKey operator ] value
 *   andExpr    = primary ( [ "and" ] primary )*
 *   orExpr     = andExpr ( "or" andExpr )*
 *   expression = orExpr
 *
 * Adjacent terms are joined with AND.  `-` on a term flips the term's
 * `negated` flag; `not`, and `-` on a group, wrap the operand in a NOT node.
 */

import type { DateContext } from "./dates";
import { SearchSyntaxError, UnknownFieldError } from "./errors";
import type { FieldRegistry } from "./fields";
import { resolveFreeText, resolvePredicate } from "./resolver";
import { tokenize } from "./tokenizer";
import type {
  ExpressionNode,
  Keyword,
  LeafNode,
  OperatorToken,
  SearchTerm,
  Token,
  WordToken,
} from "./types";

export interface ParseOptions extends DateContext {
  /** Reject column keys that name no field instead of searching them. */
  strictFields: boolean;
  /** Accept a unique part of a search key in place of the whole key. */
  partialKeys: boolean;
}

export interface ParseResult {
  tree: ExpressionNode | null;
  /** Search keys named by column terms, in order of first use. */
  referencedKeys: string[];
}

function isKeywordToken(token: Token | undefined, keyword: Keyword): boolean {
  return token?.type === "KEYWORD" && token.value === keyword;
}

function leaf(term: SearchTerm): LeafNode {
  return { type: "leaf", term };
}

/**
 * Parser: converts tokens into a predicate tree.
 */
class Parser {
  private readonly tokens: Token[];
  private readonly registry: FieldRegistry;
  private readonly options: ParseOptions;
  private readonly inputLength: number;
  private readonly referencedKeys: string[] = [];
  private pos = 0;

  constructor(
    tokens: Token[],
    registry: FieldRegistry,
    options: ParseOptions,
    inputLength: number,
  ) {
    this.tokens = tokens;
    this.registry = registry;
    this.options = options;
    this.inputLength = inputLength;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private advance(): void {
    this.pos++;
  }

  /**
   * Parse the entire token stream.
   */
  parse(): ParseResult {
    if (this.tokens.length === 0) {
      return { tree: null, referencedKeys: [] };
    }
    const tree = this.parseOrExpr();
    const extra = this.peek();
    if (extra != null) {
      throw new SearchSyntaxError(
        extra.type === "RPAREN"
          ? "Unbalanced parenthesis"
          : `Unexpected '${extra.value}'`,
        { position: extra.position },
      );
    }
    return { tree, referencedKeys: this.referencedKeys };
  }

  /**
   * Parse OR expression: andExpr ("or" andExpr)*
   */
  private parseOrExpr(): ExpressionNode {
    let left = this.parseAndExpr();
    while (true) {
      const token = this.peek();
      if (token == null || !isKeywordToken(token, "or")) break;
      this.advance(); // consume "or"
      this.expectOperand(token);
      const right = this.parseAndExpr();
      left = { type: "or", left, right };
    }
    return left;
  }

  /**
   * Parse AND expression: primary (["and"] primary)*
   */
  private parseAndExpr(): ExpressionNode {
    let left = this.parsePrimary();
    while (true) {
      const token = this.peek();
      // Stop at OR, RPAREN, or the end
      if (
        token == null ||
        token.type === "RPAREN" ||
        isKeywordToken(token, "or")
      ) {
        break;
      }
      if (isKeywordToken(token, "and")) {
        this.advance(); // consume "and"
        this.expectOperand(token);
      }
      const right = this.parsePrimary();
      left = { type: "and", left, right };
    }
    return left;
  }

  /**
   * Parse a primary: group, negation, or a single term.
   */
  private parsePrimary(): ExpressionNode {
    const token = this.peek();
    if (token == null) {
      throw new SearchSyntaxError("Unexpected end of search", {
        position: this.inputLength,
      });
    }

    switch (token.type) {
      case "LPAREN": {
        this.advance(); // consume "("
        if (this.peek()?.type === "RPAREN") {
          throw new SearchSyntaxError("Empty parentheses", {
            position: token.position,
          });
        }
        const inner = this.parseOrExpr();
        if (this.peek()?.type !== "RPAREN") {
          throw new SearchSyntaxError("Unbalanced parenthesis", {
            position: token.position,
          });
        }
        this.advance(); // consume ")"
        return inner;
      }

      case "RPAREN":
        throw new SearchSyntaxError("Unbalanced parenthesis", {
          position: token.position,
        });

      case "NEGATION": {
        this.advance();
        this.expectOperand(token);
        const operand = this.parsePrimary();
        if (operand.type === "leaf") {
          return leaf({ ...operand.term, negated: !operand.term.negated });
        }
        return { type: "not", child: operand };
      }

      case "KEYWORD": {
        if (token.value !== "not") {
          throw new SearchSyntaxError(`Dangling '${token.value}'`, {
            position: token.position,
          });
        }
        this.advance();
        this.expectOperand(token);
        return { type: "not", child: this.parsePrimary() };
      }

      case "OPERATOR":
        throw new SearchSyntaxError(
          `Operator '${token.value}' is missing a field name`,
          { position: token.position },
        );

      case "WORD":
        return this.parseTerm(token);
    }
  }

  /**
   * Ensure something that can start a primary follows `token`.
   */
  private expectOperand(token: Token): void {
    const next = this.peek();
    if (
      next == null ||
      next.type === "RPAREN" ||
      isKeywordToken(next, "and") ||
      isKeywordToken(next, "or")
    ) {
      throw new SearchSyntaxError(`Dangling '${token.value}'`, {
        position: token.position,
      });
    }
  }

  /**
   * Parse a single term: [columnKey operator] value
   */
  private parseTerm(word: WordToken): LeafNode {
    this.advance();
    const operator = this.peek();
    if (operator?.type !== "OPERATOR") {
      return this.freeTextTerm(word.value, word.quoted, word.position);
    }
    this.advance();
    const value = this.peek();
    if (value?.type !== "WORD") {
      throw new SearchSyntaxError(
        `Operator '${operator.value}' is missing a value`,
        { position: operator.position },
      );
    }
    this.advance();
    return this.columnTerm(word, operator, value);
  }

  private columnTerm(
    key: WordToken,
    operator: OperatorToken,
    value: WordToken,
  ): LeafNode {
    const field = key.quoted
      ? null
      : this.registry.find(key.value, {
          partial: this.options.partialKeys,
          position: key.position,
        });

    if (field == null) {
      if (this.options.strictFields && !key.quoted) {
        throw new UnknownFieldError(key.value, { position: key.position });
      }
      // Not a column: search the whole thing as text
      return this.freeTextTerm(
        `${key.value}${operator.value}${value.value}`,
        key.quoted || value.quoted,
        key.position,
      );
    }

    if (!this.referencedKeys.includes(field.searchKey)) {
      this.referencedKeys.push(field.searchKey);
    }
    const predicate = resolvePredicate(
      field,
      {
        operator: operator.value,
        value: value.value,
        quoted: value.quoted,
        position: value.position,
      },
      this.options,
    );
    return leaf({
      fields: [field],
      operator: operator.value,
      value: value.value,
      quoted: value.quoted,
      negated: false,
      position: key.position,
      conditions: [{ field, predicate }],
    });
  }

  private freeTextTerm(
    value: string,
    quoted: boolean,
    position: number,
  ): LeafNode {
    const fields = this.registry.freeTextFields;
    return leaf({
      fields,
      operator: ":",
      value,
      quoted,
      negated: false,
      position,
      conditions: resolveFreeText(fields, value, quoted),
    });
  }
}

/**
 * Parse a token stream into a predicate tree.
 */
export function parseTokens(
  tokens: Token[],
  registry: FieldRegistry,
  options: ParseOptions,
  inputLength = 0,
): ParseResult {
  return new Parser(tokens, registry, options, inputLength).parse();
}

/**
 * Parse a search string into a predicate tree.
 *
 * @param query The search string typed by the user.
 * @param registry The searchable fields.
 * @param options Reference time, time zone and key matching rules.
 * @returns The tree (or `null` for a blank query) and the search keys
 *   it references.
 * @throws {SearchError} If the query is malformed or a value does not fit
 *   its field.
 *
 * @example
 * ```typescript
 * parseSearchQuery("age>30 name=Michael", registry, options).tree
 * // => { type: "and", left: { type: "leaf", ... }, right: { ... } }
 *
 * parseSearchQuery("a or b and c", registry, options).tree
 * // => { type: "or", left: a, right: { type: "and", left: b, right: c } }
 * ```
 */
export function parseSearchQuery(
  query: string,
  registry: FieldRegistry,
  options: ParseOptions,
): ParseResult {
  return parseTokens(tokenize(query), registry, options, query.length);
}
