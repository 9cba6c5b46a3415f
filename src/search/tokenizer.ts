/**
 * Search string tokenizer.
 *
 * Splits a raw search string into words, operators, boolean keywords,
 * negation signs and parentheses, in input order.
 */

import { SearchSyntaxError } from "./errors";
import type { ComparisonOperator, Keyword, Token } from "./types";

const KEYWORDS: ReadonlySet<string> = new Set<Keyword>(["and", "or", "not"]);

function isWhitespace(ch: string): boolean {
  return /\s/.test(ch);
}

function isParen(ch: string): boolean {
  return ch === "(" || ch === ")";
}

function isOperatorChar(ch: string): boolean {
  return ch === ":" || ch === "=" || ch === ">" || ch === "<";
}

function isKeyword(word: string): word is Keyword {
  return KEYWORDS.has(word);
}

function readOperator(input: string, pos: number): ComparisonOperator | null {
  const pair = input.slice(pos, pos + 2);
  if (pair === ">=" || pair === "<=") return pair;
  const ch = input[pos];
  if (ch === ":" || ch === "=" || ch === ">" || ch === "<") return ch;
  return null;
}

/**
 * Tokenizer: converts the search string into tokens.
 *
 * @throws {SearchSyntaxError} If a double quote is never closed.
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  // Set right after an OPERATOR token: the next word is a value, which may
  // itself contain operator characters or start with "-".
  let expectValue = false;

  const nextNonWhitespace = (from: number): string | undefined => {
    let i = from;
    while (i < input.length && isWhitespace(input[i])) i++;
    return input[i];
  };

  while (pos < input.length) {
    const ch = input[pos];

    // Skip whitespace
    if (isWhitespace(ch)) {
      pos++;
      continue;
    }

    // Parentheses
    if (isParen(ch)) {
      tokens.push({
        type: ch === "(" ? "LPAREN" : "RPAREN",
        value: ch,
        position: pos,
      });
      expectValue = false;
      pos++;
      continue;
    }

    // Negation (must be directly followed by a word, a quote or a group)
    if (ch === "-" && !expectValue && pos + 1 < input.length) {
      const next = input[pos + 1];
      if (!isWhitespace(next) && next !== ")" && !isOperatorChar(next)) {
        tokens.push({ type: "NEGATION", value: "-", position: pos });
        pos++;
        continue;
      }
    }

    // Quoted string
    if (ch === '"') {
      const start = pos;
      let value = "";
      let closed = false;
      pos++; // skip opening quote
      while (pos < input.length) {
        if (input[pos] === "\\") {
          // Escape sequence
          pos++;
          if (pos < input.length) {
            value += input[pos];
            pos++;
          }
        } else if (input[pos] === '"') {
          closed = true;
          pos++; // skip closing quote
          break;
        } else {
          value += input[pos];
          pos++;
        }
      }
      if (!closed) {
        throw new SearchSyntaxError("Unterminated quote", { position: start });
      }
      tokens.push({ type: "WORD", value, quoted: true, position: start });
      expectValue = false;
      continue;
    }

    // Operator; two-character forms first
    const operator = expectValue ? null : readOperator(input, pos);
    if (operator != null) {
      tokens.push({ type: "OPERATOR", value: operator, position: pos });
      pos += operator.length;
      expectValue = true;
      continue;
    }

    // Word
    const start = pos;
    while (
      pos < input.length &&
      !isWhitespace(input[pos]) &&
      !isParen(input[pos]) &&
      (expectValue || !isOperatorChar(input[pos]))
    ) {
      pos++;
    }
    const word = input.slice(start, pos);
    const lowered = word.toLowerCase();
    const next = nextNonWhitespace(pos);
    if (
      !expectValue &&
      isKeyword(lowered) &&
      (next === undefined || !isOperatorChar(next))
    ) {
      tokens.push({ type: "KEYWORD", value: lowered, position: start });
    } else {
      tokens.push({
        type: "WORD",
        value: word,
        quoted: false,
        position: start,
      });
    }
    expectValue = false;
  }

  return tokens;
}
