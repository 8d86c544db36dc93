/**
 * Parser for expression keys.
 *
 * Grammar (the same one the constructors print):
 *
 * ```
 * expression := '¬' expression
 *             | '(' expression ('∧' | '∨') expression ')'
 *             | identifier
 * ```
 *
 * Keys are parsed into raw nodes with the printed child order, then
 * canonicalized under the requested rules.
 *
 * @packageDocumentation
 */

import { XiError } from './errors.js';
import { canonicalize, JUNCTION_SYMBOLS, literal, NEGATION_SYMBOL, raw } from './expression.js';
import { Predicate } from './predicate.js';
import type { CanonicalOptions, Expression } from './types.js';

/**
 * Raised when a key does not follow the expression grammar.
 */
export class ExpressionSyntaxError extends XiError {
  /** The key being parsed. */
  public readonly source: string;
  /** Offset of the offending character. */
  public readonly position: number;

  /**
   * Creates a new ExpressionSyntaxError.
   *
   * @param message - What was expected.
   * @param source - The key being parsed.
   * @param position - Offset of the offending character.
   */
  constructor(message: string, source: string, position: number) {
    super(
      `Expression syntax error at ${String(position)} in '${source}': ${message}`,
      'invalid_expression'
    );
    this.name = 'ExpressionSyntaxError';
    this.source = source;
    this.position = position;
  }
}

const IDENTIFIER_CHAR = /[A-Za-z0-9_]/;

class KeyParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  parse(): Expression {
    const expression = this.parseExpression();
    if (this.pos !== this.source.length) {
      throw this.error('unexpected trailing input');
    }
    return expression;
  }

  private parseExpression(): Expression {
    const ch = this.source[this.pos];

    if (ch === NEGATION_SYMBOL) {
      this.pos++;
      const operand = this.parseExpression();
      return operand.tag === 'atom' && !operand.negated
        ? literal(operand.predicate, true)
        : raw.not(operand);
    }

    if (ch === '(') {
      this.pos++;
      const left = this.parseExpression();
      const op = this.source[this.pos];
      if (op !== JUNCTION_SYMBOLS.and && op !== JUNCTION_SYMBOLS.or) {
        throw this.error(`expected '${JUNCTION_SYMBOLS.and}' or '${JUNCTION_SYMBOLS.or}'`);
      }
      this.pos++;
      const right = this.parseExpression();
      if (this.source[this.pos] !== ')') {
        throw this.error("expected ')'");
      }
      this.pos++;
      return op === JUNCTION_SYMBOLS.and ? raw.and(left, right) : raw.or(left, right);
    }

    return this.parseAtom();
  }

  private parseAtom(): Expression {
    const start = this.pos;
    while (this.pos < this.source.length && IDENTIFIER_CHAR.test(this.source.charAt(this.pos))) {
      this.pos++;
    }
    if (start === this.pos) {
      throw this.error(
        this.pos >= this.source.length ? 'unexpected end of input' : 'expected a predicate name'
      );
    }
    return literal(new Predicate(this.source.slice(start, this.pos)));
  }

  private error(message: string): ExpressionSyntaxError {
    return new ExpressionSyntaxError(message, this.source, this.pos);
  }
}

/**
 * Parses a key into a raw node that prints back to the same text.
 *
 * @param key - Expression text.
 * @returns The raw expression.
 * @throws ExpressionSyntaxError for malformed text.
 * @throws InvalidPredicateError for names that fail the identifier grammar.
 */
export function parseRawExpression(key: string): Expression {
  return new KeyParser(key).parse();
}

/**
 * Parses a key and canonicalizes the result.
 *
 * @param key - Expression text, typically an attractor key.
 * @param options - Rule set and optional cache.
 * @returns The canonical expression.
 *
 * @example
 * ```typescript
 * parseExpression('(¬X∧X)').key; // '(X∧¬X)'
 * ```
 */
export function parseExpression(key: string, options: CanonicalOptions = {}): Expression {
  return canonicalize(parseRawExpression(key), options);
}
