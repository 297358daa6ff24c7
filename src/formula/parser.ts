/**
 * Recursive-descent parser for modal formulas.
 *
 * Precedence, tightest first: atoms and constants, prefix operators
 * (`~`, `[]_a`, `<>_a`), `&`, `|`, `=>`, `->`, `<->`. Binary operators
 * associate to the left. Parsing never consults a model: names are resolved
 * when the formula is evaluated.
 */

import { ParseError } from '../core/errors.js';
import type { BinaryKind, Formula } from './ast.js';
import { tokenize, type Token, type TokenType } from './lexer.js';

/**
 * Binary levels from loosest to tightest.
 */
const LEVELS: readonly BinaryKind[] = ['iff', 'implies', 'residuum', 'or', 'and'];

class Parser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(text: string) {
    this.tokens = tokenize(text);
  }

  parse(): Formula {
    const node = this.binary(0);
    const next = this.peek();
    if (next.type === 'rparen') {
      throw new ParseError("Unmatched ')'", next.text, next.position);
    }
    if (next.type !== 'eof') {
      throw new ParseError('Unexpected input after complete formula', next.text, next.position);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.type !== 'eof') this.index++;
    return token;
  }

  private binary(level: number): Formula {
    if (level === LEVELS.length) return this.unary();

    const kind = LEVELS[level];
    let node = this.binary(level + 1);
    while (this.peek().type === (kind satisfies TokenType)) {
      this.advance();
      const right = this.binary(level + 1);
      node = { kind, left: node, right };
    }
    return node;
  }

  private unary(): Formula {
    const token = this.peek();
    switch (token.type) {
      case 'not':
        this.advance();
        return { kind: 'not', operand: this.unary() };
      case 'box':
      case 'diamond':
        this.advance();
        return { kind: token.type, action: token.value ?? '', operand: this.unary() };
      default:
        return this.primary();
    }
  }

  private primary(): Formula {
    const token = this.advance();
    switch (token.type) {
      case 'atom':
        return { kind: 'atom', name: token.text };
      case 'constant':
        return { kind: 'constant', value: token.value === '1' ? 1 : 0 };
      case 'lparen': {
        const inner = this.binary(0);
        const close = this.peek();
        if (close.type === 'eof') {
          throw new ParseError("Unmatched '('", token.text, token.position);
        }
        if (close.type !== 'rparen') {
          throw new ParseError("Expected ')'", close.text, close.position);
        }
        this.advance();
        return inner;
      }
      default:
        throw new ParseError('Missing operand', token.text, token.position);
    }
  }
}

/**
 * Parse formula text into a syntax tree.
 *
 * @throws ParseError with the offending token and its zero-based position
 */
export function parseFormula(text: string): Formula {
  return new Parser(text).parse();
}
