/**
 * Tokenizer for modal formulas.
 */

import { ParseError } from '../core/errors.js';

export type TokenType =
  | 'atom'
  | 'constant'
  | 'not'
  | 'and'
  | 'or'
  | 'residuum'
  | 'implies'
  | 'iff'
  | 'box'
  | 'diamond'
  | 'lparen'
  | 'rparen'
  | 'eof';

export interface Token {
  type: TokenType;
  /** Source text of the token. */
  text: string;
  /** Zero-based offset of the first character. */
  position: number;
  /** Atom name, action label, or `1`/`0` for constants. */
  value?: string;
}

export const END_OF_INPUT = '<end of input>';

const SINGLE_CHAR: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ['~', 'not'],
  ['&', 'and'],
  ['|', 'or'],
  ['(', 'lparen'],
  [')', 'rparen'],
]);

const CONSTANT_KEYWORDS: ReadonlyMap<string, string> = new Map([
  ['TOP', '1'],
  ['BOT', '0'],
]);

function isIdentStart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

/**
 * Split formula text into tokens. The last token is always `eof`, positioned
 * right after the last non-blank character.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const readIdent = (): string => {
    const start = pos;
    while (isIdentPart(text[pos])) pos++;
    return text.slice(start, pos);
  };

  // Action label after `[]_` / `<>_`, or inside `[a]` / `<a>`.
  const readAction = (start: number, opener: string, closer: string): string => {
    if (text[pos] === closer) {
      pos++;
      if (text[pos] === '_' && isIdentStart(text[pos + 1])) {
        pos++;
        return readIdent();
      }
      throw new ParseError(
        'Modal operator without an action label',
        text.slice(start, pos),
        start
      );
    }
    if (!isIdentStart(text[pos])) {
      throw new ParseError('Unknown token', opener, start);
    }
    const action = readIdent();
    if (text[pos] !== closer) {
      throw new ParseError(
        `Expected '${closer}' after action label`,
        text[pos] ?? END_OF_INPUT,
        pos
      );
    }
    pos++;
    return action;
  };

  while (pos < text.length) {
    const ch = text[pos];
    const start = pos;

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (isIdentStart(ch)) {
      const name = readIdent();
      const constant = CONSTANT_KEYWORDS.get(name);
      tokens.push(
        constant !== undefined
          ? { type: 'constant', text: name, position: start, value: constant }
          : { type: 'atom', text: name, position: start, value: name }
      );
      continue;
    }

    if (/[0-9]/.test(ch)) {
      const literal = readIdent();
      if (literal !== '0' && literal !== '1') {
        throw new ParseError('Unknown token', literal, start);
      }
      tokens.push({ type: 'constant', text: literal, position: start, value: literal });
      continue;
    }

    const single = SINGLE_CHAR.get(ch);
    if (single !== undefined) {
      pos++;
      tokens.push({ type: single, text: ch, position: start });
      continue;
    }

    if (ch === '=' || ch === '-') {
      if (text[pos + 1] !== '>') {
        throw new ParseError('Unknown token', ch, start);
      }
      pos += 2;
      tokens.push({
        type: ch === '=' ? 'residuum' : 'implies',
        text: text.slice(start, pos),
        position: start,
      });
      continue;
    }

    if (ch === '<' && text[pos + 1] === '-') {
      if (text[pos + 2] !== '>') {
        throw new ParseError('Unknown token', '<-', start);
      }
      pos += 3;
      tokens.push({ type: 'iff', text: '<->', position: start });
      continue;
    }

    if (ch === '<' || ch === '[') {
      pos++;
      const closer = ch === '<' ? '>' : ']';
      const action = readAction(start, ch, closer);
      tokens.push({
        type: ch === '<' ? 'diamond' : 'box',
        text: text.slice(start, pos),
        position: start,
        value: action,
      });
      continue;
    }

    throw new ParseError('Unknown token', ch, start);
  }

  tokens.push({ type: 'eof', text: END_OF_INPUT, position: text.trimEnd().length });
  return tokens;
}
