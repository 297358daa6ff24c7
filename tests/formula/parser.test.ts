/**
 * Tests for the formula parser: precedence, associativity and error positions.
 */

import { describe, it, expect } from 'vitest';
import { parseFormula } from '../../src/formula/parser.js';
import { formulaActions, formulaAtoms, type Formula } from '../../src/formula/ast.js';
import { ParseError } from '../../src/core/errors.js';

const p: Formula = { kind: 'atom', name: 'p' };
const q: Formula = { kind: 'atom', name: 'q' };
const r: Formula = { kind: 'atom', name: 'r' };

function parseError(text: string): ParseError {
  try {
    parseFormula(text);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error(`'${text}' parsed without error`);
}

describe('parseFormula precedence', () => {
  it('should bind & tighter than |', () => {
    expect(parseFormula('p | q & r')).toEqual({
      kind: 'or',
      left: p,
      right: { kind: 'and', left: q, right: r },
    });
  });

  it('should bind prefix operators tighter than binary ones', () => {
    expect(parseFormula('~p & q')).toEqual({
      kind: 'and',
      left: { kind: 'not', operand: p },
      right: q,
    });
    expect(parseFormula('[]_a p | q')).toEqual({
      kind: 'or',
      left: { kind: 'box', action: 'a', operand: p },
      right: q,
    });
  });

  it('should order the arrows =>, -> and <-> from tightest to loosest', () => {
    expect(parseFormula('p => q -> r')).toEqual({
      kind: 'implies',
      left: { kind: 'residuum', left: p, right: q },
      right: r,
    });
    expect(parseFormula('p <-> q -> r')).toEqual({
      kind: 'iff',
      left: p,
      right: { kind: 'implies', left: q, right: r },
    });
    expect(parseFormula('p | q => r')).toEqual({
      kind: 'residuum',
      left: { kind: 'or', left: p, right: q },
      right: r,
    });
  });

  it('should associate binary operators to the left', () => {
    expect(parseFormula('p -> q -> r')).toEqual({
      kind: 'implies',
      left: { kind: 'implies', left: p, right: q },
      right: r,
    });
    expect(parseFormula('p & q & r')).toEqual({
      kind: 'and',
      left: { kind: 'and', left: p, right: q },
      right: r,
    });
  });

  it('should let parentheses override precedence', () => {
    expect(parseFormula('(p | q) & r')).toEqual({
      kind: 'and',
      left: { kind: 'or', left: p, right: q },
      right: r,
    });
  });

  it('should parse constants and keyword aliases', () => {
    expect(parseFormula('TOP & 0')).toEqual({
      kind: 'and',
      left: { kind: 'constant', value: 1 },
      right: { kind: 'constant', value: 0 },
    });
  });

  it('should parse names of built-in object properties as atoms', () => {
    expect(parseFormula('constructor')).toEqual({ kind: 'atom', name: 'constructor' });
    expect(parseFormula('valueOf | toString')).toEqual({
      kind: 'or',
      left: { kind: 'atom', name: 'valueOf' },
      right: { kind: 'atom', name: 'toString' },
    });
  });

  it('should parse nested modalities in both syntaxes', () => {
    expect(parseFormula('<go>[]_stay ~p')).toEqual({
      kind: 'diamond',
      action: 'go',
      operand: {
        kind: 'box',
        action: 'stay',
        operand: { kind: 'not', operand: p },
      },
    });
  });
});

describe('parseFormula errors', () => {
  it('should point right after & when the right operand is missing', () => {
    const error = parseError('p & ');

    expect(error.position).toBe(3);
    expect(error.token).toBe('<end of input>');
    expect(error.message).toBe("Missing operand at position 3 (near '<end of input>')");
  });

  it('should report a missing operand in the middle of a formula', () => {
    const error = parseError('p & | q');
    expect(error.message).toBe("Missing operand at position 4 (near '|')");
  });

  it('should report empty input', () => {
    expect(parseError('   ').position).toBe(0);
  });

  it('should report unmatched parentheses', () => {
    expect(parseError('(p & q').message).toBe("Unmatched '(' at position 0 (near '(')");
    expect(parseError('p & q)').message).toBe("Unmatched ')' at position 5 (near ')')");
    expect(parseError('(p q)').message).toBe("Expected ')' at position 3 (near 'q')");
  });

  it('should report trailing input', () => {
    const error = parseError('p q');

    expect(error.message).toBe("Unexpected input after complete formula at position 2 (near 'q')");
    expect(error.code).toBe('PARSE_ERROR');
  });

  it('should report a modal operator without an action label', () => {
    expect(parseError('[] p').message).toBe(
      "Modal operator without an action label at position 0 (near '[]')"
    );
  });
});

describe('formula inspection', () => {
  it('should list atoms and actions in order of first occurrence', () => {
    const formula = parseFormula('[]_b (q & <>_a p) -> <>_b q | r');

    expect(formulaAtoms(formula)).toEqual(['q', 'p', 'r']);
    expect(formulaActions(formula)).toEqual(['b', 'a']);
  });

  it('should list nothing for a constant', () => {
    expect(formulaAtoms(parseFormula('1'))).toEqual([]);
    expect(formulaActions(parseFormula('1'))).toEqual([]);
  });
});
