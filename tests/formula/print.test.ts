/**
 * Tests for formula pretty-printing.
 */

import { describe, it, expect } from 'vitest';
import { formatFormula } from '../../src/formula/print.js';
import { parseFormula } from '../../src/formula/parser.js';

describe('formatFormula', () => {
  it('should drop redundant parentheses', () => {
    expect(formatFormula(parseFormula('(p & q) | r'))).toBe('p & q | r');
    expect(formatFormula(parseFormula('(p -> q) -> r'))).toBe('p -> q -> r');
    expect(formatFormula(parseFormula('((p))'))).toBe('p');
  });

  it('should keep parentheses that change the tree', () => {
    expect(formatFormula(parseFormula('p & (q | r)'))).toBe('p & (q | r)');
    expect(formatFormula(parseFormula('p -> (q -> r)'))).toBe('p -> (q -> r)');
    expect(formatFormula(parseFormula('~(p | q)'))).toBe('~(p | q)');
  });

  it('should write modalities in the canonical syntax', () => {
    expect(formatFormula(parseFormula('[a](p & q)'))).toBe('[]_a (p & q)');
    expect(formatFormula(parseFormula('<go>TOP'))).toBe('<>_go 1');
    expect(formatFormula(parseFormula('[]_a ~<>_b p'))).toBe('[]_a ~<>_b p');
  });

  it('should print every operator symbol', () => {
    expect(formatFormula(parseFormula('p&q|r=>s->t<->u'))).toBe('p & q | r => s -> t <-> u');
  });

  const samples = [
    'p',
    '~~p & BOT',
    'p | q & r',
    '(p | q) & r',
    'p -> (q -> r)',
    '(p <-> q) <-> r',
    'p <-> (q <-> r)',
    '[go](p => q) -> <stay>~r',
    '~[]_a (p | <>_b (q & 1))',
    '(p => q) => (q => p)',
  ];

  for (const text of samples) {
    it(`should re-parse '${text}' to the same tree`, () => {
      const ast = parseFormula(text);
      expect(parseFormula(formatFormula(ast))).toEqual(ast);
    });
  }
});
