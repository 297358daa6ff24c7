/**
 * Tests for Markdown reports.
 */

import { describe, it, expect } from 'vitest';
import {
  describeLattice,
  describeModel,
  describeResiduatedLattice,
  describeTwistStructure,
  formatValidity,
  formatWorldValues,
  markdownTable,
} from '../../src/export/report.js';
import { Lattice } from '../../src/algebra/lattice.js';
import { PltsModel } from '../../src/model/plts.js';
import { parseFormula } from '../../src/formula/parser.js';
import { checkValidity } from '../../src/semantics/validity.js';
import { evaluateAll } from '../../src/semantics/evaluate.js';
import { booleanAlgebra, booleanTwist, booleanValues, goModel } from '../fixtures/algebras.js';

const ts = booleanTwist();
const { T, F } = booleanValues(ts);

describe('markdownTable', () => {
  it('should render a header, separator and rows', () => {
    expect(markdownTable(['a', 'b'], [['1', '2']])).toEqual(['| a | b |', '| --- | --- |', '| 1 | 2 |']);
  });
});

describe('describeLattice', () => {
  it('should list elements, bounds, covers and tables', () => {
    expect(describeLattice('two', Lattice.chain(['0', '1'])).split('\n')).toEqual([
      '# Lattice two',
      '',
      'Elements: 0, 1',
      'Top: 1 | Bottom: 0',
      'Covers: 0 < 1',
      '',
      '## Meet',
      '',
      '| ∧ | 0 | 1 |',
      '| --- | --- | --- |',
      '| 0 | 0 | 0 |',
      '| 1 | 0 | 1 |',
      '',
      '## Join',
      '',
      '| ∨ | 0 | 1 |',
      '| --- | --- | --- |',
      '| 0 | 0 | 1 |',
      '| 1 | 1 | 1 |',
    ]);
  });

  it('should print none for a single element', () => {
    expect(describeLattice('one', Lattice.build(['x'], []))).toContain('Covers: none');
  });
});

describe('describeResiduatedLattice', () => {
  it('should add tensor and residuum tables', () => {
    const lines = describeResiduatedLattice('bool', booleanAlgebra()).split('\n');

    expect(lines[0]).toBe('# Residuated lattice bool');
    expect(lines.slice(-13)).toEqual([
      '## Tensor',
      '',
      '| ⊗ | 0 | 1 |',
      '| --- | --- | --- |',
      '| 0 | 0 | 0 |',
      '| 1 | 0 | 1 |',
      '',
      '## Residuum',
      '',
      '| → | 0 | 1 |',
      '| --- | --- | --- |',
      '| 0 | 1 | 1 |',
      '| 1 | 0 | 1 |',
    ]);
  });
});

describe('describeTwistStructure', () => {
  it('should show the distinguished elements and the operation tables', () => {
    const lines = describeTwistStructure('bool-twist', ts).split('\n');

    expect(lines[0]).toBe('# Twist structure bool-twist');
    expect(lines).toContain('Elements: (0,0), (0,1), (1,0), (1,1)');
    expect(lines).toContain('Absolute true: (1,0) | Absolute false: (0,1)');
    expect(lines).toContain('| (1,0) | (0,1) |');
    expect(lines).toContain('| & | (0,0) | (0,1) | (1,0) | (1,1) |');
    expect(lines).toContain('| (0,0) | (0,0) | (0,1) | (0,0) | (0,1) |');
  });
});

describe('describeModel', () => {
  it('should tabulate valuations and transitions', () => {
    const model = goModel(T, ts);
    model.description = 'demo model';

    expect(describeModel(model).split('\n')).toEqual([
      '# Model go',
      '',
      'demo model',
      '',
      '## Worlds',
      '',
      '| world | p |',
      '| --- | --- |',
      '| w1 | - |',
      '| w2 | (1,0) |',
      '',
      '## Transitions',
      '',
      '| from | action | to | weight |',
      '| --- | --- | --- | --- |',
      '| w1 | go | w2 | (1,0) |',
    ]);
  });

  it('should mark a model without transitions', () => {
    const model = new PltsModel(ts, 'lonely');
    model.addWorld('w1');

    expect(describeModel(model).split('\n').slice(-1)).toEqual(['_None_']);
  });
});

describe('formatWorldValues', () => {
  it('should render one row per world', () => {
    const values = evaluateAll(parseFormula('[]_go p'), goModel(F, ts));

    expect(formatWorldValues(values, ts)).toBe(
      ['| world | value |', '| --- | --- |', '| w1 | (0,1) |', '| w2 | (1,0) |'].join('\n')
    );
  });
});

describe('formatValidity', () => {
  it('should print a one-line verdict for a valid formula', () => {
    const result = checkValidity(parseFormula('[]_go 1'), goModel(F, ts));
    expect(formatValidity('[]_go 1', result, ts)).toBe('VALID []_go 1 (1,0)');
  });

  it('should list counter-examples', () => {
    const result = checkValidity(parseFormula('<>_go p'), goModel(F, ts));

    expect(formatValidity('<>_go p', result, ts)).toBe(
      ['INVALID <>_go p (0,1)', 'Fails in 2 worlds:', '  w1: (0,1)', '  w2: (0,1)'].join('\n')
    );
  });

  it('should truncate long counter-example lists', () => {
    const result = checkValidity(parseFormula('<>_go p'), goModel(F, ts));

    expect(formatValidity('<>_go p', result, ts, { maxCounterExamples: 1 })).toBe(
      ['INVALID <>_go p (0,1)', 'Fails in 2 worlds:', '  w1: (0,1)', '  ... 1 more'].join('\n')
    );
  });

  it('should use the singular for one failing world', () => {
    const result = checkValidity(parseFormula('<>_go p'), goModel(T, ts));
    expect(formatValidity('<>_go p', result, ts).split('\n')[1]).toBe('Fails in 1 world:');
  });
});
