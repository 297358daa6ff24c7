/**
 * Markdown reports of algebras, models and evaluation results.
 */

import type { Lattice } from '../algebra/lattice.js';
import type { ResiduatedLattice } from '../algebra/residuated.js';
import type { TwistStructure } from '../algebra/twist.js';
import type { PltsModel } from '../model/plts.js';
import type { WorldValue } from '../semantics/evaluate.js';
import type { ValidityResult } from '../semantics/validity.js';

export interface ReportOptions {
  /** Counter-examples listed before truncating. */
  maxCounterExamples?: number;
}

/**
 * Render a Markdown table.
 */
export function markdownTable(header: string[], rows: string[][]): string[] {
  const line = (cells: string[]) => `| ${cells.join(' | ')} |`;
  return [line(header), line(header.map(() => '---')), ...rows.map(line)];
}

/**
 * An operation table with `labels` as both row and column keys.
 */
function operationTable(
  symbol: string,
  labels: readonly string[],
  op: (row: string, col: string) => string
): string[] {
  return markdownTable(
    [symbol, ...labels],
    labels.map((row) => [row, ...labels.map((col) => op(row, col))])
  );
}

export function describeLattice(name: string, lattice: Lattice): string {
  const lines: string[] = [];
  lines.push(`# Lattice ${name}`);
  lines.push('');
  lines.push(`Elements: ${lattice.elements.join(', ')}`);
  lines.push(`Top: ${lattice.top} | Bottom: ${lattice.bottom}`);
  lines.push(`Covers: ${lattice.coverPairs().map(([a, b]) => `${a} < ${b}`).join(', ') || 'none'}`);
  lines.push('');
  lines.push('## Meet');
  lines.push('');
  lines.push(...operationTable('∧', lattice.elements, (a, b) => lattice.meet(a, b)));
  lines.push('');
  lines.push('## Join');
  lines.push('');
  lines.push(...operationTable('∨', lattice.elements, (a, b) => lattice.join(a, b)));
  return lines.join('\n');
}

export function describeResiduatedLattice(name: string, rl: ResiduatedLattice): string {
  const lines: string[] = [describeLattice(name, rl.lattice).replace(/^# Lattice/, '# Residuated lattice')];
  lines.push('');
  lines.push('## Tensor');
  lines.push('');
  lines.push(...operationTable('⊗', rl.elements, (a, b) => rl.tensor(a, b)));
  lines.push('');
  lines.push('## Residuum');
  lines.push('');
  lines.push(...operationTable('→', rl.elements, (b, c) => rl.residuum(b, c)));
  return lines.join('\n');
}

export function describeTwistStructure(name: string, ts: TwistStructure): string {
  const tables = ts.tables();
  const lines: string[] = [];
  lines.push(`# Twist structure ${name}`);
  lines.push('');
  lines.push(`Elements: ${tables.elements.join(', ')}`);
  lines.push(
    `Absolute true: ${ts.format(ts.absoluteTrue)} | Absolute false: ${ts.format(ts.absoluteFalse)}`
  );
  lines.push('');
  lines.push('## Negation');
  lines.push('');
  lines.push(...markdownTable(['x', '~x'], tables.elements.map((x) => [x, tables.negation[x]])));
  lines.push('');
  lines.push('## Meet');
  lines.push('');
  lines.push(...operationTable('&', tables.elements, (x, y) => tables.meet[x][y]));
  lines.push('');
  lines.push('## Join');
  lines.push('');
  lines.push(...operationTable('|', tables.elements, (x, y) => tables.join[x][y]));
  lines.push('');
  lines.push('## Implication');
  lines.push('');
  lines.push(...operationTable('=>', tables.elements, (x, y) => tables.implication[x][y]));
  return lines.join('\n');
}

export function describeModel(model: PltsModel): string {
  const ts = model.structure;
  const lines: string[] = [];
  lines.push(`# Model ${model.name}`);
  lines.push('');
  if (model.description) {
    lines.push(model.description);
    lines.push('');
  }

  const props = model.propositions();
  lines.push('## Worlds');
  lines.push('');
  lines.push(
    ...markdownTable(
      ['world', ...props],
      model.worlds().map(({ id, valuation }) => [
        id,
        ...props.map((p) => {
          const value = valuation.get(p);
          return value ? ts.format(value) : '-';
        }),
      ])
    )
  );
  lines.push('');

  lines.push('## Transitions');
  lines.push('');
  const relations = model.relations();
  if (relations.length === 0) {
    lines.push('_None_');
  } else {
    lines.push(
      ...markdownTable(
        ['from', 'action', 'to', 'weight'],
        relations.map((r) => [r.source, r.action, r.target, ts.format(r.weight)])
      )
    );
  }
  return lines.join('\n');
}

export function formatWorldValues(values: WorldValue[], ts: TwistStructure): string {
  return markdownTable(
    ['world', 'value'],
    values.map(({ world, value }) => [world, ts.format(value)])
  ).join('\n');
}

/**
 * Summarise a validity check: a headline, then the counter-examples.
 */
export function formatValidity(
  formula: string,
  result: ValidityResult,
  ts: TwistStructure,
  options: ReportOptions = {}
): string {
  const aggregate = ts.format(result.aggregate);
  if (result.valid) {
    return `VALID ${formula} ${aggregate}`;
  }

  const { counterExamples } = result;
  const limit = options.maxCounterExamples ?? counterExamples.length;
  const shown = counterExamples.slice(0, limit);
  const lines = [
    `INVALID ${formula} ${aggregate}`,
    `Fails in ${counterExamples.length} world${counterExamples.length === 1 ? '' : 's'}:`,
    ...shown.map(({ world, value }) => `  ${world}: ${ts.format(value)}`),
  ];
  if (shown.length < counterExamples.length) {
    lines.push(`  ... ${counterExamples.length - shown.length} more`);
  }
  return lines.join('\n');
}
