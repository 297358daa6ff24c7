/**
 * Pretty-printing of formulas in canonical syntax.
 */

import { BINARY_PRECEDENCE, BINARY_SYMBOL, isBinary, type Formula } from './ast.js';

/**
 * Render a formula with the fewest parentheses that re-parse to the same
 * tree. Modalities are written `[]_a` / `<>_a`.
 */
export function formatFormula(node: Formula): string {
  switch (node.kind) {
    case 'atom':
      return node.name;
    case 'constant':
      return String(node.value);
    case 'not':
      return `~${formatOperand(node.operand)}`;
    case 'box':
      return `[]_${node.action} ${formatOperand(node.operand)}`;
    case 'diamond':
      return `<>_${node.action} ${formatOperand(node.operand)}`;
    default: {
      const precedence = BINARY_PRECEDENCE[node.kind];
      const left = formatFormula(node.left);
      const right = formatFormula(node.right);
      // Left associative: a right operand at the same level needs brackets.
      const wrapLeft = isBinary(node.left) && BINARY_PRECEDENCE[node.left.kind] < precedence;
      const wrapRight = isBinary(node.right) && BINARY_PRECEDENCE[node.right.kind] <= precedence;
      return `${wrapLeft ? `(${left})` : left} ${BINARY_SYMBOL[node.kind]} ${wrapRight ? `(${right})` : right}`;
    }
  }
}

function formatOperand(node: Formula): string {
  const text = formatFormula(node);
  return isBinary(node) ? `(${text})` : text;
}
