/**
 * Formula syntax trees.
 */

export type BinaryKind = 'and' | 'or' | 'residuum' | 'implies' | 'iff';
export type ModalKind = 'box' | 'diamond';

export interface AtomNode {
  readonly kind: 'atom';
  readonly name: string;
}

export interface ConstantNode {
  readonly kind: 'constant';
  /** `1` is absolute true, `0` absolute false. */
  readonly value: 1 | 0;
}

export interface NotNode {
  readonly kind: 'not';
  readonly operand: Formula;
}

export interface ModalNode {
  readonly kind: ModalKind;
  readonly action: string;
  readonly operand: Formula;
}

export interface BinaryNode {
  readonly kind: BinaryKind;
  readonly left: Formula;
  readonly right: Formula;
}

export type Formula = AtomNode | ConstantNode | NotNode | ModalNode | BinaryNode;

/**
 * Binding strength of binary connectives, higher binds tighter.
 */
export const BINARY_PRECEDENCE: Readonly<Record<BinaryKind, number>> = {
  and: 5,
  or: 4,
  residuum: 3,
  implies: 2,
  iff: 1,
};

export const BINARY_SYMBOL: Readonly<Record<BinaryKind, string>> = {
  and: '&',
  or: '|',
  residuum: '=>',
  implies: '->',
  iff: '<->',
};

export function isBinary(node: Formula): node is BinaryNode {
  return node.kind in BINARY_PRECEDENCE;
}

export function isModal(node: Formula): node is ModalNode {
  return node.kind === 'box' || node.kind === 'diamond';
}

/**
 * Proposition names in order of first occurrence.
 */
export function formulaAtoms(node: Formula): string[] {
  const seen = new Set<string>();
  walk(node, (n) => {
    if (n.kind === 'atom') seen.add(n.name);
  });
  return [...seen];
}

/**
 * Action labels in order of first occurrence.
 */
export function formulaActions(node: Formula): string[] {
  const seen = new Set<string>();
  walk(node, (n) => {
    if (isModal(n)) seen.add(n.action);
  });
  return [...seen];
}

function walk(node: Formula, visit: (node: Formula) => void): void {
  visit(node);
  switch (node.kind) {
    case 'atom':
    case 'constant':
      return;
    case 'not':
    case 'box':
    case 'diamond':
      walk(node.operand, visit);
      return;
    default:
      walk(node.left, visit);
      walk(node.right, visit);
  }
}
