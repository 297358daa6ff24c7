/**
 * Per-world evaluation of formulas in a PLTS.
 */

import { UndefinedActionError, UndefinedAtomError, UnknownWorldError } from '../core/errors.js';
import type { TwistElement } from '../algebra/twist.js';
import type { Formula, ModalNode } from '../formula/ast.js';
import type { PltsModel } from '../model/plts.js';

export interface WorldValue {
  world: string;
  value: TwistElement;
}

/**
 * The twist value of `node` at `world`.
 *
 * Modal operators aggregate over the world's transitions for the action in
 * insertion order. A world without such transitions gives absolute false
 * for `<>_a` and absolute true for `[]_a`; an action that no relation of the
 * model uses is an error.
 */
export function evaluate(node: Formula, model: PltsModel, world: string): TwistElement {
  if (!model.hasWorld(world)) {
    throw new UnknownWorldError(world);
  }
  return evaluateAt(node, model, world);
}

/**
 * Evaluate at every world, in insertion order.
 */
export function evaluateAll(node: Formula, model: PltsModel): WorldValue[] {
  return model.worlds().map(({ id }) => ({ world: id, value: evaluateAt(node, model, id) }));
}

function evaluateAt(node: Formula, model: PltsModel, world: string): TwistElement {
  const ts = model.structure;

  switch (node.kind) {
    case 'atom': {
      const value = model.valuation(world, node.name);
      if (value === undefined) {
        throw new UndefinedAtomError(node.name, world);
      }
      return value;
    }
    case 'constant':
      return node.value === 1 ? ts.absoluteTrue : ts.absoluteFalse;
    case 'not':
      return ts.negation(evaluateAt(node.operand, model, world));
    case 'and':
      return ts.meet(evaluateAt(node.left, model, world), evaluateAt(node.right, model, world));
    case 'or':
      return ts.join(evaluateAt(node.left, model, world), evaluateAt(node.right, model, world));
    case 'residuum':
      return ts.implication(
        evaluateAt(node.left, model, world),
        evaluateAt(node.right, model, world)
      );
    case 'implies':
      return material(
        evaluateAt(node.left, model, world),
        evaluateAt(node.right, model, world),
        model
      );
    case 'iff': {
      const left = evaluateAt(node.left, model, world);
      const right = evaluateAt(node.right, model, world);
      return ts.meet(material(left, right, model), material(right, left, model));
    }
    case 'box':
    case 'diamond':
      return evaluateModal(node, model, world);
  }
}

function material(left: TwistElement, right: TwistElement, model: PltsModel): TwistElement {
  const ts = model.structure;
  return ts.join(ts.negation(left), right);
}

function evaluateModal(node: ModalNode, model: PltsModel, world: string): TwistElement {
  const ts = model.structure;
  if (!model.hasAction(node.action)) {
    throw new UndefinedActionError(node.action);
  }

  // Empty joins and meets give the vacuous values.
  const steps = model.successors(world, node.action).map(({ target, weight }) => {
    const inner = evaluateAt(node.operand, model, target);
    return node.kind === 'diamond' ? ts.meet(weight, inner) : ts.implication(weight, inner);
  });
  return node.kind === 'diamond' ? ts.joinAll(steps) : ts.meetAll(steps);
}
