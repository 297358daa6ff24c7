/**
 * Validity: a formula is valid in a model when it evaluates to absolute
 * true at every world.
 */

import type { TwistElement } from '../algebra/twist.js';
import type { Formula } from '../formula/ast.js';
import type { PltsModel } from '../model/plts.js';
import { evaluateAll, type WorldValue } from './evaluate.js';

export type CounterExample = WorldValue;

export type ValidityResult =
  | { valid: true; aggregate: TwistElement }
  | { valid: false; counterExamples: CounterExample[]; aggregate: TwistElement };

/**
 * Evaluate at every world and collect the worlds that are not absolutely
 * true, in world insertion order. `aggregate` is the meet of all world
 * values.
 */
export function checkValidity(node: Formula, model: PltsModel): ValidityResult {
  const ts = model.structure;
  const values = evaluateAll(node, model);
  const aggregate = ts.meetAll(values.map((v) => v.value));
  const counterExamples = values.filter((v) => !ts.equals(v.value, ts.absoluteTrue));

  return counterExamples.length === 0
    ? { valid: true, aggregate }
    : { valid: false, counterExamples, aggregate };
}
