/**
 * Paraconsistent labelled transition systems: worlds with twist-valued
 * valuations and twist-weighted, action-labelled transitions.
 */

import {
  DuplicateWorldError,
  TypeMismatchError,
  UnknownWorldError,
} from '../core/errors.js';
import type { TwistElement, TwistStructure } from '../algebra/twist.js';

export type Valuation = Readonly<Record<string, TwistElement>>;

export interface World {
  readonly id: string;
  readonly valuation: ReadonlyMap<string, TwistElement>;
}

export interface Transition {
  readonly target: string;
  readonly weight: TwistElement;
}

/**
 * A transition together with its source and action, as listed by
 * {@link PltsModel.relations}.
 */
export interface Relation extends Transition {
  readonly source: string;
  readonly action: string;
}

export interface BatchOptions {
  /** Id prefix, default `w`. */
  prefix?: string;
  /** Number of the first world, default 1. */
  start?: number;
}

const NO_TRANSITIONS: readonly Transition[] = Object.freeze([]);

/**
 * A mutable model over one twist structure.
 *
 * Every mutation validates its input completely before touching state, so a
 * failed call leaves the model as it was.
 */
export class PltsModel {
  readonly structure: TwistStructure;
  readonly name: string;
  description?: string;

  private readonly worldMap = new Map<string, Map<string, TwistElement>>();
  private readonly edges = new Map<string, Map<string, Transition[]>>();
  private readonly actionSet = new Set<string>();

  constructor(structure: TwistStructure, name = 'model') {
    this.structure = structure;
    this.name = name;
  }

  addWorld(id: string, valuation: Valuation = {}): World {
    if (this.worldMap.has(id)) {
      throw new DuplicateWorldError(id);
    }
    const checked = this.checkValuation(id, valuation);
    this.worldMap.set(id, checked);
    return { id, valuation: checked };
  }

  /**
   * Create `count` worlds named `${prefix}${start + i}`, all or nothing.
   */
  addWorldsBatch(
    count: number,
    valuationFn: (index: number, id: string) => Valuation,
    options: BatchOptions = {}
  ): string[] {
    const prefix = options.prefix ?? 'w';
    const start = options.start ?? 1;
    const pending = new Map<string, Map<string, TwistElement>>();

    for (let i = 0; i < count; i++) {
      const id = `${prefix}${start + i}`;
      if (this.worldMap.has(id) || pending.has(id)) {
        throw new DuplicateWorldError(id);
      }
      pending.set(id, this.checkValuation(id, valuationFn(i, id)));
    }

    for (const [id, valuation] of pending) {
      this.worldMap.set(id, valuation);
    }
    return [...pending.keys()];
  }

  /**
   * Append a transition; parallel edges are kept.
   */
  addRelation(from: string, to: string, action: string, weight: TwistElement): void {
    for (const id of [from, to]) {
      if (!this.worldMap.has(id)) throw new UnknownWorldError(id);
    }
    const canonical = this.checkValue(weight, `weight of ${from} -${action}-> ${to}`);

    let byAction = this.edges.get(from);
    if (!byAction) {
      byAction = new Map();
      this.edges.set(from, byAction);
    }
    const list = byAction.get(action);
    if (list) {
      list.push({ target: to, weight: canonical });
    } else {
      byAction.set(action, [{ target: to, weight: canonical }]);
    }
    this.actionSet.add(action);
  }

  /**
   * Set or replace one valuation entry of an existing world.
   */
  assign(worldId: string, prop: string, value: TwistElement): void {
    const valuation = this.worldMap.get(worldId);
    if (!valuation) throw new UnknownWorldError(worldId);
    valuation.set(prop, this.checkValue(value, `value of '${prop}' in world '${worldId}'`));
  }

  hasWorld(id: string): boolean {
    return this.worldMap.has(id);
  }

  world(id: string): World {
    const valuation = this.worldMap.get(id);
    if (!valuation) throw new UnknownWorldError(id);
    return { id, valuation };
  }

  /**
   * Worlds in insertion order.
   */
  worlds(): World[] {
    return [...this.worldMap].map(([id, valuation]) => ({ id, valuation }));
  }

  get worldCount(): number {
    return this.worldMap.size;
  }

  hasAction(action: string): boolean {
    return this.actionSet.has(action);
  }

  actions(): string[] {
    return [...this.actionSet];
  }

  /**
   * Outgoing transitions of `world` for `action`, in insertion order.
   */
  successors(world: string, action: string): readonly Transition[] {
    if (!this.worldMap.has(world)) throw new UnknownWorldError(world);
    return this.edges.get(world)?.get(action) ?? NO_TRANSITIONS;
  }

  valuation(world: string, prop: string): TwistElement | undefined {
    const valuation = this.worldMap.get(world);
    if (!valuation) throw new UnknownWorldError(world);
    return valuation.get(prop);
  }

  /**
   * Every proposition valued somewhere, in first-seen order.
   */
  propositions(): string[] {
    const seen = new Set<string>();
    for (const valuation of this.worldMap.values()) {
      for (const prop of valuation.keys()) seen.add(prop);
    }
    return [...seen];
  }

  /**
   * All transitions, grouped by source world then action.
   */
  relations(): Relation[] {
    const result: Relation[] = [];
    for (const [source, byAction] of this.edges) {
      for (const [action, list] of byAction) {
        for (const { target, weight } of list) {
          result.push({ source, action, target, weight });
        }
      }
    }
    return result;
  }

  private checkValuation(id: string, valuation: Valuation): Map<string, TwistElement> {
    const checked = new Map<string, TwistElement>();
    for (const [prop, value] of Object.entries(valuation)) {
      checked.set(prop, this.checkValue(value, `value of '${prop}' in world '${id}'`));
    }
    return checked;
  }

  private checkValue(value: TwistElement, context: string): TwistElement {
    if (!this.structure.has(value)) {
      throw new TypeMismatchError(`(${value.t},${value.f})`, `the twist structure (${context})`);
    }
    return this.structure.canonical(value);
  }
}
