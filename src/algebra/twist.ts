/**
 * Twist structures: the pair algebra A² over a residuated lattice.
 *
 * An element `(t, f)` reads as evidence for and evidence against a
 * proposition. Operations:
 *
 * - truth order   `(t1,f1) ≤ (t2,f2)` iff `t1 ≤ t2` and `f2 ≤ f1`
 * - meet          `(t1 ∧ t2, f1 ∨ f2)`
 * - join          `(t1 ∨ t2, f1 ∧ f2)`
 * - negation      `(f, t)`
 * - implication   `(t1 → t2, t1 ⊗ f2)`
 */

import { TypeMismatchError } from '../core/errors.js';
import type { TwistPair } from '../core/types.js';
import type { ResiduatedLattice } from './residuated.js';

export interface TwistElement {
  readonly t: string;
  readonly f: string;
}

/**
 * Materialised operation tables, keyed by formatted element.
 */
export interface TwistTables {
  elements: string[];
  meet: Record<string, Record<string, string>>;
  join: Record<string, Record<string, string>>;
  implication: Record<string, Record<string, string>>;
  negation: Record<string, string>;
}

export class TwistStructure {
  /** The generating algebra, shared, not copied. */
  readonly base: ResiduatedLattice;
  readonly elements: readonly TwistElement[];
  readonly absoluteTrue: TwistElement;
  readonly absoluteFalse: TwistElement;

  private readonly negationTable: readonly number[];

  private constructor(base: ResiduatedLattice) {
    this.base = base;
    const names = base.elements;
    const n = names.length;

    const elements: TwistElement[] = [];
    for (const t of names) {
      for (const f of names) {
        elements.push(Object.freeze({ t, f }));
      }
    }
    this.elements = Object.freeze(elements);

    const negation: number[] = [];
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        negation.push(j * n + i);
      }
    }
    this.negationTable = negation;

    this.absoluteTrue = this.element(base.top, base.bottom);
    this.absoluteFalse = this.element(base.bottom, base.top);
  }

  /**
   * Build the twist structure of a residuated lattice.
   *
   * The adjunction law of the input is re-checked first.
   */
  static generate(base: ResiduatedLattice): TwistStructure {
    base.verify();
    return new TwistStructure(base);
  }

  get size(): number {
    return this.elements.length;
  }

  /**
   * The canonical element `(t, f)`.
   */
  element(t: string, f: string): TwistElement {
    return this.elements[this.indexOf({ t, f })];
  }

  fromPair([t, f]: readonly [string, string]): TwistElement {
    return this.element(t, f);
  }

  toPair(x: TwistElement): TwistPair {
    const c = this.canonical(x);
    return [c.t, c.f];
  }

  has(x: TwistElement): boolean {
    return this.base.lattice.has(x.t) && this.base.lattice.has(x.f);
  }

  /**
   * Validate membership and return the interned element equal to `x`.
   */
  canonical(x: TwistElement): TwistElement {
    return this.elements[this.indexOf(x)];
  }

  equals(x: TwistElement, y: TwistElement): boolean {
    return this.indexOf(x) === this.indexOf(y);
  }

  /**
   * Truth order.
   */
  leq(x: TwistElement, y: TwistElement): boolean {
    const l = this.base.lattice;
    this.check(x, y);
    return l.leq(x.t, y.t) && l.leq(y.f, x.f);
  }

  /**
   * Knowledge order: both kinds of evidence grow.
   */
  infoLeq(x: TwistElement, y: TwistElement): boolean {
    const l = this.base.lattice;
    this.check(x, y);
    return l.leq(x.t, y.t) && l.leq(x.f, y.f);
  }

  meet(x: TwistElement, y: TwistElement): TwistElement {
    const l = this.base.lattice;
    this.check(x, y);
    return this.element(l.meet(x.t, y.t), l.join(x.f, y.f));
  }

  join(x: TwistElement, y: TwistElement): TwistElement {
    const l = this.base.lattice;
    this.check(x, y);
    return this.element(l.join(x.t, y.t), l.meet(x.f, y.f));
  }

  negation(x: TwistElement): TwistElement {
    return this.elements[this.negationTable[this.indexOf(x)]];
  }

  /**
   * Residuated implication `(t1 → t2, t1 ⊗ f2)`.
   */
  implication(x: TwistElement, y: TwistElement): TwistElement {
    this.check(x, y);
    return this.element(this.base.residuum(x.t, y.t), this.base.tensor(x.t, y.f));
  }

  /**
   * Agreement of two sources: meet in both components.
   */
  consensus(x: TwistElement, y: TwistElement): TwistElement {
    const l = this.base.lattice;
    this.check(x, y);
    return this.element(l.meet(x.t, y.t), l.meet(x.f, y.f));
  }

  /**
   * Accumulate all evidence: join in both components.
   */
  acceptAll(x: TwistElement, y: TwistElement): TwistElement {
    const l = this.base.lattice;
    this.check(x, y);
    return this.element(l.join(x.t, y.t), l.join(x.f, y.f));
  }

  /**
   * Meet of a list; the empty meet is absolute true.
   */
  meetAll(values: Iterable<TwistElement>): TwistElement {
    let acc = this.absoluteTrue;
    for (const v of values) acc = this.meet(acc, v);
    return acc;
  }

  /**
   * Join of a list; the empty join is absolute false.
   */
  joinAll(values: Iterable<TwistElement>): TwistElement {
    let acc = this.absoluteFalse;
    for (const v of values) acc = this.join(acc, v);
    return acc;
  }

  format(x: TwistElement): string {
    const c = this.canonical(x);
    return `(${c.t},${c.f})`;
  }

  /**
   * All pairs `(x, y)` with `x ≤ y` in the truth order.
   */
  orderPairs(): [TwistElement, TwistElement][] {
    const pairs: [TwistElement, TwistElement][] = [];
    for (const x of this.elements) {
      for (const y of this.elements) {
        if (this.leq(x, y)) pairs.push([x, y]);
      }
    }
    return pairs;
  }

  tables(): TwistTables {
    const tables: TwistTables = {
      elements: this.elements.map((x) => this.format(x)),
      meet: {},
      join: {},
      implication: {},
      negation: {},
    };
    for (const x of this.elements) {
      const key = this.format(x);
      tables.negation[key] = this.format(this.negation(x));
      tables.meet[key] = {};
      tables.join[key] = {};
      tables.implication[key] = {};
      for (const y of this.elements) {
        const other = this.format(y);
        tables.meet[key][other] = this.format(this.meet(x, y));
        tables.join[key][other] = this.format(this.join(x, y));
        tables.implication[key][other] = this.format(this.implication(x, y));
      }
    }
    return tables;
  }

  private check(...values: TwistElement[]): void {
    for (const x of values) this.indexOf(x);
  }

  private indexOf(x: TwistElement): number {
    const l = this.base.lattice;
    if (!this.has(x)) {
      throw new TypeMismatchError(`(${x.t},${x.f})`, 'the twist structure');
    }
    return l.index(x.t) * l.size + l.index(x.f);
  }
}
