/**
 * Finite lattices: order validation and meet/join tables.
 */

import { InvalidLatticeError, TypeMismatchError } from '../core/errors.js';
import type { LatticeDefinition } from '../core/types.js';

/**
 * An immutable finite lattice.
 *
 * Elements are identified by name; internally every operation is a lookup
 * into an index table computed once by {@link Lattice.build}.
 */
export class Lattice {
  readonly elements: readonly string[];
  readonly top: string;
  readonly bottom: string;

  private readonly indexOf: ReadonlyMap<string, number>;
  private readonly order: readonly (readonly boolean[])[];
  private readonly meetTable: readonly (readonly number[])[];
  private readonly joinTable: readonly (readonly number[])[];

  private constructor(
    elements: string[],
    order: boolean[][],
    meetTable: number[][],
    joinTable: number[][],
    top: string,
    bottom: string
  ) {
    this.elements = Object.freeze(elements);
    this.indexOf = new Map(elements.map((e, i) => [e, i]));
    this.order = order;
    this.meetTable = meetTable;
    this.joinTable = joinTable;
    this.top = top;
    this.bottom = bottom;
  }

  /**
   * Validate a partial order and derive its meet/join tables.
   *
   * `orderPairs` may be any generating set: the reflexive-transitive closure
   * is taken before antisymmetry is checked.
   */
  static build(
    elements: readonly string[],
    orderPairs: readonly (readonly [string, string])[]
  ): Lattice {
    if (elements.length === 0) {
      throw new InvalidLatticeError('A lattice needs at least one element');
    }

    const index = new Map<string, number>();
    elements.forEach((e, i) => {
      if (index.has(e)) {
        throw new InvalidLatticeError(`Duplicate element '${e}'`);
      }
      index.set(e, i);
    });

    const n = elements.length;
    const leq: boolean[][] = Array.from({ length: n }, (_, i) =>
      Array.from({ length: n }, (_, j) => i === j)
    );

    for (const [lower, upper] of orderPairs) {
      const i = index.get(lower);
      const j = index.get(upper);
      if (i === undefined || j === undefined) {
        const missing = i === undefined ? lower : upper;
        throw new InvalidLatticeError(
          `Order pair (${lower}, ${upper}) names unknown element '${missing}'`
        );
      }
      leq[i][j] = true;
    }

    // Transitive closure (Floyd-Warshall)
    for (let k = 0; k < n; k++) {
      for (let i = 0; i < n; i++) {
        if (!leq[i][k]) continue;
        for (let j = 0; j < n; j++) {
          if (leq[k][j]) leq[i][j] = true;
        }
      }
    }

    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        if (leq[i][j] && leq[j][i]) {
          throw new InvalidLatticeError(
            `Order is not antisymmetric: '${elements[i]}' and '${elements[j]}' are below each other`
          );
        }
      }
    }

    const meetTable: number[][] = [];
    const joinTable: number[][] = [];
    for (let a = 0; a < n; a++) {
      meetTable.push([]);
      joinTable.push([]);
      for (let b = 0; b < n; b++) {
        const glb = bestBound(n, (x) => leq[x][a] && leq[x][b], (x, y) => leq[y][x]);
        if (glb === undefined) {
          throw new InvalidLatticeError(
            `No greatest lower bound for '${elements[a]}' and '${elements[b]}'`
          );
        }
        const lub = bestBound(n, (x) => leq[a][x] && leq[b][x], (x, y) => leq[x][y]);
        if (lub === undefined) {
          throw new InvalidLatticeError(
            `No least upper bound for '${elements[a]}' and '${elements[b]}'`
          );
        }
        meetTable[a].push(glb);
        joinTable[a].push(lub);
      }
    }

    const maximal = extremal(n, (x, y) => x !== y && leq[x][y]);
    const minimal = extremal(n, (x, y) => x !== y && leq[y][x]);
    if (maximal.length !== 1) {
      throw new InvalidLatticeError(
        `Expected exactly one top element, found ${maximal.map((i) => elements[i]).join(', ')}`
      );
    }
    if (minimal.length !== 1) {
      throw new InvalidLatticeError(
        `Expected exactly one bottom element, found ${minimal.map((i) => elements[i]).join(', ')}`
      );
    }

    return new Lattice(
      [...elements],
      leq,
      meetTable,
      joinTable,
      elements[maximal[0]],
      elements[minimal[0]]
    );
  }

  /**
   * Build a chain from a list of elements, lowest first.
   */
  static chain(elements: readonly string[]): Lattice {
    const pairs: [string, string][] = [];
    for (let i = 1; i < elements.length; i++) {
      pairs.push([elements[i - 1], elements[i]]);
    }
    return Lattice.build(elements, pairs);
  }

  has(a: string): boolean {
    return this.indexOf.has(a);
  }

  get size(): number {
    return this.elements.length;
  }

  /**
   * Position of an element in {@link elements}.
   */
  index(a: string): number {
    const i = this.indexOf.get(a);
    if (i === undefined) {
      throw new TypeMismatchError(a, 'the lattice');
    }
    return i;
  }

  leq(a: string, b: string): boolean {
    return this.order[this.index(a)][this.index(b)];
  }

  meet(a: string, b: string): string {
    return this.elements[this.meetTable[this.index(a)][this.index(b)]];
  }

  join(a: string, b: string): string {
    return this.elements[this.joinTable[this.index(a)][this.index(b)]];
  }

  /**
   * Meet of a list; the empty meet is top.
   */
  meetAll(values: Iterable<string>): string {
    let acc = this.top;
    for (const v of values) acc = this.meet(acc, v);
    return acc;
  }

  /**
   * Join of a list; the empty join is bottom.
   */
  joinAll(values: Iterable<string>): string {
    let acc = this.bottom;
    for (const v of values) acc = this.join(acc, v);
    return acc;
  }

  /**
   * All pairs `(a, b)` with `a ≤ b`, reflexive pairs included.
   */
  orderPairs(): [string, string][] {
    const pairs: [string, string][] = [];
    for (let i = 0; i < this.size; i++) {
      for (let j = 0; j < this.size; j++) {
        if (this.order[i][j]) pairs.push([this.elements[i], this.elements[j]]);
      }
    }
    return pairs;
  }

  /**
   * Covering pairs `(a, b)`: `a < b` with nothing strictly between.
   */
  coverPairs(): [string, string][] {
    const n = this.size;
    const pairs: [string, string][] = [];
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        if (i === j || !this.order[i][j]) continue;
        let between = false;
        for (let k = 0; k < n && !between; k++) {
          between = k !== i && k !== j && this.order[i][k] && this.order[k][j];
        }
        if (!between) pairs.push([this.elements[i], this.elements[j]]);
      }
    }
    return pairs;
  }

  toDefinition(name: string): LatticeDefinition {
    return {
      name,
      elements: [...this.elements],
      order: this.coverPairs(),
    };
  }
}

/**
 * Find the unique candidate that dominates every other candidate.
 */
function bestBound(
  n: number,
  isCandidate: (x: number) => boolean,
  dominates: (x: number, y: number) => boolean
): number | undefined {
  const candidates: number[] = [];
  for (let x = 0; x < n; x++) {
    if (isCandidate(x)) candidates.push(x);
  }
  return candidates.find((x) => candidates.every((y) => dominates(x, y)));
}

function extremal(n: number, strictlyBeyond: (x: number, y: number) => boolean): number[] {
  const result: number[] = [];
  for (let x = 0; x < n; x++) {
    let beaten = false;
    for (let y = 0; y < n && !beaten; y++) {
      beaten = strictlyBeyond(x, y);
    }
    if (!beaten) result.push(x);
  }
  return result;
}
