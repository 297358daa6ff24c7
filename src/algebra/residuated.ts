/**
 * Residuated lattices: a lattice with a commutative monoidal tensor whose
 * residuum is derived by brute force.
 */

import { NotResiduatedError, TypeMismatchError } from '../core/errors.js';
import type { ResiduatedLatticeDefinition } from '../core/types.js';
import { Lattice } from './lattice.js';

export type TensorEntry = readonly [a: string, b: string, result: string];

/**
 * An immutable residuated lattice over a {@link Lattice}.
 */
export class ResiduatedLattice {
  readonly lattice: Lattice;

  private readonly tensorTable: readonly (readonly number[])[];
  private readonly residuumTable: readonly (readonly number[])[];

  private constructor(lattice: Lattice, tensorTable: number[][], residuumTable: number[][]) {
    this.lattice = lattice;
    this.tensorTable = tensorTable;
    this.residuumTable = residuumTable;
  }

  /**
   * Add a tensor to a lattice, validate it and derive the residuum.
   *
   * @param tensor - one entry per ordered pair of elements
   * @param residuum - optional explicit residuum entries `[b, c, b→c]`; each
   *   must agree with the derived value
   */
  static extend(
    lattice: Lattice,
    tensor: readonly TensorEntry[],
    residuum?: readonly TensorEntry[]
  ): ResiduatedLattice {
    const n = lattice.size;
    const table = readTable(lattice, tensor);
    const leq = (x: number, y: number) => lattice.leq(lattice.elements[x], lattice.elements[y]);
    const name = (x: number) => lattice.elements[x];
    const top = lattice.index(lattice.top);

    for (let a = 0; a < n; a++) {
      if (table[a][top] !== a || table[top][a] !== a) {
        throw new NotResiduatedError(
          `Top '${lattice.top}' is not the tensor identity: ${name(a)} ⊗ ${lattice.top} = ${name(table[a][top])}`
        );
      }
      for (let b = 0; b < n; b++) {
        if (table[a][b] !== table[b][a]) {
          throw new NotResiduatedError(
            `Tensor is not commutative: ${name(a)} ⊗ ${name(b)} = ${name(table[a][b])} but ${name(b)} ⊗ ${name(a)} = ${name(table[b][a])}`
          );
        }
        for (let c = 0; c < n; c++) {
          if (table[table[a][b]][c] !== table[a][table[b][c]]) {
            throw new NotResiduatedError(
              `Tensor is not associative on (${name(a)}, ${name(b)}, ${name(c)})`
            );
          }
          if (leq(a, b) && !leq(table[a][c], table[b][c])) {
            throw new NotResiduatedError(
              `Tensor is not monotone: ${name(a)} ≤ ${name(b)} but ${name(a)} ⊗ ${name(c)} ≰ ${name(b)} ⊗ ${name(c)}`
            );
          }
        }
      }
    }

    const residuumTable: number[][] = [];
    for (let b = 0; b < n; b++) {
      residuumTable.push([]);
      for (let c = 0; c < n; c++) {
        const admissible: number[] = [];
        for (let a = 0; a < n; a++) {
          if (leq(table[a][b], c)) admissible.push(a);
        }
        const max = admissible.find((x) => admissible.every((y) => leq(y, x)));
        if (max === undefined) {
          throw new NotResiduatedError(
            `No residuum for ${name(b)} → ${name(c)}: the set {a | a ⊗ ${name(b)} ≤ ${name(c)}} has no maximum`
          );
        }
        residuumTable[b].push(max);
      }
    }

    const result = new ResiduatedLattice(lattice, table, residuumTable);
    result.verify();

    for (const [b, c, given] of residuum ?? []) {
      for (const value of [b, c, given]) {
        if (!lattice.has(value)) {
          throw new TypeMismatchError(value, `the lattice (residuum entry ${b}, ${c}, ${given})`);
        }
      }
      const derived = result.residuum(b, c);
      if (derived !== given) {
        throw new NotResiduatedError(
          `Residuum ${b} → ${c} is given as ${given} but the tensor forces ${derived}`
        );
      }
    }

    return result;
  }

  /**
   * The Heyting (Gödel) case: tensor is meet.
   */
  static heyting(lattice: Lattice): ResiduatedLattice {
    const tensor: TensorEntry[] = [];
    for (const a of lattice.elements) {
      for (const b of lattice.elements) {
        tensor.push([a, b, lattice.meet(a, b)]);
      }
    }
    return ResiduatedLattice.extend(lattice, tensor);
  }

  get elements(): readonly string[] {
    return this.lattice.elements;
  }

  get top(): string {
    return this.lattice.top;
  }

  get bottom(): string {
    return this.lattice.bottom;
  }

  tensor(a: string, b: string): string {
    const l = this.lattice;
    return l.elements[this.tensorTable[l.index(a)][l.index(b)]];
  }

  /**
   * The residuum `b → c`: the largest `a` with `a ⊗ b ≤ c`.
   */
  residuum(b: string, c: string): string {
    const l = this.lattice;
    return l.elements[this.residuumTable[l.index(b)][l.index(c)]];
  }

  /**
   * Check `a ⊗ b ≤ c ⟺ a ≤ (b → c)` over every triple.
   */
  verify(): void {
    const l = this.lattice;
    for (const a of l.elements) {
      for (const b of l.elements) {
        for (const c of l.elements) {
          if (l.leq(this.tensor(a, b), c) !== l.leq(a, this.residuum(b, c))) {
            throw new NotResiduatedError(`Adjunction fails for (${a}, ${b}, ${c})`);
          }
        }
      }
    }
  }

  toDefinition(name: string): ResiduatedLatticeDefinition {
    const tensor: [string, string, string][] = [];
    for (const a of this.elements) {
      for (const b of this.elements) {
        tensor.push([a, b, this.tensor(a, b)]);
      }
    }
    return { ...this.lattice.toDefinition(name), tensor };
  }
}

function readTable(lattice: Lattice, entries: readonly TensorEntry[]): number[][] {
  const n = lattice.size;
  const table: (number | undefined)[][] = Array.from({ length: n }, () =>
    Array.from({ length: n }, (): number | undefined => undefined)
  );

  for (const [a, b, result] of entries) {
    for (const value of [a, b, result]) {
      if (!lattice.has(value)) {
        throw new TypeMismatchError(value, `the lattice (tensor entry ${a}, ${b}, ${result})`);
      }
    }
    const i = lattice.index(a);
    const j = lattice.index(b);
    const r = lattice.index(result);
    const existing = table[i][j];
    if (existing !== undefined && existing !== r) {
      throw new NotResiduatedError(
        `Conflicting tensor entries for (${a}, ${b}): ${lattice.elements[existing]} and ${result}`
      );
    }
    table[i][j] = r;
  }

  return table.map((row, i) =>
    row.map((value, j) => {
      if (value === undefined) {
        throw new NotResiduatedError(
          `Missing tensor entry for (${lattice.elements[i]}, ${lattice.elements[j]})`
        );
      }
      return value;
    })
  );
}
