/**
 * Boundary shapes exchanged with persistence and presentation layers.
 *
 * These are the plain-data forms of the algebras and models. The engine
 * itself works on validated objects (`Lattice`, `TwistStructure`,
 * `PltsModel`); conversion happens in `storage/definitions.ts`.
 */

/**
 * A twist element in its serialised form: evidence for, evidence against.
 */
export type TwistPair = [t: string, f: string];

/**
 * The kinds of definition a workspace can hold.
 */
export type DefinitionKind = 'lattice' | 'residuated' | 'twist' | 'model';

/**
 * Definition kinds in dependency order.
 */
export const DEFINITION_KINDS: readonly DefinitionKind[] = ['lattice', 'residuated', 'twist', 'model'];

/**
 * A finite lattice given by its elements and (a generating set of) its order.
 */
export interface LatticeDefinition {
  name: string;
  elements: string[];
  order: [lower: string, upper: string][];
}

/**
 * A lattice plus a tensor table, each entry `[a, b, a⊗b]`.
 */
export interface ResiduatedLatticeDefinition extends LatticeDefinition {
  tensor: [a: string, b: string, result: string][];
  /** Optional explicit residuum entries `[b, c, b→c]`, cross-checked on load. */
  residuum?: [b: string, c: string, result: string][];
}

/**
 * Twist structures have no data of their own beyond the algebra they are
 * generated from.
 */
export interface TwistStructureDefinition {
  name: string;
  residuatedLattice: string;
}

export interface WorldDefinition {
  id: string;
  valuation: Record<string, TwistPair>;
}

export interface RelationDefinition {
  from: string;
  to: string;
  action: string;
  weight: TwistPair;
}

export interface ModelDefinition {
  name: string;
  /** Name of a twist-structure definition, or of a residuated lattice. */
  twistStructureRef: string;
  description?: string;
  worlds: WorldDefinition[];
  relations: RelationDefinition[];
}

/**
 * Any definition, tagged with its kind.
 */
export type AnyDefinition =
  | { kind: 'lattice'; definition: LatticeDefinition }
  | { kind: 'residuated'; definition: ResiduatedLatticeDefinition }
  | { kind: 'twist'; definition: TwistStructureDefinition }
  | { kind: 'model'; definition: ModelDefinition };

/**
 * Ask whether a formula is valid in a named model.
 */
export interface EvaluationRequest {
  formulaText: string;
  modelRef: string;
}

export interface CounterExampleRecord {
  world: string;
  value: TwistPair;
}

export type EvaluationResponse =
  | { valid: true }
  | { valid: false; counterExamples: CounterExampleRecord[] };
