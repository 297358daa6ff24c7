/**
 * A named collection of definitions with lazily built, cached algebras and
 * models.
 */

import { WorkspaceError } from '../core/errors.js';
import type {
  AnyDefinition,
  DefinitionKind,
  EvaluationRequest,
  EvaluationResponse,
  LatticeDefinition,
  ModelDefinition,
  ResiduatedLatticeDefinition,
  TwistStructureDefinition,
} from '../core/types.js';
import type { Lattice } from '../algebra/lattice.js';
import type { ResiduatedLattice } from '../algebra/residuated.js';
import { TwistStructure } from '../algebra/twist.js';
import type { PltsModel } from '../model/plts.js';
import { parseFormula } from '../formula/parser.js';
import { checkValidity } from '../semantics/validity.js';
import { buildLattice, buildModel, buildResiduatedLattice } from './definitions.js';

interface DefinitionMaps {
  lattice: Map<string, LatticeDefinition>;
  residuated: Map<string, ResiduatedLatticeDefinition>;
  twist: Map<string, TwistStructureDefinition>;
  model: Map<string, ModelDefinition>;
}

const KIND_LABEL: Readonly<Record<DefinitionKind, string>> = {
  lattice: 'lattice',
  residuated: 'residuated lattice',
  twist: 'twist structure',
  model: 'model',
};

export class Workspace {
  private readonly definitions: DefinitionMaps = {
    lattice: new Map(),
    residuated: new Map(),
    twist: new Map(),
    model: new Map(),
  };

  private readonly lattices = new Map<string, Lattice>();
  private readonly residuatedLattices = new Map<string, ResiduatedLattice>();
  private readonly twistStructures = new Map<string, TwistStructure>();
  private readonly models = new Map<string, PltsModel>();

  static fromDefinitions(definitions: Iterable<AnyDefinition>): Workspace {
    const workspace = new Workspace();
    for (const definition of definitions) workspace.add(definition);
    return workspace;
  }

  /**
   * Register a definition. Names are unique per kind.
   */
  add(entry: AnyDefinition): void {
    const name = entry.definition.name;
    if (this.has(entry.kind, name)) {
      throw new WorkspaceError(`Duplicate ${KIND_LABEL[entry.kind]} '${name}'`);
    }
    switch (entry.kind) {
      case 'lattice':
        this.definitions.lattice.set(name, entry.definition);
        break;
      case 'residuated':
        this.definitions.residuated.set(name, entry.definition);
        break;
      case 'twist':
        this.definitions.twist.set(name, entry.definition);
        break;
      case 'model':
        this.definitions.model.set(name, entry.definition);
        break;
    }
  }

  has(kind: DefinitionKind, name: string): boolean {
    return this.definitions[kind].has(name);
  }

  names(kind: DefinitionKind): string[] {
    return [...this.definitions[kind].keys()];
  }

  definition(kind: DefinitionKind, name: string): AnyDefinition['definition'] {
    const found = this.definitions[kind].get(name);
    if (!found) {
      throw new WorkspaceError(`Unknown ${KIND_LABEL[kind]} '${name}'`);
    }
    return found;
  }

  lattice(name: string): Lattice {
    return cached(this.lattices, name, () => {
      const definition = this.definitions.lattice.get(name);
      if (!definition) throw new WorkspaceError(`Unknown lattice '${name}'`);
      return buildLattice(definition);
    });
  }

  residuatedLattice(name: string): ResiduatedLattice {
    return cached(this.residuatedLattices, name, () => {
      const definition = this.definitions.residuated.get(name);
      if (!definition) throw new WorkspaceError(`Unknown residuated lattice '${name}'`);
      return buildResiduatedLattice(definition);
    });
  }

  /**
   * Resolve a twist-structure definition, or generate the twist structure of
   * the residuated lattice with that name.
   */
  twistStructure(name: string): TwistStructure {
    return cached(this.twistStructures, name, () => {
      const definition = this.definitions.twist.get(name);
      if (definition) {
        return TwistStructure.generate(this.residuatedLattice(definition.residuatedLattice));
      }
      if (this.definitions.residuated.has(name)) {
        return TwistStructure.generate(this.residuatedLattice(name));
      }
      throw new WorkspaceError(`Unknown twist structure '${name}'`);
    });
  }

  model(name: string): PltsModel {
    return cached(this.models, name, () => {
      const definition = this.definitions.model.get(name);
      if (!definition) throw new WorkspaceError(`Unknown model '${name}'`);
      return buildModel(definition, this.twistStructure(definition.twistStructureRef));
    });
  }
}

function cached<T>(cache: Map<string, T>, name: string, build: () => T): T {
  const hit = cache.get(name);
  if (hit !== undefined) return hit;
  const value = build();
  cache.set(name, value);
  return value;
}

/**
 * Answer an evaluation request against a workspace model.
 */
export function runEvaluationRequest(
  request: EvaluationRequest,
  workspace: Workspace
): EvaluationResponse {
  const formula = parseFormula(request.formulaText);
  const model = workspace.model(request.modelRef);
  const result = checkValidity(formula, model);

  if (result.valid) return { valid: true };
  return {
    valid: false,
    counterExamples: result.counterExamples.map(({ world, value }) => ({
      world,
      value: model.structure.toPair(value),
    })),
  };
}
