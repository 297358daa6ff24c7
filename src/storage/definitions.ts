/**
 * Validation and conversion of the plain-data definitions in core/types.ts.
 */

import { z } from 'zod';
import { WorkspaceError } from '../core/errors.js';
import type {
  AnyDefinition,
  DefinitionKind,
  LatticeDefinition,
  ModelDefinition,
  ResiduatedLatticeDefinition,
  TwistPair,
  TwistStructureDefinition,
} from '../core/types.js';
import { Lattice } from '../algebra/lattice.js';
import { ResiduatedLattice } from '../algebra/residuated.js';
import type { TwistElement, TwistStructure } from '../algebra/twist.js';
import { PltsModel } from '../model/plts.js';

const name = z.string().min(1);
const pair = z.tuple([z.string(), z.string()]);
const triple = z.tuple([z.string(), z.string(), z.string()]);

const latticeShape = z.object({
  name,
  elements: z.array(name).min(1),
  order: z.array(pair).default([]),
});

export const LatticeDefinitionSchema: z.ZodType<LatticeDefinition, z.ZodTypeDef, unknown> =
  latticeShape;

export const ResiduatedLatticeDefinitionSchema: z.ZodType<
  ResiduatedLatticeDefinition,
  z.ZodTypeDef,
  unknown
> = latticeShape.extend({
  tensor: z.array(triple),
  residuum: z.array(triple).optional(),
});

export const TwistStructureDefinitionSchema: z.ZodType<
  TwistStructureDefinition,
  z.ZodTypeDef,
  unknown
> = z.object({
  name,
  residuatedLattice: name,
});

export const ModelDefinitionSchema: z.ZodType<ModelDefinition, z.ZodTypeDef, unknown> = z.object({
  name,
  twistStructureRef: name,
  description: z.string().optional(),
  worlds: z
    .array(
      z.object({
        id: name,
        valuation: z.record(z.string(), pair).default({}),
      })
    )
    .default([]),
  relations: z
    .array(
      z.object({
        from: name,
        to: name,
        action: name,
        weight: pair,
      })
    )
    .default([]),
});

/**
 * Render zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  label: string
): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new WorkspaceError(`Invalid ${label} definition: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Validate raw data (parsed YAML or JSON) as a definition of the given kind.
 */
export function parseDefinition(kind: DefinitionKind, raw: unknown): AnyDefinition {
  switch (kind) {
    case 'lattice':
      return { kind, definition: validate(LatticeDefinitionSchema, raw, 'lattice') };
    case 'residuated':
      return {
        kind,
        definition: validate(ResiduatedLatticeDefinitionSchema, raw, 'residuated lattice'),
      };
    case 'twist':
      return { kind, definition: validate(TwistStructureDefinitionSchema, raw, 'twist structure') };
    case 'model':
      return { kind, definition: validate(ModelDefinitionSchema, raw, 'model') };
  }
}

export function buildLattice(definition: LatticeDefinition): Lattice {
  return Lattice.build(definition.elements, definition.order);
}

export function buildResiduatedLattice(definition: ResiduatedLatticeDefinition): ResiduatedLattice {
  return ResiduatedLattice.extend(buildLattice(definition), definition.tensor, definition.residuum);
}

/**
 * Populate a model over `structure`. Worlds are added before relations, so
 * relations may reference worlds declared later in the list.
 */
export function buildModel(definition: ModelDefinition, structure: TwistStructure): PltsModel {
  const model = new PltsModel(structure, definition.name);
  model.description = definition.description;

  for (const world of definition.worlds) {
    const valuation = Object.fromEntries(
      Object.entries(world.valuation).map(
        ([prop, value]): [string, TwistElement] => [prop, structure.fromPair(value)]
      )
    );
    model.addWorld(world.id, valuation);
  }
  for (const relation of definition.relations) {
    model.addRelation(
      relation.from,
      relation.to,
      relation.action,
      structure.fromPair(relation.weight)
    );
  }
  return model;
}

export function modelToDefinition(model: PltsModel, twistStructureRef: string): ModelDefinition {
  const ts = model.structure;
  return {
    name: model.name,
    twistStructureRef,
    ...(model.description !== undefined ? { description: model.description } : {}),
    worlds: model.worlds().map(({ id, valuation }) => ({
      id,
      valuation: Object.fromEntries(
        [...valuation].map(([prop, value]): [string, TwistPair] => [prop, ts.toPair(value)])
      ),
    })),
    relations: model.relations().map(({ source, target, action, weight }) => ({
      from: source,
      to: target,
      action,
      weight: ts.toPair(weight),
    })),
  };
}
