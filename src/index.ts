/**
 * twist-modal - paraconsistent modal logic over finite twist structures
 *
 * @packageDocumentation
 */

export {
  TwistModalError,
  InvalidLatticeError,
  NotResiduatedError,
  DuplicateWorldError,
  UnknownWorldError,
  TypeMismatchError,
  ParseError,
  UndefinedAtomError,
  UndefinedActionError,
  WorkspaceError,
} from './core/errors.js';
export type { ErrorCode } from './core/errors.js';

export { DEFINITION_KINDS } from './core/types.js';
export type {
  TwistPair,
  DefinitionKind,
  LatticeDefinition,
  ResiduatedLatticeDefinition,
  TwistStructureDefinition,
  WorldDefinition,
  RelationDefinition,
  ModelDefinition,
  AnyDefinition,
  EvaluationRequest,
  EvaluationResponse,
  CounterExampleRecord,
} from './core/types.js';

export { Lattice } from './algebra/lattice.js';
export { ResiduatedLattice } from './algebra/residuated.js';
export type { TensorEntry } from './algebra/residuated.js';
export { TwistStructure } from './algebra/twist.js';
export type { TwistElement, TwistTables } from './algebra/twist.js';

export { PltsModel } from './model/plts.js';
export type { Valuation, World, Transition, Relation, BatchOptions } from './model/plts.js';

export { formulaAtoms, formulaActions, isBinary, isModal } from './formula/ast.js';
export type { Formula, BinaryKind, ModalKind } from './formula/ast.js';
export { tokenize } from './formula/lexer.js';
export type { Token, TokenType } from './formula/lexer.js';
export { parseFormula } from './formula/parser.js';
export { formatFormula } from './formula/print.js';

export { evaluate, evaluateAll } from './semantics/evaluate.js';
export type { WorldValue } from './semantics/evaluate.js';
export { checkValidity } from './semantics/validity.js';
export type { ValidityResult, CounterExample } from './semantics/validity.js';

export {
  parseDefinition,
  buildLattice,
  buildResiduatedLattice,
  buildModel,
  modelToDefinition,
} from './storage/definitions.js';
export { Workspace, runEvaluationRequest } from './storage/workspace.js';
export { findWorkspaceRoot, kindFromName, loadDefinition, loadAllDefinitions, loadWorkspace } from './storage/files.js';
export { saveDefinition, initWorkspace } from './storage/add.js';

export { loadConfig, mergeConfig, DEFAULT_CONFIG } from './config/index.js';
export type { Config } from './config/index.js';

export {
  describeLattice,
  describeResiduatedLattice,
  describeTwistStructure,
  describeModel,
  formatValidity,
} from './export/report.js';
