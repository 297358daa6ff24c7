/**
 * Error types raised by the algebra, model, parser and evaluator.
 *
 * Every error carries a stable `code` so callers (the CLI, a GUI layer) can
 * branch without matching on messages.
 */

export type ErrorCode =
  | 'INVALID_LATTICE'
  | 'NOT_RESIDUATED'
  | 'DUPLICATE_WORLD'
  | 'UNKNOWN_WORLD'
  | 'TYPE_MISMATCH'
  | 'PARSE_ERROR'
  | 'UNDEFINED_ATOM'
  | 'UNDEFINED_ACTION'
  | 'WORKSPACE_ERROR';

/**
 * Base class for all errors thrown by this package.
 */
export class TwistModalError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed order, missing glb/lub, or non-unique top/bottom.
 */
export class InvalidLatticeError extends TwistModalError {
  constructor(message: string) {
    super('INVALID_LATTICE', message);
  }
}

/**
 * The tensor is not a commutative monoid with identity top, or no residuum
 * satisfies the adjunction law.
 */
export class NotResiduatedError extends TwistModalError {
  constructor(message: string) {
    super('NOT_RESIDUATED', message);
  }
}

export class DuplicateWorldError extends TwistModalError {
  readonly worldId: string;

  constructor(worldId: string) {
    super('DUPLICATE_WORLD', `World '${worldId}' already exists`);
    this.worldId = worldId;
  }
}

export class UnknownWorldError extends TwistModalError {
  readonly worldId: string;

  constructor(worldId: string) {
    super('UNKNOWN_WORLD', `World '${worldId}' does not exist`);
    this.worldId = worldId;
  }
}

/**
 * A value is not a member of the algebra it was handed to.
 */
export class TypeMismatchError extends TwistModalError {
  readonly value: string;

  constructor(value: string, context: string) {
    super('TYPE_MISMATCH', `'${value}' is not an element of ${context}`);
    this.value = value;
  }
}

export class ParseError extends TwistModalError {
  readonly token: string;
  readonly position: number;

  constructor(message: string, token: string, position: number) {
    super('PARSE_ERROR', `${message} at position ${position} (near '${token}')`);
    this.token = token;
    this.position = position;
  }
}

export class UndefinedAtomError extends TwistModalError {
  readonly atom: string;
  readonly world: string;

  constructor(atom: string, world: string) {
    super('UNDEFINED_ATOM', `Proposition '${atom}' has no value in world '${world}'`);
    this.atom = atom;
    this.world = world;
  }
}

export class UndefinedActionError extends TwistModalError {
  readonly action: string;

  constructor(action: string) {
    super('UNDEFINED_ACTION', `Action '${action}' is not declared by any relation of the model`);
    this.action = action;
  }
}

/**
 * Unknown reference or malformed definition in a workspace.
 */
export class WorkspaceError extends TwistModalError {
  constructor(message: string) {
    super('WORKSPACE_ERROR', message);
  }
}
