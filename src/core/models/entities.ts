/**
 * Entity Model
 *
 * The Repository → Module → {Function, Class → Method} → Parameter tree.
 * Every entity is created once by the assembler and never edited afterwards;
 * filters build new trees and share untouched subtrees by reference.
 *
 * @module
 */

// =============================================================================
// Repository Identity
// =============================================================================

/**
 * Declared identity of an analysed repository, supplied by whoever checked it out.
 */
export interface RepositoryIdentity {
  /** Package name (matches the PyPI name) */
  readonly name: string;
  /** Source URL */
  readonly url: string;
  /** PyPI release tag the checkout corresponds to */
  readonly releaseTag: string;
  /** Exact git commit hash of the checkout */
  readonly revision: string;
}

// =============================================================================
// Leaf Entities
// =============================================================================

/**
 * A function or method parameter.
 * Line and column are 1-indexed and point at the start of the declaration.
 */
export interface ParameterEntity {
  readonly identifier: string;
  /** Annotation text as written, null when unannotated */
  readonly type: string | null;
  readonly lineNumber: number;
  readonly colOffset: number;
}

/**
 * A class-level attribute assignment
 */
export interface FieldEntity {
  readonly identifier: string;
  readonly type: string | null;
}

// =============================================================================
// Callables
// =============================================================================

interface CallableEntity {
  readonly identifier: string;
  readonly parameters: readonly ParameterEntity[];
  /** Decorators in source order, one per line; empty string when undecorated */
  readonly annotations: string;
  readonly returnType: string | null;
  /** Source text of the suite, without the `def` header */
  readonly body: string;
  /** `name(params) -> return`, derived by buildSignature */
  readonly signature: string;
  /** annotations + signature, derived by buildFullSignature */
  readonly fullSignature: string;
}

/**
 * A module-level function
 */
export interface FunctionEntity extends CallableEntity {
  readonly kind: "function";
  /** Relative path of the declaring file */
  readonly file: string;
}

/**
 * A function declared directly in a class body
 */
export interface MethodEntity extends CallableEntity {
  readonly kind: "method";
  readonly isConstructor: boolean;
}

export type Callable = FunctionEntity | MethodEntity;

// =============================================================================
// Containers
// =============================================================================

export interface ClassEntity {
  readonly identifier: string;
  readonly methods: readonly MethodEntity[];
  /** Base expressions as written, never resolved */
  readonly superclasses: readonly string[];
  readonly fields: readonly FieldEntity[];
  readonly file: string;
}

export interface ModuleEntity {
  /** File stem, e.g. `client` for `pkg/client.py` */
  readonly name: string;
  /** Path relative to the repository root, `/`-separated */
  readonly filePath: string;
  readonly functions: readonly FunctionEntity[];
  readonly classes: readonly ClassEntity[];
}

export interface Repository extends RepositoryIdentity {
  readonly modules: readonly ModuleEntity[];
}

/**
 * Name of the method Python calls to initialize instances
 */
export const CONSTRUCTOR_NAME = "__init__";
