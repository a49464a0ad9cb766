/**
 * Filter Types
 *
 * A filter is a tagged value: a scope plus a retention predicate. The
 * pipeline matches on the scope to decide which tree level to visit, so
 * predicates never recurse themselves.
 *
 * @module
 */

import type {
  Callable,
  ClassEntity,
  ModuleEntity,
  Repository,
} from "../models/entities.js";

// =============================================================================
// Scopes & Contexts
// =============================================================================

export type FilterScope = "repository" | "module" | "class" | "callable";

/**
 * Scopes from the leaves up. Composite stages must follow this order.
 */
export const SCOPE_ORDER: readonly FilterScope[] = ["callable", "class", "module", "repository"];

export interface ModuleContext {
  readonly repository: Repository;
}

export interface ClassContext extends ModuleContext {
  readonly module: ModuleEntity;
}

export interface CallableContext extends ClassContext {
  /** Owning class for methods, null for module-level functions */
  readonly owner: ClassEntity | null;
}

// =============================================================================
// Filter Variants
// =============================================================================

interface FilterInfo {
  /** Registry key; matched case-insensitively */
  readonly name: string;
  readonly description: string;
  /** Moved behind every other filter when a chain is resolved */
  readonly runsLast?: boolean;
}

export interface RepositoryFilter extends FilterInfo {
  readonly kind: "repository";
  keep(repository: Repository): boolean;
}

export interface ModuleFilter extends FilterInfo {
  readonly kind: "module";
  keep(module: ModuleEntity, context: ModuleContext): boolean;
}

export interface ClassFilter extends FilterInfo {
  readonly kind: "class";
  keep(cls: ClassEntity, context: ClassContext): boolean;
}

export interface CallableFilter extends FilterInfo {
  readonly kind: "callable";
  keep(callable: Callable, context: CallableContext): boolean;
}

export type ScopedFilter = RepositoryFilter | ModuleFilter | ClassFilter | CallableFilter;

/**
 * Applies its stages in order, reporting exclusions under its own name
 */
export interface CompositeFilter extends FilterInfo {
  readonly kind: "composite";
  readonly stages: readonly ScopedFilter[];
}

export type Filter = ScopedFilter | CompositeFilter;

// =============================================================================
// Outcome
// =============================================================================

/**
 * One pruned node. Only the outermost removed node is recorded; its
 * descendants go with it.
 */
export interface Exclusion {
  readonly filter: string;
  readonly scope: FilterScope;
  /** null for a repository */
  readonly filePath: string | null;
  /** Repository name, module name, class name, function name or `Class.method` */
  readonly name: string;
}

export interface FilterOutcome {
  /** null when the repository itself was excluded */
  readonly repository: Repository | null;
  readonly exclusions: readonly Exclusion[];
}
