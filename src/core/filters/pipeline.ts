/**
 * Filter Pipeline
 *
 * Applies a resolved filter chain to a repository. Each step returns a new
 * tree; arrays and nodes that a filter leaves alone are reused as-is, so an
 * untouched repository comes back as the same object.
 *
 * @module
 */

import type {
  Callable,
  ClassEntity,
  ModuleEntity,
  Repository,
} from "../models/entities.js";
import type {
  CallableFilter,
  ClassFilter,
  Exclusion,
  Filter,
  FilterOutcome,
  ModuleFilter,
  ScopedFilter,
} from "./types.js";

// =============================================================================
// Copy-on-write Helpers
// =============================================================================

function sameItems<T>(before: readonly T[], after: readonly T[]): boolean {
  return before.length === after.length && before.every((item, i) => item === after[i]);
}

function reuse<T>(before: readonly T[], after: readonly T[]): readonly T[] {
  return sameItems(before, after) ? before : after;
}

// =============================================================================
// Scope Visitors
// =============================================================================

function filterModules(
  repository: Repository,
  filter: ModuleFilter,
  report: (exclusion: Exclusion) => void,
  label: string
): Repository {
  const modules = repository.modules.filter((module) => {
    const keep = filter.keep(module, { repository });
    if (!keep) {
      report({ filter: label, scope: "module", filePath: module.filePath, name: module.name });
    }
    return keep;
  });
  return sameItems(repository.modules, modules) ? repository : { ...repository, modules };
}

function filterClasses(
  repository: Repository,
  filter: ClassFilter,
  report: (exclusion: Exclusion) => void,
  label: string
): Repository {
  const modules = repository.modules.map((module): ModuleEntity => {
    const classes = module.classes.filter((cls) => {
      const keep = filter.keep(cls, { repository, module });
      if (!keep) {
        report({ filter: label, scope: "class", filePath: module.filePath, name: cls.identifier });
      }
      return keep;
    });
    return sameItems(module.classes, classes) ? module : { ...module, classes };
  });
  return sameItems(repository.modules, modules) ? repository : { ...repository, modules };
}

function filterCallables(
  repository: Repository,
  filter: CallableFilter,
  report: (exclusion: Exclusion) => void,
  label: string
): Repository {
  const modules = repository.modules.map((module): ModuleEntity => {
    const keepCallable = (callable: Callable, owner: ClassEntity | null): boolean => {
      const keep = filter.keep(callable, { repository, module, owner });
      if (!keep) {
        const name = owner ? `${owner.identifier}.${callable.identifier}` : callable.identifier;
        report({ filter: label, scope: "callable", filePath: module.filePath, name });
      }
      return keep;
    };

    const functions = reuse(
      module.functions,
      module.functions.filter((fn) => keepCallable(fn, null))
    );
    const classes = reuse(
      module.classes,
      module.classes.map((cls): ClassEntity => {
        const methods = cls.methods.filter((method) => keepCallable(method, cls));
        return sameItems(cls.methods, methods) ? cls : { ...cls, methods };
      })
    );

    return functions === module.functions && classes === module.classes
      ? module
      : { ...module, functions, classes };
  });
  return sameItems(repository.modules, modules) ? repository : { ...repository, modules };
}

function applyScoped(
  repository: Repository,
  filter: ScopedFilter,
  report: (exclusion: Exclusion) => void,
  label: string
): Repository | null {
  switch (filter.kind) {
    case "repository":
      if (filter.keep(repository)) return repository;
      report({ filter: label, scope: "repository", filePath: null, name: repository.name });
      return null;
    case "module":
      return filterModules(repository, filter, report, label);
    case "class":
      return filterClasses(repository, filter, report, label);
    case "callable":
      return filterCallables(repository, filter, report, label);
  }
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Applies one filter. A composite applies its stages in order and stops
 * once the repository is gone.
 */
export function applyFilter(repository: Repository, filter: Filter): FilterOutcome {
  const exclusions: Exclusion[] = [];
  const report = (exclusion: Exclusion): void => {
    exclusions.push(exclusion);
  };

  const stages = filter.kind === "composite" ? filter.stages : [filter];
  let current: Repository | null = repository;
  for (const stage of stages) {
    if (current === null) break;
    current = applyScoped(current, stage, report, filter.name);
  }

  return { repository: current, exclusions };
}

/**
 * Applies a chain in order; later filters only see what earlier ones kept.
 *
 * @example
 * ```typescript
 * const registry = createDefaultFilterRegistry();
 * const outcome = applyFilters(repository, registry.resolve("NoStringTypeFilter,EmptyFilter"));
 * ```
 */
export function applyFilters(repository: Repository, chain: readonly Filter[]): FilterOutcome {
  const exclusions: Exclusion[] = [];
  let current: Repository | null = repository;

  for (const filter of chain) {
    if (current === null) break;
    const outcome = applyFilter(current, filter);
    exclusions.push(...outcome.exclusions);
    current = outcome.repository;
  }

  return { repository: current, exclusions };
}
