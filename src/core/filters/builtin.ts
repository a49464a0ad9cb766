/**
 * Built-in Filters
 *
 * Path conventions for module-level filters, annotation checks for
 * callables, and the EmptyFilter cleanup pass.
 *
 * @module
 */

import type { Callable, ModuleEntity } from "../models/entities.js";
import { normalizeAnnotation } from "../models/signature.js";
import type {
  CallableFilter,
  ClassFilter,
  CompositeFilter,
  ModuleFilter,
  RepositoryFilter,
} from "./types.js";

// =============================================================================
// Path Helpers
// =============================================================================

interface ModulePath {
  directories: string[];
  fileName: string;
  stem: string;
}

function splitModulePath(module: ModuleEntity): ModulePath {
  const segments = module.filePath.split("/").filter((s) => s.length > 0);
  const fileName = segments.pop() ?? "";
  return { directories: segments, fileName, stem: module.name };
}

const DUNDER_PATTERN = /^__.+__$/;

function isPrivateName(name: string): boolean {
  return name.startsWith("_") && !DUNDER_PATTERN.test(name);
}

const TEST_DIRECTORIES = new Set(["test", "tests", "testing"]);
const TEST_FILE_PATTERNS = [/^test_.*\.py$/, /^.+_test\.py$/, /^conftest\.py$/];

const NON_CORE_DIRECTORIES = new Set([
  "vendor",
  "vendored",
  "_vendor",
  "third_party",
  "thirdparty",
  "extern",
  "external",
  "build",
  "dist",
  "site-packages",
  "node_modules",
  "examples",
  "example",
  "docs",
  "doc",
  "benchmarks",
  "benchmark",
  "scripts",
  ".eggs",
  ".tox",
  ".nox",
  "venv",
  ".venv",
]);
const NON_CORE_DIRECTORY_PATTERNS = [/\.egg-info$/];
const NON_CORE_FILES = new Set(["setup.py", "noxfile.py", "fabfile.py", "tasks.py", "conf.py"]);

// =============================================================================
// Module Filters
// =============================================================================

/**
 * Excludes modules under an underscore-prefixed package or with an
 * underscore-prefixed stem. Dunder names (`__init__`, `__main__`) are public.
 */
export const PrivateModuleFilter: ModuleFilter = {
  kind: "module",
  name: "PrivateModuleFilter",
  description: "Drops modules whose path or name starts with a single underscore",
  keep(module) {
    const { directories, stem } = splitModulePath(module);
    return !directories.some(isPrivateName) && !isPrivateName(stem);
  },
};

export const TestModuleFilter: ModuleFilter = {
  kind: "module",
  name: "TestModuleFilter",
  description: "Drops modules under test directories and test_*.py / *_test.py / conftest.py files",
  keep(module) {
    const { directories, fileName } = splitModulePath(module);
    if (directories.some((d) => TEST_DIRECTORIES.has(d.toLowerCase()))) return false;
    return !TEST_FILE_PATTERNS.some((pattern) => pattern.test(fileName));
  },
};

export const NonCoreModuleFilter: ModuleFilter = {
  kind: "module",
  name: "NonCoreModuleFilter",
  description: "Drops vendored, build, docs, example, benchmark and packaging modules",
  keep(module) {
    const { directories, fileName } = splitModulePath(module);
    const nonCoreDirectory = directories.some(
      (d) =>
        NON_CORE_DIRECTORIES.has(d.toLowerCase()) ||
        NON_CORE_DIRECTORY_PATTERNS.some((pattern) => pattern.test(d))
    );
    return !nonCoreDirectory && !NON_CORE_FILES.has(fileName);
  },
};

// =============================================================================
// Callable Filters
// =============================================================================

function declaredTypes(callable: Callable): string[] {
  const types = callable.parameters.map((p) => p.type);
  types.push(callable.returnType);
  return types.filter((t): t is string => t !== null);
}

/**
 * Keeps only callables with at least one annotated parameter or return value
 */
export const NoStringTypeFilter: CallableFilter = {
  kind: "callable",
  name: "NoStringTypeFilter",
  description: "Drops functions and methods without any type annotation",
  keep(callable) {
    return declaredTypes(callable).length > 0;
  },
};

/**
 * Keeps only callables that take or return `str`
 */
export const StringTypeFilter: CallableFilter = {
  kind: "callable",
  name: "StringTypeFilter",
  description: "Drops functions and methods with no `str` parameter or return type",
  keep(callable) {
    return declaredTypes(callable).some((type) => normalizeAnnotation(type) === "str");
  },
};

// =============================================================================
// EmptyFilter
// =============================================================================

const emptyClassStage: ClassFilter = {
  kind: "class",
  name: "EmptyFilter.class",
  description: "Drops classes without methods",
  keep: (cls) => cls.methods.length > 0,
};

const emptyModuleStage: ModuleFilter = {
  kind: "module",
  name: "EmptyFilter.module",
  description: "Drops modules without functions and classes",
  keep: (module) => module.functions.length > 0 || module.classes.length > 0,
};

const emptyRepositoryStage: RepositoryFilter = {
  kind: "repository",
  name: "EmptyFilter.repository",
  description: "Drops repositories without modules",
  keep: (repository) => repository.modules.length > 0,
};

/**
 * Prunes containers left empty by earlier filters. Stages run bottom-up, so
 * a class dropped here can empty its module in the same pass.
 */
export const EmptyFilter: CompositeFilter = {
  kind: "composite",
  name: "EmptyFilter",
  description: "Drops classes without methods, then empty modules, then an empty repository",
  runsLast: true,
  stages: [emptyClassStage, emptyModuleStage, emptyRepositoryStage],
};

export const BUILTIN_FILTERS = [
  PrivateModuleFilter,
  TestModuleFilter,
  NonCoreModuleFilter,
  NoStringTypeFilter,
  StringTypeFilter,
  EmptyFilter,
] as const;
