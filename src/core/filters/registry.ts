/**
 * Filter Registry
 *
 * Maps filter names to definitions. Built once at startup and passed to
 * whoever resolves a chain; there is no process-wide instance.
 *
 * @module
 */

import { ConfigurationError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { BUILTIN_FILTERS } from "./builtin.js";
import { SCOPE_ORDER, type Filter } from "./types.js";

const logger = createLogger("filters");

// =============================================================================
// Validation
// =============================================================================

function validateDefinition(filter: Filter): void {
  if (filter.name.trim().length === 0 || filter.name.includes(",")) {
    throw new ConfigurationError(`Invalid filter name: "${filter.name}"`, { filter: filter.name });
  }
  if (filter.kind !== "composite") {
    return;
  }
  if (filter.stages.length === 0) {
    throw new ConfigurationError(`Invalid scope combination in ${filter.name}: no stages`, {
      filter: filter.name,
    });
  }
  const ranks = filter.stages.map((stage) => SCOPE_ORDER.indexOf(stage.kind));
  const ordered = ranks.every((rank, i) => i === 0 || rank > (ranks[i - 1] ?? -1));
  if (!ordered) {
    throw new ConfigurationError(
      `Invalid scope combination in ${filter.name}: stages must run ${SCOPE_ORDER.join(" → ")}`,
      { filter: filter.name, stages: filter.stages.map((stage) => stage.kind) }
    );
  }
}

/**
 * Splits a comma-separated chain; list input is trimmed the same way.
 */
export function parseFilterNames(names: string | readonly string[]): string[] {
  const list = typeof names === "string" ? names.split(",") : names;
  return list.map((name) => name.trim()).filter((name) => name.length > 0);
}

// =============================================================================
// Filter Registry Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const registry = createDefaultFilterRegistry();
 * const chain = registry.resolve(["emptyfilter", "NoStringTypeFilter"]);
 * chain.map((f) => f.name); // ["NoStringTypeFilter", "EmptyFilter"]
 * ```
 */
export class FilterRegistry {
  private filters = new Map<string, Filter>();

  constructor(definitions: readonly Filter[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  /**
   * @throws ConfigurationError for a duplicate name or mis-ordered composite
   */
  register(filter: Filter): void {
    validateDefinition(filter);
    const key = filter.name.toLowerCase();
    if (this.filters.has(key)) {
      throw new ConfigurationError(`Duplicate filter name: ${filter.name}`, { filter: filter.name });
    }
    this.filters.set(key, filter);
  }

  get(name: string): Filter | undefined {
    return this.filters.get(name.trim().toLowerCase());
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Registered filters in registration order
   */
  list(): Filter[] {
    return [...this.filters.values()];
  }

  /**
   * Resolves a chain by name. Every unknown name is reported at once.
   * Filters marked `runsLast` are moved behind the rest and kept once.
   *
   * @throws ConfigurationError when any name is unknown
   */
  resolve(names: string | readonly string[]): Filter[] {
    const requested = parseFilterNames(names);
    const unknown = requested.filter((name) => !this.has(name));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown filter: ${unknown.join(", ")}`, {
        unknown,
        available: this.list().map((f) => f.name),
      });
    }

    const resolved = requested.flatMap((name) => {
      const filter = this.get(name);
      return filter ? [filter] : [];
    });

    const leading = resolved.filter((f) => !f.runsLast);
    const trailing = [...new Set(resolved.filter((f) => f.runsLast))];
    const chain = [...leading, ...trailing];

    if (chain.length !== resolved.length || chain.some((filter, i) => filter !== resolved[i])) {
      logger.warn(
        { requested: resolved.map((f) => f.name), applied: chain.map((f) => f.name) },
        "Reordered filter chain so cleanup filters run last"
      );
    }
    return chain;
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates a registry holding every built-in filter.
 */
export function createDefaultFilterRegistry(): FilterRegistry {
  return new FilterRegistry(BUILTIN_FILTERS);
}
