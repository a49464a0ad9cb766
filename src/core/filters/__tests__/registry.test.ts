import { describe, it, expect } from "vitest";
import { createDefaultFilterRegistry, FilterRegistry, parseFilterNames } from "../registry.js";
import { EmptyFilter, NoStringTypeFilter } from "../builtin.js";
import { ConfigurationError } from "../../errors.js";
import type { CompositeFilter, ModuleFilter, RepositoryFilter } from "../types.js";

const moduleStage: ModuleFilter = { kind: "module", name: "m", description: "", keep: () => true };
const repositoryStage: RepositoryFilter = {
  kind: "repository",
  name: "r",
  description: "",
  keep: () => true,
};

describe("parseFilterNames", () => {
  it("should split and trim comma-separated chains", () => {
    expect(parseFilterNames(" A, B ,,C ")).toEqual(["A", "B", "C"]);
    expect(parseFilterNames([" A ", ""])).toEqual(["A"]);
  });
});

describe("FilterRegistry", () => {
  const registry = createDefaultFilterRegistry();

  it("should list built-in filters in registration order", () => {
    expect(registry.list().map((f) => f.name)).toEqual([
      "PrivateModuleFilter",
      "TestModuleFilter",
      "NonCoreModuleFilter",
      "NoStringTypeFilter",
      "StringTypeFilter",
      "EmptyFilter",
    ]);
  });

  it("should resolve names case-insensitively", () => {
    expect(registry.resolve("nostringtypefilter")).toEqual([NoStringTypeFilter]);
    expect(registry.get(" EMPTYFILTER ")).toBe(EmptyFilter);
  });

  it("should accept a comma string or a list", () => {
    expect(registry.resolve("NoStringTypeFilter,EmptyFilter")).toEqual(
      registry.resolve(["NoStringTypeFilter", "EmptyFilter"])
    );
  });

  it("should move runsLast filters to the end and keep them once", () => {
    const chain = registry.resolve(["EmptyFilter", "NoStringTypeFilter", "emptyfilter"]);
    expect(chain.map((f) => f.name)).toEqual(["NoStringTypeFilter", "EmptyFilter"]);
  });

  it("should keep repeated ordinary filters", () => {
    const chain = registry.resolve("NoStringTypeFilter,NoStringTypeFilter");
    expect(chain).toEqual([NoStringTypeFilter, NoStringTypeFilter]);
  });

  it("should report every unknown name at once", () => {
    try {
      registry.resolve("Bogus,EmptyFilter,Other");
      expect.unreachable("resolve should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.message).toBe("Unknown filter: Bogus, Other");
      expect(error.context?.unknown).toEqual(["Bogus", "Other"]);
    }
  });

  it("should reject duplicate names regardless of case", () => {
    const local = new FilterRegistry([moduleStage]);
    expect(() => local.register({ ...moduleStage, name: "M" })).toThrow("Duplicate filter name: M");
  });

  it("should reject names containing a comma", () => {
    expect(() => new FilterRegistry([{ ...moduleStage, name: "a,b" }])).toThrow(ConfigurationError);
  });

  it("should reject composites whose stages run top-down", () => {
    const composite: CompositeFilter = {
      kind: "composite",
      name: "Backwards",
      description: "",
      stages: [repositoryStage, moduleStage],
    };
    expect(() => new FilterRegistry([composite])).toThrow("Invalid scope combination in Backwards");
  });

  it("should reject composites without stages", () => {
    const composite: CompositeFilter = { kind: "composite", name: "Hollow", description: "", stages: [] };
    expect(() => new FilterRegistry([composite])).toThrow(ConfigurationError);
  });

  it("should accept custom filters alongside the built-ins", () => {
    const local = createDefaultFilterRegistry();
    local.register({ ...moduleStage, name: "KeepAll" });
    expect(local.has("keepall")).toBe(true);
    expect(local.resolve("EmptyFilter,KeepAll").map((f) => f.name)).toEqual(["KeepAll", "EmptyFilter"]);
  });
});
