import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { loadConfig, parseConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";

describe("parseConfig", () => {
  it("should fill in defaults", () => {
    expect(parseConfig({})).toEqual({
      filters: ["NoStringTypeFilter", "EmptyFilter"],
      concurrency: 4,
      timeoutMs: null,
      include: ["**/*.py"],
      ignore: ["**/.git/**", "**/__pycache__/**"],
    });
  });

  it("should accept a comma-separated filter chain", () => {
    expect(parseConfig({ filters: "TestModuleFilter, EmptyFilter" }).filters).toEqual([
      "TestModuleFilter",
      "EmptyFilter",
    ]);
  });

  it("should reject unknown keys and invalid values", () => {
    expect(() => parseConfig({ concurrency: 0 })).toThrow(ConfigurationError);
    expect(() => parseConfig({ verbose: true })).toThrow(/Invalid configuration/);
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pyshape-config-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should let overrides win over file values", async () => {
    const file = path.join(tempDir, "pyshape.config.json");
    await fs.writeFile(file, JSON.stringify({ concurrency: 2, filters: ["EmptyFilter"] }));

    const config = await loadConfig(file, { concurrency: 8, filters: undefined });

    expect(config.concurrency).toBe(8);
    expect(config.filters).toEqual(["EmptyFilter"]);
  });

  it("should fail when an explicit file is missing", async () => {
    await expect(loadConfig(path.join(tempDir, "missing.json"))).rejects.toThrow(
      "Config file not found"
    );
  });

  it("should reject a file that is not a JSON object", async () => {
    const file = path.join(tempDir, "list.json");
    await fs.writeFile(file, "[1, 2]");
    await expect(loadConfig(file)).rejects.toThrow("Config file must contain a JSON object");
  });
});
