import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { buildDataset, parseManifest, readManifest } from "../dataset-builder.js";
import { PythonParser } from "../../parser/python-parser.js";
import { ConfigurationError, DatasetFormatError, FileReadError } from "../../errors.js";
import type { ManifestEntry } from "../../../utils/validation.js";

function entry(name: string, checkout: string): ManifestEntry {
  return {
    name,
    url: `https://example.org/${name}`,
    pypi_tag: "1.0.0",
    git_commit_hash: "abc123",
    path: checkout,
  };
}

describe("parseManifest", () => {
  it("should accept a list of projects", () => {
    expect(parseManifest([entry("alpha", "alpha")])).toEqual([entry("alpha", "alpha")]);
  });

  it("should report missing fields", () => {
    try {
      parseManifest([{ name: "alpha" }]);
      expect.unreachable("parseManifest should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(DatasetFormatError);
      if (!(error instanceof DatasetFormatError)) return;
      expect(error.issues).toEqual([
        "0.url: Required",
        "0.pypi_tag: Required",
        "0.git_commit_hash: Required",
        "0.path: Required",
      ]);
    }
  });
});

describe("buildDataset", () => {
  let baseDir: string;
  let parser: PythonParser;

  beforeAll(async () => {
    parser = new PythonParser();
    await parser.initialize();

    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), "pyshape-dataset-"));
    await fs.mkdir(path.join(baseDir, "alpha", "alpha"), { recursive: true });
    await fs.mkdir(path.join(baseDir, "beta"), { recursive: true });
    await fs.writeFile(
      path.join(baseDir, "alpha", "alpha", "core.py"),
      "def shout(text: str) -> str:\n    return text.upper()\n"
    );
    await fs.writeFile(path.join(baseDir, "beta", "util.py"), "def helper(x):\n    return x\n");
    await fs.writeFile(
      path.join(baseDir, "manifest.json"),
      JSON.stringify([entry("alpha", "alpha"), entry("beta", "beta")])
    );
  });

  afterAll(async () => {
    await parser.close();
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  it("should keep non-empty repositories in manifest order and drop the rest", async () => {
    const visited: string[] = [];
    const manifest = await readManifest(path.join(baseDir, "manifest.json"));

    const result = await buildDataset(manifest, {
      baseDir,
      parser,
      onProject: (project) => visited.push(project.name),
    });

    expect(visited).toEqual(["alpha", "beta"]);
    expect(result.repositories.map((r) => r.name)).toEqual(["alpha"]);
    expect(result.repositories[0]?.releaseTag).toBe("1.0.0");
    expect(result.repositories[0]?.modules[0]?.filePath).toBe("alpha/core.py");
    expect(result.reports).toHaveLength(2);
    expect(result.reports[1]?.repository).toBeNull();
    expect(result.dropped).toEqual(["beta"]);
  });

  it("should keep a repository when filters leave its modules", async () => {
    const result = await buildDataset([entry("beta", "beta")], { baseDir, parser, filters: [] });
    expect(result.repositories.map((r) => r.name)).toEqual(["beta"]);
    expect(result.dropped).toEqual([]);
  });

  it("should fail on an unknown filter before extracting anything", async () => {
    const visited: string[] = [];
    await expect(
      buildDataset([entry("alpha", "alpha")], {
        baseDir,
        parser,
        filters: "Nope",
        onProject: (project) => visited.push(project.name),
      })
    ).rejects.toThrow(ConfigurationError);
    expect(visited).toEqual([]);
  });

  it("should raise FileReadError for a missing manifest", async () => {
    await expect(readManifest(path.join(baseDir, "absent.json"))).rejects.toBeInstanceOf(FileReadError);
  });
});
