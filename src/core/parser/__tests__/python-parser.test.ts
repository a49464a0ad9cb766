/**
 * Python parser tests against the real Tree-sitter grammar.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { PythonParser } from "../python-parser.js";
import { ParsingError } from "../../errors.js";
import type { ModuleRecord } from "../../models/records.js";
import { unwrap } from "../../../types/result.js";

const SAMPLE = `import os


@decorator
@other(1, key="v")
async def fetch(url: str, *, timeout: float = 1.0, **kwargs) -> bytes:
    return b""


def plain(a, b=2, *args):
    def inner():
        pass
    return a


class Child(Base1, Base2, metaclass=Meta):
    limit: int = 3
    name = "x"
    a = b = 0
    hint: str

    def __init__(self, value: int):
        self.value = value

    @property
    def size(self) -> int:
        return 1

    class Nested:
        pass
`;

describe("PythonParser", () => {
  let parser: PythonParser;

  beforeAll(async () => {
    parser = new PythonParser();
    await parser.initialize();
  });

  afterAll(async () => {
    await parser.close();
  });

  function parseOk(source: string, filePath = "pkg/sample.py"): ModuleRecord {
    return unwrap(parser.parse(filePath, source));
  }

  describe("Lifecycle", () => {
    it("should report isReady as true after initialization", () => {
      expect(parser.isReady).toBe(true);
    });

    it("should support only .py files", () => {
      expect(parser.supports("pkg/mod.py")).toBe(true);
      expect(parser.supports("pkg/mod.pyi")).toBe(false);
      expect(parser.supports("README.md")).toBe(false);
    });
  });

  describe("Functions", () => {
    it("should surface only top-level functions, async included", () => {
      const record = parseOk(SAMPLE);
      expect(record.filePath).toBe("pkg/sample.py");
      expect(record.functions.map((f) => f.identifier)).toEqual(["fetch", "plain"]);
    });

    it("should keep decorators verbatim in source order", () => {
      const fetch = parseOk(SAMPLE).functions[0];
      expect(fetch?.decorators).toEqual(["@decorator", '@other(1, key="v")']);
    });

    it("should read parameters with types and 1-based positions", () => {
      const fetch = parseOk(SAMPLE).functions[0];
      expect(fetch?.parameters).toEqual([
        { identifier: "url", type: "str", line: 6, column: 17 },
        { identifier: "timeout", type: "float", line: 6, column: 30 },
        { identifier: "**kwargs", type: null, line: 6, column: 52 },
      ]);
      expect(fetch?.returnType).toBe("bytes");
    });

    it("should skip the bare * separator and keep star prefixes", () => {
      const plain = parseOk(SAMPLE).functions[1];
      expect(plain?.parameters.map((p) => p.identifier)).toEqual(["a", "b", "*args"]);
      expect(plain?.parameters.every((p) => p.type === null)).toBe(true);
      expect(plain?.returnType).toBeNull();
    });

    it("should keep the body with its indentation, nested definitions included", () => {
      const record = parseOk(SAMPLE);
      expect(record.functions[0]?.body).toBe('    return b""');
      expect(record.functions[1]?.body).toBe("    def inner():\n        pass\n    return a");
    });

    it("should keep parameter order for every arity", () => {
      for (let arity = 0; arity <= 6; arity++) {
        const names = Array.from({ length: arity }, (_, i) => `p${i}`);
        const fn = parseOk(`def f(${names.join(", ")}):\n    pass\n`).functions[0];
        expect(fn?.parameters.map((p) => p.identifier)).toEqual(names);
        expect(fn?.parameters.map((p) => p.column)).toEqual(names.map((_, i) => 7 + i * 4));
      }
    });

    it("should keep comment lines between the header and the first statement", () => {
      const record = parseOk("def f():\n    # lead\n\n    return 1\n\ndef g():  # trailing\n    pass\n");
      expect(record.functions[0]?.body).toBe("    # lead\n\n    return 1");
      expect(record.functions[1]?.body).toBe("    pass");
    });

    it("should count columns in UTF-8 bytes", () => {
      const fn = parseOk("def f(é, x):\n    pass\n").functions[0];
      expect(fn?.parameters).toEqual([
        { identifier: "é", type: null, line: 1, column: 7 },
        { identifier: "x", type: null, line: 1, column: 11 },
      ]);
    });

    it("should take a same-line body from after the colon", () => {
      const record = parseOk("def one(): return 1\n");
      expect(record.functions[0]?.body).toBe("return 1");
    });
  });

  describe("Classes", () => {
    it("should keep positional bases verbatim and skip keyword arguments", () => {
      const child = parseOk(SAMPLE).classes[0];
      expect(child?.identifier).toBe("Child");
      expect(child?.superclasses).toEqual(["Base1", "Base2"]);
    });

    it("should read plain, annotated and chained field assignments", () => {
      const child = parseOk(SAMPLE).classes[0];
      expect(child?.fields).toEqual([
        { identifier: "limit", type: "int" },
        { identifier: "name", type: null },
        { identifier: "a", type: null },
        { identifier: "b", type: null },
        { identifier: "hint", type: "str" },
      ]);
    });

    it("should read methods in order and ignore nested classes", () => {
      const record = parseOk(SAMPLE);
      const child = record.classes[0];
      expect(record.classes).toHaveLength(1);
      expect(child?.methods.map((m) => m.identifier)).toEqual(["__init__", "size"]);
      expect(child?.methods[1]?.decorators).toEqual(["@property"]);
    });

    it("should skip star-unpacked bases", () => {
      const record = parseOk("class A(*bases, Base, **opts):\n    pass\n");
      expect(record.classes[0]?.superclasses).toEqual(["Base"]);
    });

    it("should read decorated classes without bases", () => {
      const record = parseOk("@dataclass\nclass Point:\n    x: int\n\n    def norm(self) -> float: ...\n");
      expect(record.classes[0]?.identifier).toBe("Point");
      expect(record.classes[0]?.superclasses).toEqual([]);
      expect(record.classes[0]?.methods[0]?.body).toBe("...");
    });
  });

  describe("Failures", () => {
    it("should return a ParsingError for invalid syntax", () => {
      const result = parser.parse("pkg/broken.py", "def ok():\n    return 1\n\ndef broken(:\n    pass\n");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ParsingError);
      expect(result.error.filePath).toBe("pkg/broken.py");
      expect(result.error.line).toBe(4);
      expect(result.error.column).toBeGreaterThanOrEqual(1);
    });

    it("should reject Python 2 print and exec statements", () => {
      const result = parser.parse("old.py", 'def f(x):\n    print "hi"\n    exec "x=1"\n');
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("Python 2 print statement at line 2, column 5");
      expect(result.error.line).toBe(2);
      expect(result.error.column).toBe(5);
    });

    it("should reject the Python 2 raise form", () => {
      const result = parser.parse("old.py", "def f():\n    raise E, 'm'\n");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("Python 2 raise statement with arguments at line 2, column 5");
    });

    it("should accept print and exec as calls", () => {
      const record = parseOk('def f(x):\n    print("hi", x)\n    exec("x=1")\n    raise ValueError(x) from None\n');
      expect(record.functions.map((f) => f.identifier)).toEqual(["f"]);
    });

    it("should parse an empty file into an empty module", () => {
      const record = parseOk("", "empty.py");
      expect(record.functions).toEqual([]);
      expect(record.classes).toEqual([]);
    });
  });

  describe("Determinism", () => {
    it("should produce identical records for identical text", () => {
      expect(parseOk(SAMPLE)).toEqual(parseOk(SAMPLE));
    });
  });
});
