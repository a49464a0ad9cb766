import { describe, it, expect } from "vitest";
import {
  assembleRepository,
  createFunction,
  createMethod,
  createModule,
  createParameter,
} from "../entity-assembler.js";
import { ConfigurationError } from "../../errors.js";
import type { ModuleRecord } from "../../models/records.js";
import type { RepositoryIdentity } from "../../models/entities.js";

const identity: RepositoryIdentity = {
  name: "toolkit",
  url: "https://example.org/toolkit",
  releaseTag: "1.2.0",
  revision: "0123abcd",
};

function record(filePath: string, overrides: Partial<ModuleRecord> = {}): ModuleRecord {
  return { filePath, functions: [], classes: [], ...overrides };
}

describe("Entity factories", () => {
  it("should derive signature and full signature for functions", () => {
    const fn = createFunction(
      {
        identifier: "load",
        parameters: [createParameter("path", "str", 3, 10), createParameter("mode", null, 3, 21)],
        annotations: "@cache",
        returnType: "Dict[str,int]",
        body: "    return {}",
      },
      "pkg/io.py"
    );

    expect(fn.kind).toBe("function");
    expect(fn.signature).toBe("load(path: str, mode) -> Dict[str, int]");
    expect(fn.fullSignature).toBe("@cache\nload(path: str, mode) -> Dict[str, int]");
    expect(fn.returnType).toBe("Dict[str,int]");
    expect(fn.file).toBe("pkg/io.py");
  });

  it("should end every full signature with the signature", () => {
    for (const annotations of ["", "@a", "@a\n@b.c(1, x=[2])", "@property"]) {
      const fn = createFunction(
        { identifier: "f", parameters: [createParameter("x", "int", 1, 7)], annotations, returnType: null, body: "pass" },
        "m.py"
      );
      expect(fn.fullSignature.endsWith(fn.signature)).toBe(true);
      expect(fn.fullSignature.length - fn.signature.length).toBe(annotations ? annotations.length + 1 : 0);
    }
  });

  it("should flag only __init__ as a constructor", () => {
    const base = { parameters: [], annotations: "", returnType: null, body: "pass" };
    expect(createMethod({ ...base, identifier: "__init__" }).isConstructor).toBe(true);
    expect(createMethod({ ...base, identifier: "__new__" }).isConstructor).toBe(false);
    expect(createMethod({ ...base, identifier: "init" }).isConstructor).toBe(false);
  });

  it("should name modules after the file stem", () => {
    expect(createModule("pkg/sub/client.py", [], []).name).toBe("client");
    expect(createModule("pkg/__init__.py", [], []).name).toBe("__init__");
  });
});

describe("assembleRepository", () => {
  it("should keep record order and identity", () => {
    const repository = assembleRepository(identity, [record("b.py"), record("a.py")]);

    expect(repository.name).toBe("toolkit");
    expect(repository.releaseTag).toBe("1.2.0");
    expect(repository.revision).toBe("0123abcd");
    expect(repository.modules.map((m) => m.filePath)).toEqual(["b.py", "a.py"]);
  });

  it("should convert records into entities", () => {
    const repository = assembleRepository(identity, [
      record("pkg/shapes.py", {
        functions: [
          {
            identifier: "area",
            parameters: [{ identifier: "r", type: "float", line: 1, column: 10 }],
            decorators: [],
            returnType: "float",
            body: "    return r * r",
          },
        ],
        classes: [
          {
            identifier: "Circle",
            superclasses: ["Shape"],
            fields: [{ identifier: "radius", type: "float" }],
            methods: [
              {
                identifier: "__init__",
                parameters: [
                  { identifier: "self", type: null, line: 6, column: 18 },
                  { identifier: "r", type: "float", line: 6, column: 24 },
                ],
                decorators: ["@overload", "@traced"],
                returnType: null,
                body: "        self.radius = r",
              },
            ],
          },
        ],
      }),
    ]);

    const module = repository.modules[0];
    expect(module?.name).toBe("shapes");
    expect(module?.functions[0]?.parameters[0]).toEqual({
      identifier: "r",
      type: "float",
      lineNumber: 1,
      colOffset: 10,
    });

    const cls = module?.classes[0];
    expect(cls?.file).toBe("pkg/shapes.py");
    expect(cls?.superclasses).toEqual(["Shape"]);
    expect(cls?.fields).toEqual([{ identifier: "radius", type: "float" }]);

    const init = cls?.methods[0];
    expect(init?.isConstructor).toBe(true);
    expect(init?.annotations).toBe("@overload\n@traced");
    expect(init?.signature).toBe("__init__(self, r: float)");
    expect(init?.fullSignature).toBe("@overload\n@traced\n__init__(self, r: float)");
  });

  it("should reject duplicate module paths", () => {
    expect(() => assembleRepository(identity, [record("a.py"), record("a.py")])).toThrow(
      ConfigurationError
    );
  });
});
