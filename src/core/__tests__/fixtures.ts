/**
 * Small builders for entity trees used across tests
 */

import {
  createClass,
  createFunction,
  createMethod,
  createModule,
  createParameter,
} from "../assembler/entity-assembler.js";
import type {
  ClassEntity,
  FieldEntity,
  FunctionEntity,
  MethodEntity,
  ModuleEntity,
  ParameterEntity,
  Repository,
  RepositoryIdentity,
} from "../models/entities.js";

export const TEST_IDENTITY: RepositoryIdentity = {
  name: "sample",
  url: "https://example.org/sample",
  releaseTag: "0.1.0",
  revision: "deadbeef",
};

export function param(identifier: string, type: string | null = null): ParameterEntity {
  return createParameter(identifier, type, 1, 1);
}

export function fn(
  identifier: string,
  parameters: ParameterEntity[] = [],
  returnType: string | null = null,
  file = "mod.py"
): FunctionEntity {
  return createFunction(
    { identifier, parameters, annotations: "", returnType, body: "pass" },
    file
  );
}

export function method(
  identifier: string,
  parameters: ParameterEntity[] = [],
  returnType: string | null = null
): MethodEntity {
  return createMethod({ identifier, parameters, annotations: "", returnType, body: "pass" });
}

export function cls(
  identifier: string,
  methods: MethodEntity[] = [],
  fields: FieldEntity[] = [],
  file = "mod.py"
): ClassEntity {
  return createClass({ identifier, methods, superclasses: [], fields, file });
}

export function mod(
  filePath: string,
  functions: FunctionEntity[] = [],
  classes: ClassEntity[] = []
): ModuleEntity {
  return createModule(filePath, functions, classes);
}

export function repo(modules: ModuleEntity[], identity: RepositoryIdentity = TEST_IDENTITY): Repository {
  return { ...identity, modules };
}
