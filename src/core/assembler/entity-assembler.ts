/**
 * Entity Assembler
 *
 * Folds per-file extraction records into the immutable Repository tree.
 * The factories here are the only place signatures are computed, so every
 * entity in a run (or read back from a dataset) carries a derived signature.
 *
 * @module
 */

import * as path from "node:path";
import { ConfigurationError } from "../errors.js";
import {
  CONSTRUCTOR_NAME,
  type ClassEntity,
  type FieldEntity,
  type FunctionEntity,
  type MethodEntity,
  type ModuleEntity,
  type ParameterEntity,
  type Repository,
  type RepositoryIdentity,
} from "../models/entities.js";
import type { CallableRecord, ClassRecord, ModuleRecord } from "../models/records.js";
import { buildFullSignature, buildSignature } from "../models/signature.js";

// =============================================================================
// Factory Inputs
// =============================================================================

export interface CallableInit {
  identifier: string;
  parameters: readonly ParameterEntity[];
  /** Decorators joined by newlines, "" when there are none */
  annotations: string;
  returnType: string | null;
  body: string;
}

export interface ClassInit {
  identifier: string;
  methods: readonly MethodEntity[];
  superclasses: readonly string[];
  fields: readonly FieldEntity[];
  file: string;
}

// =============================================================================
// Entity Factories
// =============================================================================

export function createParameter(
  identifier: string,
  type: string | null,
  lineNumber: number,
  colOffset: number
): ParameterEntity {
  return { identifier, type, lineNumber, colOffset };
}

function deriveSignatures(init: CallableInit): { signature: string; fullSignature: string } {
  const signature = buildSignature(init.identifier, init.parameters, init.returnType);
  return { signature, fullSignature: buildFullSignature(init.annotations, signature) };
}

export function createFunction(init: CallableInit, file: string): FunctionEntity {
  return {
    kind: "function",
    identifier: init.identifier,
    parameters: init.parameters,
    annotations: init.annotations,
    returnType: init.returnType,
    body: init.body,
    ...deriveSignatures(init),
    file,
  };
}

export function createMethod(init: CallableInit): MethodEntity {
  return {
    kind: "method",
    identifier: init.identifier,
    parameters: init.parameters,
    annotations: init.annotations,
    returnType: init.returnType,
    body: init.body,
    ...deriveSignatures(init),
    isConstructor: init.identifier === CONSTRUCTOR_NAME,
  };
}

export function createClass(init: ClassInit): ClassEntity {
  return {
    identifier: init.identifier,
    methods: init.methods,
    superclasses: init.superclasses,
    fields: init.fields,
    file: init.file,
  };
}

/**
 * The module name is the file stem: `pkg/client.py` → `client`.
 */
export function createModule(
  filePath: string,
  functions: readonly FunctionEntity[],
  classes: readonly ClassEntity[]
): ModuleEntity {
  const name = path.posix.basename(filePath, path.posix.extname(filePath));
  return { name, filePath, functions, classes };
}

// =============================================================================
// Record Conversion
// =============================================================================

function callableInit(record: CallableRecord): CallableInit {
  return {
    identifier: record.identifier,
    parameters: record.parameters.map((p) => createParameter(p.identifier, p.type, p.line, p.column)),
    annotations: record.decorators.join("\n"),
    returnType: record.returnType,
    body: record.body,
  };
}

function classFromRecord(record: ClassRecord, file: string): ClassEntity {
  return createClass({
    identifier: record.identifier,
    methods: record.methods.map((m) => createMethod(callableInit(m))),
    superclasses: [...record.superclasses],
    fields: record.fields.map((f) => ({ identifier: f.identifier, type: f.type })),
    file,
  });
}

/**
 * Converts one file's record into a module entity.
 */
export function moduleFromRecord(record: ModuleRecord): ModuleEntity {
  return createModule(
    record.filePath,
    record.functions.map((f) => createFunction(callableInit(f), record.filePath)),
    record.classes.map((c) => classFromRecord(c, record.filePath))
  );
}

/**
 * Builds a repository from records, keeping record order as module order.
 *
 * @throws ConfigurationError when two records share a file path
 */
export function assembleRepository(
  identity: RepositoryIdentity,
  records: readonly ModuleRecord[]
): Repository {
  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.filePath)) {
      throw new ConfigurationError(`Duplicate module path: ${record.filePath}`, {
        filePath: record.filePath,
      });
    }
    seen.add(record.filePath);
  }

  return {
    name: identity.name,
    url: identity.url,
    releaseTag: identity.releaseTag,
    revision: identity.revision,
    modules: records.map(moduleFromRecord),
  };
}
