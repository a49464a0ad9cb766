/**
 * Dataset Serializer
 *
 * Converts entity trees to the persisted JSON shape and back. Reading goes
 * through the assembler factories, so signatures in a dataset file are
 * recomputed rather than trusted.
 *
 * @module
 */

import { DatasetFormatError, FileReadError } from "../errors.js";
import type {
  ClassEntity,
  FunctionEntity,
  MethodEntity,
  ModuleEntity,
  ParameterEntity,
  Repository,
} from "../models/entities.js";
import type { FileFailure } from "../models/failures.js";
import type { Exclusion } from "../filters/types.js";
import type { EntityCounts, ExtractionReport } from "../extraction/pipeline.js";
import {
  createClass,
  createFunction,
  createMethod,
  createModule,
  createParameter,
  type CallableInit,
} from "../assembler/entity-assembler.js";
import {
  DatasetJsonSchema,
  formatZodError,
  safeValidate,
  type ClassJson,
  type FunctionJson,
  type MethodJson,
  type ModuleJson,
  type ParameterJson,
  type RepositoryJson,
} from "../../utils/validation.js";
import { readFileWithEncoding, writeFile } from "../../utils/fs.js";

// =============================================================================
// Entity → JSON
// =============================================================================

function serializeParameter(parameter: ParameterEntity): ParameterJson {
  return {
    identifier: parameter.identifier,
    type: parameter.type,
    line_number: parameter.lineNumber,
    col_offset: parameter.colOffset,
  };
}

function serializeFunction(fn: FunctionEntity): FunctionJson {
  return {
    identifier: fn.identifier,
    parameters: fn.parameters.map(serializeParameter),
    annotations: fn.annotations,
    return: fn.returnType,
    body: fn.body,
    signature: fn.signature,
    full_signature: fn.fullSignature,
    file: fn.file,
  };
}

function serializeMethod(method: MethodEntity): MethodJson {
  return {
    identifier: method.identifier,
    parameters: method.parameters.map(serializeParameter),
    annotations: method.annotations,
    return: method.returnType,
    body: method.body,
    signature: method.signature,
    full_signature: method.fullSignature,
    constructor: method.isConstructor,
  };
}

function serializeClass(cls: ClassEntity): ClassJson {
  return {
    identifier: cls.identifier,
    methods: cls.methods.map(serializeMethod),
    superclasses: [...cls.superclasses],
    fields: cls.fields.map((f) => ({ identifier: f.identifier, type: f.type })),
    file: cls.file,
  };
}

function serializeModule(module: ModuleEntity): ModuleJson {
  return {
    name: module.name,
    file_path: module.filePath,
    functions: module.functions.map(serializeFunction),
    classes: module.classes.map(serializeClass),
  };
}

/**
 * Renders a repository in the external schema. Absent values are `null`.
 */
export function serializeRepository(repository: Repository): RepositoryJson {
  return {
    name: repository.name,
    url: repository.url,
    pypi_tag: repository.releaseTag,
    git_commit_hash: repository.revision,
    modules: repository.modules.map(serializeModule),
  };
}

export function serializeDataset(repositories: readonly Repository[]): RepositoryJson[] {
  return repositories.map(serializeRepository);
}

// =============================================================================
// Report → JSON
// =============================================================================

export interface FailureJson {
  kind: FileFailure["kind"];
  file_path: string;
  message: string;
  line: number | null;
  column: number | null;
}

export interface ExclusionJson {
  filter: string;
  scope: Exclusion["scope"];
  file_path: string | null;
  name: string;
}

export interface CountsJson {
  modules: number;
  classes: number;
  functions: number;
  methods: number;
  parameters: number;
  typed_parameters: number;
}

export interface ReportJson {
  repository: string;
  failures: FailureJson[];
  exclusions: ExclusionJson[];
  stats: {
    files_discovered: number;
    files_parsed: number;
    files_failed: number;
    extracted: CountsJson;
    retained: CountsJson | null;
    duration_ms: number;
  };
}

function serializeCounts(counts: EntityCounts): CountsJson {
  return {
    modules: counts.modules,
    classes: counts.classes,
    functions: counts.functions,
    methods: counts.methods,
    parameters: counts.parameters,
    typed_parameters: counts.typedParameters,
  };
}

/**
 * Renders a run report. Failures and exclusions stay separate lists.
 */
export function serializeReport(report: ExtractionReport): ReportJson {
  return {
    repository: report.identity.name,
    failures: report.failures.map((f) => ({
      kind: f.kind,
      file_path: f.filePath,
      message: f.message,
      line: f.line,
      column: f.column,
    })),
    exclusions: report.exclusions.map((e) => ({
      filter: e.filter,
      scope: e.scope,
      file_path: e.filePath,
      name: e.name,
    })),
    stats: {
      files_discovered: report.stats.filesDiscovered,
      files_parsed: report.stats.filesParsed,
      files_failed: report.stats.filesFailed,
      extracted: serializeCounts(report.stats.extracted),
      retained: report.stats.retained ? serializeCounts(report.stats.retained) : null,
      duration_ms: report.stats.durationMs,
    },
  };
}

// =============================================================================
// JSON → Entity
// =============================================================================

function callableInit(json: FunctionJson | MethodJson): CallableInit {
  return {
    identifier: json.identifier,
    parameters: json.parameters.map((p) =>
      createParameter(p.identifier, p.type, p.line_number, p.col_offset)
    ),
    annotations: json.annotations,
    returnType: json.return,
    body: json.body,
  };
}

function moduleFromJson(json: ModuleJson): ModuleEntity {
  return createModule(
    json.file_path,
    json.functions.map((fn) => createFunction(callableInit(fn), fn.file)),
    json.classes.map((cls) =>
      createClass({
        identifier: cls.identifier,
        methods: cls.methods.map((m) => createMethod(callableInit(m))),
        superclasses: cls.superclasses,
        fields: cls.fields,
        file: cls.file,
      })
    )
  );
}

/**
 * Validates parsed JSON and rebuilds the repositories it describes.
 *
 * @throws DatasetFormatError listing every schema violation
 */
export function parseDataset(data: unknown): Repository[] {
  const result = safeValidate(DatasetJsonSchema, data);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new DatasetFormatError(`Invalid dataset: ${issues.length} issue(s)`, issues);
  }

  return result.data.map((repo) => ({
    name: repo.name,
    url: repo.url,
    releaseTag: repo.pypi_tag,
    revision: repo.git_commit_hash,
    modules: repo.modules.map(moduleFromJson),
  }));
}

// =============================================================================
// Persistence
// =============================================================================

/**
 * Writes repositories as a pretty-printed JSON array.
 */
export async function writeDataset(
  filePath: string,
  repositories: readonly Repository[]
): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(serializeDataset(repositories), null, 2)}\n`);
}

/**
 * Reads and validates a dataset file.
 *
 * @throws FileReadError when the file cannot be read
 * @throws DatasetFormatError when it is not valid JSON or fails validation
 */
export async function readDataset(filePath: string): Promise<Repository[]> {
  let text: string;
  try {
    text = await readFileWithEncoding(filePath);
  } catch (error) {
    throw new FileReadError(
      `Cannot read dataset: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DatasetFormatError(`Dataset is not valid JSON: ${reason}`, [reason], { filePath });
  }
  return parseDataset(data);
}
