/**
 * Runtime Validation Schemas
 *
 * Zod schemas for the run configuration, the project manifest and the
 * persisted dataset. Field names of the dataset schemas are the external
 * (snake_case) names consumers read.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Run Configuration Schema
// =============================================================================

export const DEFAULT_FILTERS = ["NoStringTypeFilter", "EmptyFilter"] as const;

/**
 * Filter chains are written either as a list or as one comma-separated string
 */
export const FilterListSchema = z
  .union([z.array(z.string().min(1)), z.string()])
  .transform((value) =>
    (typeof value === "string" ? value.split(",") : value)
      .map((name) => name.trim())
      .filter((name) => name.length > 0)
  );

/**
 * Contents of `pyshape.config.json`
 */
export const RunConfigSchema = z
  .object({
    /** Filter names, applied in order */
    filters: FilterListSchema.default([...DEFAULT_FILTERS]),

    /** Maximum files parsed in parallel */
    concurrency: z.number().int().positive().default(4),

    /** Cancel the extraction after this many milliseconds */
    timeoutMs: z.number().int().positive().nullable().default(null),

    /** Glob patterns for source files, relative to the repository root */
    include: z.array(z.string().min(1)).min(1).default(["**/*.py"]),

    /** Glob patterns to exclude */
    ignore: z.array(z.string().min(1)).default(["**/.git/**", "**/__pycache__/**"]),
  })
  .strict();

export type RunConfig = z.infer<typeof RunConfigSchema>;

// =============================================================================
// Manifest Schema
// =============================================================================

/**
 * One checked-out project to extract
 */
export const ManifestEntrySchema = z.object({
  name: z.string().min(1),
  url: z.string(),
  pypi_tag: z.string(),
  git_commit_hash: z.string(),
  /** Checkout directory, relative to the manifest file */
  path: z.string().min(1),
});

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

export const ManifestSchema = z.array(ManifestEntrySchema);

// =============================================================================
// Dataset Schemas
// =============================================================================

export const ParameterJsonSchema = z.object({
  identifier: z.string().min(1),
  type: z.string().nullable(),
  line_number: z.number().int().positive(),
  col_offset: z.number().int().positive(),
});

const callableShape = {
  identifier: z.string().min(1),
  parameters: z.array(ParameterJsonSchema),
  annotations: z.string(),
  return: z.string().nullable(),
  body: z.string(),
  signature: z.string(),
  full_signature: z.string(),
};

export const FunctionJsonSchema = z.object({
  ...callableShape,
  file: z.string().min(1),
});

export const MethodJsonSchema = z.object({
  ...callableShape,
  constructor: z.boolean(),
});

export const FieldJsonSchema = z.object({
  identifier: z.string().min(1),
  type: z.string().nullable(),
});

export const ClassJsonSchema = z.object({
  identifier: z.string().min(1),
  methods: z.array(MethodJsonSchema),
  superclasses: z.array(z.string()),
  fields: z.array(FieldJsonSchema),
  file: z.string().min(1),
});

export const ModuleJsonSchema = z.object({
  name: z.string().min(1),
  file_path: z.string().min(1),
  functions: z.array(FunctionJsonSchema),
  classes: z.array(ClassJsonSchema),
});

export const RepositoryJsonSchema = z.object({
  name: z.string().min(1),
  url: z.string(),
  pypi_tag: z.string(),
  git_commit_hash: z.string(),
  modules: z.array(ModuleJsonSchema),
});

export const DatasetJsonSchema = z.array(RepositoryJsonSchema);

export type ParameterJson = z.infer<typeof ParameterJsonSchema>;
export type FunctionJson = z.infer<typeof FunctionJsonSchema>;
export type MethodJson = z.infer<typeof MethodJsonSchema>;
export type FieldJson = z.infer<typeof FieldJsonSchema>;
export type ClassJson = z.infer<typeof ClassJsonSchema>;
export type ModuleJson = z.infer<typeof ModuleJsonSchema>;
export type RepositoryJson = z.infer<typeof RepositoryJsonSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
