/**
 * pyshape - structural datasets from Python repositories
 *
 * @module
 */

export * from "./core/index.js";
export { createLogger, type Logger, type LogLevel } from "./utils/logger.js";
export { CancellationToken, CancellationTokenSource } from "./utils/async.js";
export { RunConfigSchema, DEFAULT_FILTERS, type RunConfig, type ManifestEntry, type RepositoryJson } from "./utils/validation.js";
