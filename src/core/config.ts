/**
 * Run Configuration
 *
 * Loads `pyshape.config.json` and merges command-line overrides on top.
 *
 * @module
 */

import { ConfigurationError } from "./errors.js";
import {
  RunConfigSchema,
  formatZodError,
  safeValidate,
  type RunConfig,
} from "../utils/validation.js";
import { fileExists, readFileWithEncoding } from "../utils/fs.js";
import { getConfigPath } from "../utils/index.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("config");

/**
 * Values given on the command line; undefined means "not given"
 */
export interface ConfigOverrides {
  filters?: string | string[];
  concurrency?: number;
  timeoutMs?: number | null;
  include?: string[];
  ignore?: string[];
}

/**
 * Validates a raw configuration object, filling in defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseConfig(data: unknown, source = "configuration"): RunConfig {
  const result = safeValidate(RunConfigSchema, data);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid ${source}: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

/**
 * Loads the configuration file (if any) and applies overrides.
 *
 * An explicit `configPath` must exist; the default path may be absent, in
 * which case only defaults and overrides apply.
 */
export async function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {}
): Promise<RunConfig> {
  const filePath = configPath ?? getConfigPath();
  let fileValues: Record<string, unknown> = {};

  if (await fileExists(filePath)) {
    const text = await readFileWithEncoding(filePath);
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ConfigurationError(
        `Config file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );
    }
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      throw new ConfigurationError("Config file must contain a JSON object", { filePath });
    }
    fileValues = { ...data };
    logger.debug({ filePath }, "Loaded config file");
  } else if (configPath !== undefined) {
    throw new ConfigurationError(`Config file not found: ${configPath}`, { filePath: configPath });
  }

  const merged: Record<string, unknown> = { ...fileValues };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  return parseConfig(merged, filePath);
}
