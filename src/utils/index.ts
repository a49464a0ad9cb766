/**
 * Shared utilities
 */

import * as path from "node:path";

export * from "./logger.js";
export * from "./fs.js";
export * from "./async.js";
export * from "./validation.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_FILE = "pyshape.config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_FILE);
}
