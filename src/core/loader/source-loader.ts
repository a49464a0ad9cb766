/**
 * Source Loader
 *
 * Discovers the Python files of a checked-out repository and reads them.
 * Unreadable files are reported, not thrown.
 *
 * @module
 */

import * as path from "node:path";
import { FileReadError } from "../errors.js";
import { failureFromError, type FileFailure } from "../models/failures.js";
import { findFiles, readUtf8File } from "../../utils/fs.js";
import { mapConcurrent } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("loader");

// =============================================================================
// Types
// =============================================================================

export interface LoadOptions {
  /** Glob patterns relative to the root */
  include: string[];
  ignore: string[];
  /** Files read in parallel (default: 16) */
  concurrency?: number;
}

export interface LoadedSources {
  /** Relative `/`-separated path → file text, in sorted path order */
  sources: Map<string, string>;
  failures: FileFailure[];
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Reads every matching file under `root` as UTF-8. Files that are not
 * valid UTF-8 become `io` failures.
 *
 * @example
 * ```typescript
 * const { sources, failures } = await loadSources("/tmp/checkout", {
 *   include: ["**\/*.py"],
 *   ignore: ["**\/.git/**"],
 * });
 * ```
 */
export async function loadSources(root: string, options: LoadOptions): Promise<LoadedSources> {
  const files = await findFiles({ patterns: options.include, ignore: options.ignore, cwd: root });
  logger.debug({ root, count: files.length }, "Discovered source files");

  const contents = await mapConcurrent(
    files,
    async (relativePath) => {
      try {
        return await readUtf8File(path.join(root, relativePath));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return new FileReadError(`Cannot read file: ${reason}`, { filePath: relativePath });
      }
    },
    options.concurrency ?? 16
  );

  const sources = new Map<string, string>();
  const failures: FileFailure[] = [];

  files.forEach((relativePath, index) => {
    const content = contents[index];
    if (content instanceof FileReadError) {
      logger.warn({ filePath: relativePath, err: content }, "Skipping unreadable file");
      failures.push(failureFromError(content));
    } else if (content !== undefined) {
      sources.set(relativePath, content);
    }
  });

  return { sources, failures };
}
