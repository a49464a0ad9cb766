/**
 * Dataset Builder
 *
 * Extracts every project listed in a manifest of checked-out repositories
 * and collects the non-empty results into one dataset.
 *
 * @module
 */

import * as path from "node:path";
import { DatasetFormatError, FileReadError } from "../errors.js";
import type { Repository } from "../models/entities.js";
import {
  extractRepository,
  type ExtractionReport,
  type ExtractionRequest,
} from "../extraction/pipeline.js";
import { createDefaultFilterRegistry } from "../filters/registry.js";
import { PythonParser } from "../parser/python-parser.js";
import {
  ManifestSchema,
  formatZodError,
  safeValidate,
  type ManifestEntry,
} from "../../utils/validation.js";
import { readFileWithEncoding } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("dataset");

// =============================================================================
// Types
// =============================================================================

/**
 * Run settings shared by every project in the manifest
 */
export type DatasetOptions = Pick<
  ExtractionRequest,
  "filters" | "registry" | "parser" | "concurrency" | "timeoutMs" | "include" | "ignore" | "cancellation"
> & {
  /** Directory that relative manifest paths resolve against */
  baseDir?: string;
  onProject?: (entry: ManifestEntry, index: number, total: number) => void;
};

export interface DatasetResult {
  /** Repositories that kept at least one module, in manifest order */
  repositories: Repository[];
  /** One report per manifest entry */
  reports: ExtractionReport[];
  /** Names of projects dropped for having no modules left */
  dropped: string[];
}

// =============================================================================
// Manifest
// =============================================================================

/**
 * Validates manifest JSON.
 *
 * @throws DatasetFormatError listing every schema violation
 */
export function parseManifest(data: unknown): ManifestEntry[] {
  const result = safeValidate(ManifestSchema, data);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new DatasetFormatError(`Invalid manifest: ${issues.length} issue(s)`, issues);
  }
  return result.data;
}

/**
 * Reads and validates a manifest file.
 */
export async function readManifest(filePath: string): Promise<ManifestEntry[]> {
  let text: string;
  try {
    text = await readFileWithEncoding(filePath);
  } catch (error) {
    throw new FileReadError(
      `Cannot read manifest: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DatasetFormatError(`Manifest is not valid JSON: ${reason}`, [reason], { filePath });
  }
  return parseManifest(data);
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Extracts each manifest entry in turn. Repositories that end up with no
 * modules (after filtering) are left out of the dataset.
 *
 * @throws ConfigurationError for an unknown filter, before any project is read
 */
export async function buildDataset(
  manifest: readonly ManifestEntry[],
  options: DatasetOptions = {}
): Promise<DatasetResult> {
  const registry = options.registry ?? createDefaultFilterRegistry();
  if (options.filters !== undefined) {
    registry.resolve(options.filters);
  }

  const ownsParser = options.parser === undefined;
  const parser = options.parser ?? new PythonParser();
  const baseDir = options.baseDir ?? process.cwd();

  const repositories: Repository[] = [];
  const reports: ExtractionReport[] = [];
  const dropped: string[] = [];

  try {
    for (const [index, entry] of manifest.entries()) {
      options.onProject?.(entry, index, manifest.length);

      const report = await extractRepository({
        identity: {
          name: entry.name,
          url: entry.url,
          releaseTag: entry.pypi_tag,
          revision: entry.git_commit_hash,
        },
        root: path.resolve(baseDir, entry.path),
        filters: options.filters,
        registry,
        parser,
        concurrency: options.concurrency,
        timeoutMs: options.timeoutMs,
        include: options.include,
        ignore: options.ignore,
        cancellation: options.cancellation,
      });
      reports.push(report);

      if (report.repository && report.repository.modules.length > 0) {
        repositories.push(report.repository);
      } else {
        logger.info({ repository: entry.name }, "Dropping repository without modules");
        dropped.push(entry.name);
      }
    }
  } finally {
    if (ownsParser) {
      await parser.close();
    }
  }

  return { repositories, reports, dropped };
}
