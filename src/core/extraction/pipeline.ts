/**
 * Extraction Pipeline
 *
 * Runs one repository through Loader → Parser → Assembler → Filters.
 *
 * The filter chain is resolved before anything is read, per-file parsing
 * runs with bounded concurrency, and the repository is assembled only after
 * every file has finished. A cancelled run exposes nothing.
 *
 * @module
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { ConfigurationError, ExtractionCancelledError } from "../errors.js";
import type { Repository, RepositoryIdentity } from "../models/entities.js";
import { failureFromError, type FileFailure } from "../models/failures.js";
import type { IParser } from "../interfaces/IParser.js";
import { PythonParser } from "../parser/python-parser.js";
import { loadSources } from "../loader/source-loader.js";
import { assembleRepository } from "../assembler/entity-assembler.js";
import { applyFilters } from "../filters/pipeline.js";
import { createDefaultFilterRegistry, type FilterRegistry } from "../filters/registry.js";
import type { Exclusion } from "../filters/types.js";
import { partition } from "../../types/result.js";
import {
  CancellationTokenSource,
  mapConcurrent,
  type CancellationToken,
} from "../../utils/async.js";
import { DEFAULT_FILTERS } from "../../utils/validation.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("extraction");

// =============================================================================
// Types
// =============================================================================

export type ExtractionPhase = "loading" | "parsing" | "filtering" | "complete";

/**
 * Progress event for an extraction run
 */
export interface ExtractionProgressEvent {
  phase: ExtractionPhase;
  /** File being parsed (parsing phase only) */
  currentFile?: string;
  processed: number;
  total: number;
  message: string;
}

/**
 * What to extract and how
 */
export interface ExtractionRequest {
  identity: RepositoryIdentity;
  /** Checkout directory, read through the loader */
  root?: string;
  /** Already-read sources (relative path → text); used instead of `root` */
  sources?: ReadonlyMap<string, string>;
  /** Filter names or a comma-separated chain (default: NoStringTypeFilter,EmptyFilter) */
  filters?: string | readonly string[];
  /** Registry to resolve names against (default: built-in filters) */
  registry?: FilterRegistry;
  /** Parser to use; one is created and closed per run when omitted */
  parser?: IParser;
  /** Files parsed in parallel (default: 4) */
  concurrency?: number;
  /** Cancel the run after this many milliseconds */
  timeoutMs?: number | null;
  include?: string[];
  ignore?: string[];
  /** External cancellation */
  cancellation?: CancellationToken;
  onProgress?: (event: ExtractionProgressEvent) => void;
}

export interface EntityCounts {
  modules: number;
  classes: number;
  functions: number;
  methods: number;
  parameters: number;
  typedParameters: number;
}

export interface ExtractionStats {
  filesDiscovered: number;
  filesParsed: number;
  filesFailed: number;
  /** Counts before filtering */
  extracted: EntityCounts;
  /** Counts after filtering; null when the repository was excluded */
  retained: EntityCounts | null;
  durationMs: number;
}

/**
 * Result of one run. Files that failed and nodes that filters removed are
 * reported separately.
 */
export interface ExtractionReport {
  identity: RepositoryIdentity;
  /** Unfiltered tree */
  extracted: Repository;
  /** Filtered tree; null when a filter removed the repository */
  repository: Repository | null;
  failures: FileFailure[];
  exclusions: Exclusion[];
  stats: ExtractionStats;
}

const DEFAULT_INCLUDE = ["**/*.py"];
const DEFAULT_IGNORE = ["**/.git/**", "**/__pycache__/**"];

// =============================================================================
// Statistics
// =============================================================================

/**
 * Counts the entities in a repository.
 */
export function computeStats(repository: Repository): EntityCounts {
  const counts: EntityCounts = {
    modules: repository.modules.length,
    classes: 0,
    functions: 0,
    methods: 0,
    parameters: 0,
    typedParameters: 0,
  };

  for (const module of repository.modules) {
    counts.functions += module.functions.length;
    const callables = [...module.functions, ...module.classes.flatMap((cls) => cls.methods)];
    counts.classes += module.classes.length;
    counts.methods += callables.length - module.functions.length;
    for (const callable of callables) {
      counts.parameters += callable.parameters.length;
      counts.typedParameters += callable.parameters.filter((p) => p.type !== null).length;
    }
  }

  return counts;
}

// =============================================================================
// Pipeline
// =============================================================================

function throwIfCancelled(token: CancellationToken): void {
  if (token.cancelled) {
    throw new ExtractionCancelledError(token.reason ?? "Extraction cancelled");
  }
}

/**
 * Extracts, assembles and filters one repository.
 *
 * @throws ConfigurationError for an unknown filter, before any file is read
 * @throws ExtractionCancelledError when cancelled or timed out
 *
 * @example
 * ```typescript
 * const report = await extractRepository({
 *   identity: { name: "toolkit", url: "https://example.org/toolkit", releaseTag: "1.0.0", revision: "abc123" },
 *   root: "/tmp/toolkit",
 *   filters: "NoStringTypeFilter,EmptyFilter",
 * });
 * console.log(report.stats.retained);
 * ```
 */
export async function extractRepository(request: ExtractionRequest): Promise<ExtractionReport> {
  const startTime = performance.now();
  const registry = request.registry ?? createDefaultFilterRegistry();
  const chain = registry.resolve(request.filters ?? [...DEFAULT_FILTERS]);
  const { identity, onProgress } = request;

  if (request.sources === undefined && request.root === undefined) {
    throw new ConfigurationError("Extraction needs either a root directory or sources");
  }

  const cancelSource = new CancellationTokenSource();
  const token = cancelSource.token;
  const unsubscribe = request.cancellation?.onCancel(() =>
    cancelSource.cancel(request.cancellation?.reason)
  );
  if (request.timeoutMs) {
    cancelSource.cancelAfter(request.timeoutMs);
  }

  const ownsParser = request.parser === undefined;
  const parser = request.parser ?? new PythonParser();

  try {
    // 1. Load
    onProgress?.({ phase: "loading", processed: 0, total: 0, message: "Reading source files" });
    const failures: FileFailure[] = [];
    let sources: ReadonlyMap<string, string>;
    if (request.sources !== undefined) {
      sources = request.sources;
    } else {
      const loaded = await loadSources(request.root ?? ".", {
        include: request.include ?? DEFAULT_INCLUDE,
        ignore: request.ignore ?? DEFAULT_IGNORE,
      });
      sources = loaded.sources;
      failures.push(...loaded.failures);
    }
    throwIfCancelled(token);

    // 2. Parse
    await parser.initialize();
    const entries = [...sources.entries()];
    let processed = 0;

    const results = await mapConcurrent(
      entries,
      async ([filePath, text]) => {
        // let timers and cancel callbacks run between files
        await yieldToEventLoop();
        throwIfCancelled(token);
        const result = parser.parse(filePath, text);
        processed++;
        onProgress?.({
          phase: "parsing",
          currentFile: filePath,
          processed,
          total: entries.length,
          message: `Parsed ${filePath}`,
        });
        return result;
      },
      request.concurrency ?? 4
    );
    throwIfCancelled(token);

    const { oks: records, errs: parseErrors } = partition(results);
    for (const error of parseErrors) {
      logger.warn({ filePath: error.filePath, line: error.line, column: error.column }, error.message);
      failures.push(failureFromError(error));
    }

    // 3. Assemble and filter
    onProgress?.({
      phase: "filtering",
      processed: 0,
      total: chain.length,
      message: `Applying ${chain.map((f) => f.name).join(", ") || "no filters"}`,
    });
    const extracted = assembleRepository(identity, records);
    const outcome = applyFilters(extracted, chain);

    const stats: ExtractionStats = {
      filesDiscovered: sources.size + failures.filter((f) => f.kind === "io").length,
      filesParsed: records.length,
      filesFailed: failures.length,
      extracted: computeStats(extracted),
      retained: outcome.repository ? computeStats(outcome.repository) : null,
      durationMs: Math.round(performance.now() - startTime),
    };

    logger.info(
      {
        repository: identity.name,
        filters: chain.map((f) => f.name),
        filesParsed: stats.filesParsed,
        filesFailed: stats.filesFailed,
        exclusions: outcome.exclusions.length,
        durationMs: stats.durationMs,
      },
      "Extraction complete"
    );
    onProgress?.({
      phase: "complete",
      processed: entries.length,
      total: entries.length,
      message: `Extracted ${identity.name}`,
    });

    return {
      identity,
      extracted,
      repository: outcome.repository,
      failures,
      exclusions: [...outcome.exclusions],
      stats,
    };
  } finally {
    cancelSource.dispose();
    unsubscribe?.();
    if (ownsParser) {
      await parser.close();
    }
  }
}
