/**
 * Parser Manager
 *
 * Owns the Tree-sitter runtime and the Python grammar. Provides a single
 * entry point for turning source text into a syntax tree.
 *
 * @module
 */

import { Parser, Language, type Tree } from "web-tree-sitter";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { ParserInitializationError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("parser");

// =============================================================================
// Types
// =============================================================================

/**
 * Parse result from Tree-sitter
 */
export interface ParseResult {
  /** The parsed syntax tree; callers release it with `tree.delete()` */
  tree: Tree;
  /** Whether the tree contains ERROR or missing nodes */
  hasErrors: boolean;
}

export interface ParserManagerOptions {
  /** Explicit grammar location; discovered under node_modules when omitted */
  grammarPath?: string;
}

// =============================================================================
// Constants
// =============================================================================

const PYTHON_GRAMMAR = "tree-sitter-python/tree-sitter-python.wasm";

/**
 * Python source file extensions
 */
export const PYTHON_EXTENSIONS = [".py"] as const;

// =============================================================================
// Grammar Resolution
// =============================================================================

/**
 * Finds a file inside node_modules, looking in the working directory first
 * and then in every directory above this module.
 */
export function resolveGrammarPath(packagePath: string = PYTHON_GRAMMAR): string {
  const cwdPath = path.join(process.cwd(), "node_modules", packagePath);
  if (fs.existsSync(cwdPath)) {
    return cwdPath;
  }

  let currentDir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(currentDir, "node_modules", packagePath);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  throw new ParserInitializationError(`Grammar not found: ${packagePath}`, { packagePath });
}

// =============================================================================
// Parser Manager Class
// =============================================================================

/**
 * Manages the Tree-sitter parser for Python.
 *
 * @example
 * ```typescript
 * const manager = new ParserManager();
 * await manager.initialize();
 *
 * const result = manager.parseCode("def f(x: int) -> int:\n    return x\n");
 * console.log(result.tree.rootNode.type); // "module"
 * result.tree.delete();
 *
 * await manager.close();
 * ```
 */
export class ParserManager {
  private parser: Parser | null = null;
  private initPromise: Promise<void> | null = null;

  constructor(private readonly options: ParserManagerOptions = {}) {}

  /**
   * Initializes Tree-sitter and loads the Python grammar.
   * Concurrent callers share one initialization.
   */
  async initialize(): Promise<void> {
    if (this.parser) {
      return;
    }
    this.initPromise ??= this.load().catch((error: unknown) => {
      this.initPromise = null;
      throw error;
    });
    await this.initPromise;
  }

  /**
   * Releases the parser.
   */
  async close(): Promise<void> {
    this.parser?.delete();
    this.parser = null;
    this.initPromise = null;
  }

  /**
   * Parses Python source text.
   */
  parseCode(code: string): ParseResult {
    const parser = this.ensureInitialized();
    const tree = parser.parse(code);
    if (!tree) {
      throw new ParserInitializationError("Tree-sitter returned no tree");
    }
    return { tree, hasErrors: tree.rootNode.hasError };
  }

  /**
   * Checks if a file is Python source by extension.
   */
  isSupported(filePath: string): boolean {
    const ext = path.extname(filePath).toLowerCase();
    return PYTHON_EXTENSIONS.some((candidate) => candidate === ext);
  }

  /**
   * Whether the manager is initialized.
   */
  get isReady(): boolean {
    return this.parser !== null;
  }

  private async load(): Promise<void> {
    const grammarPath = this.options.grammarPath ?? resolveGrammarPath();
    const startTime = performance.now();
    try {
      await Parser.init();
      const language = await Language.load(grammarPath);
      const parser = new Parser();
      parser.setLanguage(language);
      this.parser = parser;
    } catch (error) {
      throw new ParserInitializationError(
        `Failed to load Python grammar: ${error instanceof Error ? error.message : String(error)}`,
        { grammarPath }
      );
    }
    logger.debug({ grammarPath, durationMs: performance.now() - startTime }, "Python grammar loaded");
  }

  private ensureInitialized(): Parser {
    if (!this.parser) {
      throw new ParserInitializationError("ParserManager not initialized. Call initialize() first.");
    }
    return this.parser;
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates a ParserManager instance.
 */
export function createParserManager(options?: ParserManagerOptions): ParserManager {
  return new ParserManager(options);
}
