/**
 * Python Parser
 *
 * Implements the IParser interface for Python files. Uses Tree-sitter for
 * parsing and the PythonExtractor for record conversion.
 *
 * @module
 */

import type { IParser } from "../interfaces/IParser.js";
import type { ModuleRecord } from "../models/records.js";
import { ParsingError } from "../errors.js";
import { ok, err, type Result } from "../../types/result.js";
import { createParserManager, type ParserManager, type ParserManagerOptions } from "./parser-manager.js";
import { createPythonExtractor, findSyntaxError } from "./python-extractor.js";

// =============================================================================
// Python Parser Class
// =============================================================================

/**
 * Parser for Python files.
 *
 * @example
 * ```typescript
 * const parser = new PythonParser();
 * await parser.initialize();
 *
 * const result = parser.parse("pkg/client.py", content);
 * if (!result.ok) console.error(result.error.toString());
 *
 * await parser.close();
 * ```
 */
export class PythonParser implements IParser {
  readonly extensions: readonly string[] = [".py"];

  private parserManager: ParserManager;
  private extractor = createPythonExtractor();

  constructor(options: ParserManagerOptions = {}) {
    this.parserManager = createParserManager(options);
  }

  /**
   * Initializes the parser (loads the WASM grammar).
   */
  async initialize(): Promise<void> {
    await this.parserManager.initialize();
  }

  /**
   * Closes the parser and releases resources.
   */
  async close(): Promise<void> {
    await this.parserManager.close();
  }

  supports(filePath: string): boolean {
    return this.parserManager.isSupported(filePath);
  }

  /**
   * Parses one file into a ModuleRecord. Invalid syntax is returned as an
   * error value; it never throws for bad input.
   */
  parse(filePath: string, source: string): Result<ModuleRecord, ParsingError> {
    const { tree } = this.parserManager.parseCode(source);
    try {
      const diagnostic = findSyntaxError(tree, source);
      if (diagnostic) {
        return err(
          new ParsingError(diagnostic.message, {
            filePath,
            line: diagnostic.line,
            column: diagnostic.column,
          })
        );
      }
      return ok(this.extractor.extract(tree, source, filePath));
    } finally {
      tree.delete();
    }
  }

  get isReady(): boolean {
    return this.parserManager.isReady;
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates a PythonParser instance.
 */
export function createPythonParser(options?: ParserManagerOptions): PythonParser {
  return new PythonParser(options);
}
