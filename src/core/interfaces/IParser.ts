/**
 * IParser - source-to-record parser interface
 *
 * Turns the text of one source file into a ModuleRecord, or a ParsingError
 * when the text is not valid syntax. Implementations perform no I/O.
 *
 * @module
 */

import type { ModuleRecord } from "../models/records.js";
import type { ParsingError } from "../errors.js";
import type { Result } from "../../types/result.js";

/**
 * Parser interface used by the extraction pipeline.
 *
 * @example
 * ```typescript
 * const parser = createPythonParser();
 * await parser.initialize();
 *
 * const result = parser.parse("pkg/client.py", source);
 * if (result.ok) console.log(result.value.functions);
 *
 * await parser.close();
 * ```
 */
export interface IParser {
  /**
   * Parse one file's text
   * @param filePath - Relative, `/`-separated path recorded on the result
   * @param source - File content
   */
  parse(filePath: string, source: string): Result<ModuleRecord, ParsingError>;

  /**
   * Initialize the parser (load WASM, etc)
   */
  initialize(): Promise<void>;

  /**
   * Close the parser and release resources
   */
  close(): Promise<void>;

  /**
   * Check if this parser supports a given file extension
   */
  supports(filePath: string): boolean;

  /**
   * Whether the parser is initialized and ready
   */
  readonly isReady: boolean;
}
