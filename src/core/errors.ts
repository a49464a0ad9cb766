/**
 * Error Classes for pyshape
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Parsing errors (2xxx)
  PARSE_SYNTAX_ERROR = "E2003",
  PARSE_TREE_SITTER_ERROR = "E2004",

  // Extraction errors (7xxx)
  EXTRACTION_CANCELLED = "E7001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  FILE_SYSTEM_ERROR = "E9002",
  CONFIGURATION_ERROR = "E9003",
  DATASET_FORMAT_ERROR = "E9004",
}

/**
 * Base error class for all pyshape errors
 */
export class PyShapeError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "PyShapeError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Create a formatted error message
   */
  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * A source file whose text cannot be parsed. Non-fatal: the file is skipped.
 */
export class ParsingError extends PyShapeError {
  public readonly filePath: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    message: string,
    context: Record<string, unknown> & { filePath: string; line?: number; column?: number },
    code: ErrorCode = ErrorCode.PARSE_SYNTAX_ERROR
  ) {
    super(message, code, context);
    this.name = "ParsingError";
    this.filePath = context.filePath;
    this.line = context.line;
    this.column = context.column;
  }

  toString(): string {
    let location = ` at ${this.filePath}`;
    if (this.line !== undefined) {
      location += `:${this.line}`;
      if (this.column !== undefined) {
        location += `:${this.column}`;
      }
    }
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * The tree-sitter runtime or the Python grammar could not be loaded
 */
export class ParserInitializationError extends PyShapeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.PARSE_TREE_SITTER_ERROR, context);
    this.name = "ParserInitializationError";
  }
}

/**
 * A source file that could not be read. Non-fatal: reported like a parse failure.
 */
export class FileReadError extends PyShapeError {
  public readonly filePath: string;

  constructor(message: string, context: Record<string, unknown> & { filePath: string }) {
    super(message, ErrorCode.FILE_SYSTEM_ERROR, context);
    this.name = "FileReadError";
    this.filePath = context.filePath;
  }
}

/**
 * Invalid run configuration. Fatal, raised before any file is read.
 */
export class ConfigurationError extends PyShapeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
  }
}

/**
 * The run was cancelled before every file finished
 */
export class ExtractionCancelledError extends PyShapeError {
  constructor(message: string = "Extraction cancelled", context?: Record<string, unknown>) {
    super(message, ErrorCode.EXTRACTION_CANCELLED, context);
    this.name = "ExtractionCancelledError";
  }
}

/**
 * A dataset file that does not match the persisted schema
 */
export class DatasetFormatError extends PyShapeError {
  public readonly issues: string[];

  constructor(message: string, issues: string[], context?: Record<string, unknown>) {
    super(message, ErrorCode.DATASET_FORMAT_ERROR, { ...context, issues });
    this.name = "DatasetFormatError";
    this.issues = issues;
  }
}

/**
 * Check if an error is a PyShapeError
 */
export function isPyShapeError(error: unknown): error is PyShapeError {
  return error instanceof PyShapeError;
}
