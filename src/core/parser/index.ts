/**
 * Code Parser Module
 *
 * Tree-sitter based parsing of Python source into extraction records.
 *
 * @module
 */

export type { IParser } from "../interfaces/IParser.js";

export * from "./parser-manager.js";
export * from "./python-extractor.js";
export * from "./python-parser.js";
