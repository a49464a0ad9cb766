/**
 * File System Utilities
 * File discovery and reading for source trees
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Read a file with the given encoding
 * Defaults to UTF-8
 */
export async function readFileWithEncoding(
  filePath: string,
  encoding: BufferEncoding = "utf-8"
): Promise<string> {
  return fsPromises.readFile(filePath, { encoding });
}

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Read a file that must be valid UTF-8.
 * Rejects instead of substituting U+FFFD for malformed bytes.
 */
export async function readUtf8File(filePath: string): Promise<string> {
  const bytes = await fsPromises.readFile(filePath);
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    throw new Error("File is not valid UTF-8", { cause: error });
  }
}

/**
 * Find files matching glob patterns.
 * Results are `/`-separated and sorted, so discovery order is stable across
 * platforms and runs.
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = false } = options;

  const entries = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles: true,
    ignore,
    dot: true,
    followSymbolicLinks: false,
  });

  return entries.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write content to a file, creating parent directories if needed
 */
export async function writeFile(filePath: string, content: string | Buffer): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, content);
}
