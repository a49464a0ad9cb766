/**
 * Shared CLI output helpers
 *
 * Human-readable text goes to stderr whenever stdout may carry JSON.
 */

import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import type { FileFailure } from "../core/models/failures.js";
import type { EntityCounts } from "../core/extraction/pipeline.js";
import { writeFile } from "../utils/fs.js";

/**
 * commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function info(line = ""): void {
  process.stderr.write(`${line}\n`);
}

/**
 * Writes JSON to a file, or to stdout when no path is given.
 */
export async function emitJson(data: unknown, outputPath?: string): Promise<void> {
  const text = `${JSON.stringify(data, null, 2)}\n`;
  if (outputPath) {
    await writeFile(outputPath, text);
  } else {
    process.stdout.write(text);
  }
}

export function formatCounts(counts: EntityCounts): string {
  return [
    `${counts.modules} modules`,
    `${counts.classes} classes`,
    `${counts.functions} functions`,
    `${counts.methods} methods`,
    `${counts.typedParameters}/${counts.parameters} typed parameters`,
  ].join(", ");
}

export function printFailures(failures: readonly FileFailure[]): void {
  if (failures.length === 0) return;
  info(chalk.yellow(`  ${failures.length} file(s) skipped:`));
  for (const failure of failures) {
    const location = failure.line !== null ? `:${failure.line}:${failure.column ?? 1}` : "";
    info(chalk.dim(`    [${failure.kind}] ${failure.filePath}${location}  ${failure.message}`));
  }
}
