/**
 * dataset command - Build a dataset from a manifest of checkouts
 */

import chalk from "chalk";
import ora from "ora";
import * as path from "node:path";
import { loadConfig } from "../../core/config.js";
import { buildDataset, readManifest } from "../../core/dataset/dataset-builder.js";
import { serializeDataset, writeDataset } from "../../core/serializer/dataset-serializer.js";
import { createLogger } from "../../utils/logger.js";
import { emitJson, info, printFailures } from "../output.js";

const logger = createLogger("dataset");

export interface DatasetOptions {
  output?: string;
  filters?: string;
  concurrency?: number;
  timeout?: number;
  config?: string;
}

/**
 * Extract every project in the manifest into one dataset file
 */
export async function datasetCommand(manifestPath: string, options: DatasetOptions): Promise<void> {
  const config = await loadConfig(options.config, {
    filters: options.filters,
    concurrency: options.concurrency,
    timeoutMs: options.timeout,
  });
  const manifest = await readManifest(manifestPath);
  logger.debug({ manifestPath, projects: manifest.length }, "Manifest loaded");

  const spinner = ora({ text: "Building dataset...", stream: process.stderr }).start();

  try {
    const result = await buildDataset(manifest, {
      baseDir: path.dirname(path.resolve(manifestPath)),
      filters: config.filters,
      concurrency: config.concurrency,
      timeoutMs: config.timeoutMs,
      include: config.include,
      ignore: config.ignore,
      onProject: (entry, index, total) => {
        spinner.text = `[${index + 1}/${total}] ${entry.name}`;
      },
    });

    spinner.succeed(
      chalk.green(`${result.repositories.length} of ${manifest.length} repositories kept`)
    );
    if (result.dropped.length > 0) {
      info(chalk.dim(`  Dropped (no modules left): ${result.dropped.join(", ")}`));
    }
    for (const report of result.reports) {
      if (report.failures.length > 0) {
        info(chalk.white(`  ${report.identity.name}`));
        printFailures(report.failures);
      }
    }

    if (options.output) {
      await writeDataset(options.output, result.repositories);
      info(chalk.dim(`  Dataset: ${options.output}`));
    } else {
      await emitJson(serializeDataset(result.repositories));
    }
  } catch (error) {
    spinner.fail(chalk.red("Dataset build failed"));
    throw error;
  }
}
