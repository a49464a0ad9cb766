/**
 * extract command - Extract one checked-out repository
 */

import chalk from "chalk";
import ora from "ora";
import { loadConfig } from "../../core/config.js";
import { extractRepository } from "../../core/extraction/pipeline.js";
import { serializeDataset, writeDataset, serializeReport } from "../../core/serializer/dataset-serializer.js";
import { createLogger } from "../../utils/logger.js";
import { emitJson, formatCounts, info, printFailures } from "../output.js";

const logger = createLogger("extract");

export interface ExtractOptions {
  name: string;
  url: string;
  tag: string;
  commit: string;
  filters?: string;
  concurrency?: number;
  timeout?: number;
  output?: string;
  report?: string;
  config?: string;
}

/**
 * Extract, filter and write the dataset for one repository
 */
export async function extractCommand(root: string, options: ExtractOptions): Promise<void> {
  logger.debug({ root, options }, "Starting extraction");

  const config = await loadConfig(options.config, {
    filters: options.filters,
    concurrency: options.concurrency,
    timeoutMs: options.timeout,
  });

  const spinner = ora({ text: `Extracting ${options.name}...`, stream: process.stderr }).start();

  try {
    const report = await extractRepository({
      identity: {
        name: options.name,
        url: options.url,
        releaseTag: options.tag,
        revision: options.commit,
      },
      root,
      filters: config.filters,
      concurrency: config.concurrency,
      timeoutMs: config.timeoutMs,
      include: config.include,
      ignore: config.ignore,
      onProgress: (event) => {
        spinner.text =
          event.phase === "parsing" ? `Parsing ${event.processed}/${event.total}` : event.message;
      },
    });

    const summary = `${options.name}: ${report.stats.filesParsed} file(s) parsed`;
    if (report.failures.length > 0) {
      spinner.warn(chalk.yellow(summary));
    } else {
      spinner.succeed(chalk.green(summary));
    }

    info(chalk.dim(`  Filters:   ${config.filters.join(", ") || "(none)"}`));
    info(chalk.dim(`  Extracted: ${formatCounts(report.stats.extracted)}`));
    info(
      chalk.dim(
        `  Retained:  ${report.stats.retained ? formatCounts(report.stats.retained) : "repository excluded"}`
      )
    );
    printFailures(report.failures);

    const repositories = report.repository ? [report.repository] : [];
    if (options.output) {
      await writeDataset(options.output, repositories);
      info(chalk.dim(`  Dataset:   ${options.output}`));
    } else {
      await emitJson(serializeDataset(repositories));
    }
    if (options.report) {
      await emitJson(serializeReport(report), options.report);
      info(chalk.dim(`  Report:    ${options.report}`));
    }
  } catch (error) {
    spinner.fail(chalk.red(`Extraction of ${options.name} failed`));
    throw error;
  }
}
