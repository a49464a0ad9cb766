#!/usr/bin/env node

/**
 * pyshape CLI
 * Extracts Python repositories into filtered structural datasets
 */

import { Command } from "commander";
import chalk from "chalk";
import { extractCommand } from "./commands/extract.js";
import { datasetCommand } from "./commands/dataset.js";
import { filtersCommand } from "./commands/filters.js";
import { statsCommand } from "./commands/stats.js";
import { provideCommand } from "./commands/provide.js";
import { parsePositiveInt } from "./output.js";
import { isPyShapeError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("pyshape")
  .description("Extract the structure of Python repositories into filtered datasets")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("extract")
  .description("Extract one checked-out repository")
  .argument("<root>", "Repository checkout directory")
  .requiredOption("-n, --name <name>", "Package name")
  .requiredOption("-u, --url <url>", "Source URL")
  .requiredOption("-t, --tag <tag>", "PyPI release tag")
  .requiredOption("--commit <hash>", "Git commit hash of the checkout")
  .option("-f, --filters <names>", "Comma-separated filter chain")
  .option("-c, --concurrency <n>", "Files parsed in parallel", parsePositiveInt)
  .option("--timeout <ms>", "Cancel the run after this many milliseconds", parsePositiveInt)
  .option("-o, --output <file>", "Write the dataset here instead of stdout")
  .option("-r, --report <file>", "Write the run report (failures, exclusions, stats)")
  .option("--config <file>", "Config file (default: ./pyshape.config.json)")
  .action(extractCommand);

program
  .command("dataset")
  .description("Build a dataset from a manifest of checked-out repositories")
  .argument("<manifest>", "JSON array of { name, url, pypi_tag, git_commit_hash, path }")
  .option("-o, --output <file>", "Write the dataset here instead of stdout")
  .option("-f, --filters <names>", "Comma-separated filter chain")
  .option("-c, --concurrency <n>", "Files parsed in parallel", parsePositiveInt)
  .option("--timeout <ms>", "Per-repository timeout in milliseconds", parsePositiveInt)
  .option("--config <file>", "Config file (default: ./pyshape.config.json)")
  .action(datasetCommand);

program
  .command("filters")
  .description("List available filters")
  .action(filtersCommand);

program
  .command("stats")
  .description("Show entity counts for a dataset file")
  .argument("<dataset>", "Dataset JSON file")
  .option("--json", "Print counts as JSON")
  .action(statsCommand);

program
  .command("provide")
  .description("Write the body of every callable in a dataset to a file of its own")
  .argument("<dataset>", "Dataset JSON file")
  .option("-o, --output-dir <dir>", "Directory to write into", "output")
  .option("--without-type-annotations", "Remove parameter, return and variable annotations")
  .action(provideCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Report the error and exit with a failure status
 */
function handleError(error: unknown): void {
  if (isPyShapeError(error)) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\n${error.toString()}`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

function shutdown(signal: string): void {
  logger.info({ signal }, "Received shutdown signal");
  console.error(chalk.dim(`\nReceived ${signal}, stopping.`));
  process.exit(130);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
