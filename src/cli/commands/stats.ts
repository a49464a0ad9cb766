/**
 * stats command - Summarize a dataset file
 */

import chalk from "chalk";
import { computeStats } from "../../core/extraction/pipeline.js";
import { readDataset } from "../../core/serializer/dataset-serializer.js";
import { formatCounts } from "../output.js";

export interface StatsOptions {
  json?: boolean;
}

export async function statsCommand(datasetPath: string, options: StatsOptions): Promise<void> {
  const repositories = await readDataset(datasetPath);
  const rows = repositories.map((repository) => ({
    name: repository.name,
    tag: repository.releaseTag,
    counts: computeStats(repository),
  }));

  if (options.json) {
    console.log(JSON.stringify(rows, null, 2));
    return;
  }

  console.log(chalk.cyan.bold(`Dataset: ${datasetPath}`));
  console.log(chalk.dim("─".repeat(40)));
  for (const row of rows) {
    console.log(`  ${chalk.white.bold(row.name)} ${chalk.dim(row.tag)}`);
    console.log(`    ${formatCounts(row.counts)}`);
  }
  console.log();
  console.log(chalk.dim(`${rows.length} repositories`));
}
