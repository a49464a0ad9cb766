/**
 * provide command - Write the callables of a dataset to one file each
 */

import chalk from "chalk";
import ora from "ora";
import { provideCallables } from "../../core/provide/callable-provider.js";
import { readDataset } from "../../core/serializer/dataset-serializer.js";
import { createLogger } from "../../utils/logger.js";
import { info } from "../output.js";

const logger = createLogger("provide");

export interface ProvideCommandOptions {
  outputDir: string;
  withoutTypeAnnotations?: boolean;
}

export async function provideCommand(datasetPath: string, options: ProvideCommandOptions): Promise<void> {
  const repositories = await readDataset(datasetPath);
  logger.debug({ datasetPath, repositories: repositories.length }, "Dataset loaded");

  const spinner = ora({ text: "Writing callables...", stream: process.stderr }).start();

  try {
    const result = await provideCallables(repositories, {
      outputDir: options.outputDir,
      withoutTypeAnnotations: options.withoutTypeAnnotations ?? false,
    });

    const summary = `${result.files.length} callable(s) written to ${options.outputDir}`;
    if (result.unstripped.length > 0) {
      spinner.warn(chalk.yellow(summary));
      info(chalk.yellow(`  ${result.unstripped.length} kept their annotations (body did not parse):`));
      for (const filePath of result.unstripped) {
        info(chalk.dim(`    ${filePath}`));
      }
    } else {
      spinner.succeed(chalk.green(summary));
    }
  } catch (error) {
    spinner.fail(chalk.red("Writing callables failed"));
    throw error;
  }
}
