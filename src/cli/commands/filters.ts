/**
 * filters command - List the registered filters
 */

import chalk from "chalk";
import { createDefaultFilterRegistry } from "../../core/filters/registry.js";
import { DEFAULT_FILTERS } from "../../utils/validation.js";

export function filtersCommand(): void {
  const registry = createDefaultFilterRegistry();

  console.log(chalk.cyan.bold("Available filters"));
  console.log(chalk.dim("─".repeat(40)));

  for (const filter of registry.list()) {
    const scope =
      filter.kind === "composite" ? filter.stages.map((stage) => stage.kind).join(" → ") : filter.kind;
    const marker = filter.runsLast ? chalk.yellow(" (runs last)") : "";
    console.log(`  ${chalk.white.bold(filter.name)}${marker}`);
    console.log(`    ${chalk.dim(`scope: ${scope}`)}`);
    console.log(`    ${filter.description}`);
  }

  console.log();
  console.log(chalk.dim(`Default chain: ${DEFAULT_FILTERS.join(",")}`));
}
