import { resolve } from "node:path";
import chalk from "chalk";
import type { Context } from "../types";
import type { Runtime } from "../lib/runtime";
import { printValidationResults, validateArchive } from "../lib/validator";

/**
 * Resolves true when every check passed.
 */
export async function validate(
  archive: string | undefined,
  runtime: Runtime,
  ctx: Context
): Promise<boolean> {
  if (!archive) {
    throw new Error("Archive required. Usage: epubtree validate <book.epub>");
  }

  const path = resolve(ctx.cwd, archive);
  console.log(chalk.blue("→") + ` Validating ${path}...`);

  const results = await validateArchive(runtime, path);
  printValidationResults(path, results);

  const failed = results.filter((r) => !r.passed);
  console.log();
  if (failed.length === 0) {
    console.log(chalk.green("✓") + ` All ${results.length} checks passed`);
    return true;
  }

  console.log(chalk.red("✗") + ` ${failed.length} check(s) failed`);
  console.log(chalk.dim(await runtime.log.tail()));
  return false;
}
