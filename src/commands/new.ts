import { resolve } from "node:path";
import chalk from "chalk";
import type { Context } from "../types";
import { createBook } from "../lib/book";
import type { Runtime } from "../lib/runtime";

export async function newBook(target: string | undefined, runtime: Runtime, ctx: Context): Promise<void> {
  if (!target) {
    throw new Error("Target file required. Usage: epubtree new <book.epub>");
  }

  console.log(chalk.blue("→") + ` Creating book: ${chalk.bold(target)}`);

  const session = await createBook(runtime, resolve(ctx.cwd, target));

  console.log();
  console.log(chalk.green("✓") + ` Workspace ready: ${chalk.bold(session.workspace)}`);
  console.log(chalk.dim(`  Packs into: ${session.target}`));
  console.log();
  console.log(chalk.dim("  Next steps:"));
  console.log(`    cd ${session.workspace}`);
  console.log(`    epubtree repack`);
  console.log();
}
