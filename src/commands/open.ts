import { resolve } from "node:path";
import chalk from "chalk";
import type { Context } from "../types";
import { openBook } from "../lib/book";
import type { Runtime } from "../lib/runtime";

export async function open(archive: string | undefined, runtime: Runtime, ctx: Context): Promise<void> {
  if (!archive) {
    throw new Error("Archive required. Usage: epubtree open <book.epub>");
  }

  console.log(chalk.blue("→") + ` Unpacking: ${chalk.bold(archive)}`);

  const session = await openBook(runtime, resolve(ctx.cwd, archive));

  console.log(chalk.green("✓") + ` Workspace ready: ${chalk.bold(session.workspace)}`);
  console.log();
  console.log(chalk.dim("  Next steps:"));
  console.log(`    cd ${session.workspace}`);
  console.log(`    epubtree repack`);
  console.log();
}
