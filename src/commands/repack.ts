import { resolve } from "node:path";
import chalk from "chalk";
import type { Context, Prompter } from "../types";
import { pack } from "../lib/packager";
import type { Runtime } from "../lib/runtime";

export async function repack(
  from: string | undefined,
  runtime: Runtime,
  prompter: Prompter,
  ctx: Context
): Promise<string> {
  const start = resolve(ctx.cwd, from ?? ".");

  console.log(chalk.blue("→") + ` Repacking from ${chalk.dim(start)}`);
  const written = await pack(runtime, start, prompter);
  console.log(chalk.green("✓") + ` Wrote ${chalk.bold(written)}`);

  return written;
}
