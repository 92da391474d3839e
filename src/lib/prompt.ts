import { createInterface } from "node:readline/promises";
import chalk from "chalk";
import type { Prompter } from "../types";

/**
 * Prompter backed by the controlling terminal.
 */
export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  async function ask(question: string): Promise<string> {
    const rl = createInterface({ input, output });
    try {
      return (await rl.question(question)).trim();
    } finally {
      rl.close();
    }
  }

  return {
    async confirmOverwrite(path) {
      const answer = await ask(`${chalk.yellow("?")} ${path} exists. Overwrite? ${chalk.dim("[y/N]")} `);
      return /^y(es)?$/i.test(answer);
    },

    async askPath(suggestion) {
      const answer = await ask(`${chalk.yellow("?")} Save as ${chalk.dim(`(${suggestion})`)}: `);
      return answer || suggestion;
    },

    warn(message) {
      console.log(chalk.yellow(`  ${message}`));
    },
  };
}
