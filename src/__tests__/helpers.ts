import { join } from "node:path";
import type { Prompter } from "../types";
import { parseConfig, type ConfigInput } from "../lib/config";
import { createRuntime, type Runtime, type RuntimeOptions } from "../lib/runtime";

export async function testRuntime(
  tempDir: string,
  config: ConfigInput = {},
  options: RuntimeOptions = {}
): Promise<Runtime> {
  return createRuntime(
    parseConfig({ scratchRoot: join(tempDir, "scratch"), archiver: "builtin", ...config }),
    options
  );
}

/**
 * Prompter that answers from fixed lists and records what it was asked.
 */
export function scriptedPrompter(answers: { overwrite?: boolean[]; paths?: string[] }) {
  const overwrite = [...(answers.overwrite ?? [])];
  const paths = [...(answers.paths ?? [])];
  const asked: string[] = [];
  const warnings: string[] = [];

  const prompter: Prompter = {
    async confirmOverwrite(path) {
      asked.push(`overwrite ${path}`);
      const answer = overwrite.shift();
      if (answer === undefined) throw new Error(`unexpected overwrite prompt for ${path}`);
      return answer;
    },
    async askPath(suggestion) {
      asked.push(`path ${suggestion}`);
      const answer = paths.shift();
      if (answer === undefined) throw new Error(`unexpected path prompt (${suggestion})`);
      return answer;
    },
    warn(message) {
      warnings.push(message);
    },
  };

  return { prompter, asked, warnings };
}
