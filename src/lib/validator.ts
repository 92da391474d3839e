import { readFile } from "node:fs/promises";
import chalk from "chalk";
import { errorMessage } from "./errors";
import { checkMarker, readEntries, readRootfile } from "./inspect";
import { LAYOUT, MIMETYPE } from "./paths";
import { EXIT_NOT_FOUND, runProcess } from "./process";
import type { Runtime } from "./runtime";

export type ValidationCheck = "structure" | "members" | "validator";

export interface ValidationResult {
  check: ValidationCheck;
  passed: boolean;
  message: string;
}

/**
 * Check a packed archive: marker placement, bootstrap members, then the
 * configured external validator.
 */
export async function validateArchive(
  runtime: Runtime,
  archive: string
): Promise<ValidationResult[]> {
  const results: ValidationResult[] = [];

  try {
    const buffer = await readFile(archive);
    const entries = await readEntries(buffer);

    const problems = await checkMarker(buffer, entries, MIMETYPE);
    results.push({
      check: "structure",
      passed: problems.length === 0,
      message: problems.length === 0 ? `✓ ${LAYOUT.mimetype} is first and stored` : problems.join("; "),
    });

    results.push(await checkMembers(buffer, new Set(entries.map((e) => e.name))));
  } catch (err) {
    results.push({ check: "structure", passed: false, message: errorMessage(err) });
    return results;
  }

  results.push(await runValidator(runtime, archive));
  return results;
}

/**
 * The marker, the container, and the package document the container
 * points at must all be present.
 */
async function checkMembers(buffer: Buffer, names: Set<string>): Promise<ValidationResult> {
  const missing: string[] = [LAYOUT.mimetype, LAYOUT.container].filter((member) => !names.has(member));

  if (names.has(LAYOUT.container)) {
    const rootfile = await readRootfile(buffer);
    if (!rootfile) {
      missing.push(`rootfile in ${LAYOUT.container}`);
    } else if (!names.has(rootfile)) {
      missing.push(rootfile);
    }
  }

  return {
    check: "members",
    passed: missing.length === 0,
    message: missing.length === 0 ? "✓ bootstrap members present" : `missing: ${missing.join(", ")}`,
  };
}

async function runValidator(runtime: Runtime, archive: string): Promise<ValidationResult> {
  const command = runtime.config.validator;
  const code = await runProcess(command, [archive], {
    log: runtime.log,
    timeoutMs: runtime.config.timeoutMs,
  });

  if (code === 0) {
    return { check: "validator", passed: true, message: `✓ ${command}` };
  }
  if (code === EXIT_NOT_FOUND) {
    return { check: "validator", passed: false, message: `${command} not found (set 'validator' in config)` };
  }
  return { check: "validator", passed: false, message: `${command} exited ${code}` };
}

/**
 * Print validation results
 */
export function printValidationResults(archive: string, results: ValidationResult[]): void {
  console.log(chalk.bold(`\n${archive}:`));
  for (const result of results) {
    if (result.passed) {
      console.log(chalk.green(`  ${result.message}`));
    } else {
      console.log(chalk.red(`  ✗ ${result.message}`));
    }
  }
}
